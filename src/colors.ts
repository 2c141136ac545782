import { readFileSync } from "node:fs";
import { z } from "zod";

export const UNKNOWN_LANGUAGE_COLOR = "#858585";

const colorTableSchema = z.record(z.string().regex(/^#[0-9A-Fa-f]{3,8}$/));

let table: Record<string, string> | null = null;

const loadTable = (): Record<string, string> => {
  if (!table) {
    const raw = readFileSync(new URL("./data/language-colors.json", import.meta.url), "utf8");
    table = colorTableSchema.parse(JSON.parse(raw));
  }
  return table;
};

/** Linguist colour for languages GitHub returns without one. */
export const fallbackColor = (language: string): string => {
  return loadTable()[language] ?? UNKNOWN_LANGUAGE_COLOR;
};
