import type { Theme } from "../types";

// C0 controls other than tab, newline and carriage return are not allowed in XML 1.0.
const XML_INVALID = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;

export const escapeXml = (value: string) =>
  value
    .replace(XML_INVALID, "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");

export type Palette = {
  background: string;
  panel: string;
  border: string;
  titleBar: string;
  text: string;
  muted: string;
  key: string;
  value: string;
  add: string;
  del: string;
  accent: string;
  blue: string;
  green: string;
  yellow: string;
  cursor: string;
};

export const PALETTES: Record<Theme, Palette> = {
  dark: {
    background: "#0d1117",
    panel: "#161b22",
    border: "#30363d",
    titleBar: "#30363d",
    text: "#c9d1d9",
    muted: "#8b949e",
    key: "#ffa657",
    value: "#a5d6ff",
    add: "#3fb950",
    del: "#f85149",
    accent: "#7c3aed",
    blue: "#2f81f7",
    green: "#2ea043",
    yellow: "#fb8500",
    cursor: "#f0f6fc",
  },
  light: {
    background: "#f6f8fa",
    panel: "#ffffff",
    border: "#d0d7de",
    titleBar: "#e1e4e8",
    text: "#24292f",
    muted: "#656d76",
    key: "#953800",
    value: "#0a3069",
    add: "#1a7f37",
    del: "#cf222e",
    accent: "#8250df",
    blue: "#0969da",
    green: "#1f883d",
    yellow: "#9a6700",
    cursor: "#24292f",
  },
};

export const MONO_FONT = "'JetBrains Mono','SF Mono',Monaco,Consolas,monospace";
