import { eastAsianWidthType } from "get-east-asian-width";

export const ELLIPSIS = "...";

// Control and format characters (zero-width space/joiners, BOM, bidi embeddings and isolates) and combining marks.
const INVISIBLE = /[\p{Cc}\p{Cf}\p{Mn}\p{Me}]/gu;

export const stripInvisible = (text: string): string => text.replace(INVISIBLE, "");

export const charWidth = (char: string): number => {
  const codePoint = char.codePointAt(0);
  if (codePoint === undefined) return 0;
  const type = eastAsianWidthType(codePoint);
  return type === "wide" || type === "fullwidth" ? 2 : 1;
};

/** Column width of `text` after invisible characters are removed. */
export const visibleWidth = (text: string): number => {
  let width = 0;
  for (const char of stripInvisible(text)) {
    width += charWidth(char);
  }
  return width;
};

/**
 * Fits `text` into `budget` columns. Invisible characters are always removed. A value that
 * already fits comes back as-is; otherwise characters are kept while they leave room for the
 * marker, and the marker is appended. A wide character that would straddle the limit is
 * dropped, so the result can be one column short of `budget`.
 */
export const truncateToWidth = (text: string, budget: number, marker = ELLIPSIS): string => {
  const cleaned = stripInvisible(text);
  if (visibleWidth(cleaned) <= budget) return cleaned;

  const markerWidth = visibleWidth(marker);
  if (budget < markerWidth) return marker.slice(0, Math.max(0, budget));

  let width = 0;
  let kept = "";
  for (const char of cleaned) {
    const w = charWidth(char);
    if (width + w + markerWidth > budget) break;
    kept += char;
    width += w;
  }
  return `${kept}${marker}`;
};

export const padEndToWidth = (text: string, width: number, fill = " "): string => {
  const missing = width - visibleWidth(text);
  return missing > 0 ? `${text}${fill.repeat(missing)}` : text;
};
