import { netLines } from "../aggregate";
import { truncateToWidth, visibleWidth } from "../text";
import { formatCount } from "../utils";
import { contactFields } from "./fields";
import {
  type CardInput,
  type KeyValueParts,
  formatIdentityHeader,
  formatKeyValue,
  formatLanguageLine,
  formatSectionHeader,
  languageBarSegments,
  topLanguages,
} from "./layout";
import { MONO_FONT, PALETTES, escapeXml } from "./svg";

export const PANEL_COLUMNS = 68;

const WIDTH = 640;
const X = 30;
const TOP = 40;
const LINE_HEIGHT = 22;
const BAR_WIDTH = 560;
const BAR_HEIGHT = 10;
const DEFAULT_LANGUAGES = 6;

type Row =
  | { kind: "gap" }
  | { kind: "plain"; text: string; className?: string }
  | { kind: "pair"; parts: KeyValueParts; value?: string }
  | { kind: "bar" }
  | { kind: "language"; color: string; text: string };

const valueSpan = (text: string) => `<tspan class="value">${escapeXml(text)}</tspan>`;

const renderRow = (row: Row): string => {
  switch (row.kind) {
    case "plain":
      return row.className ? `<tspan class="${row.className}">${escapeXml(row.text)}</tspan>` : escapeXml(row.text);
    case "pair":
      return `. <tspan class="key">${escapeXml(row.parts.key)}</tspan>:${row.parts.dots} ${row.value ?? valueSpan(row.parts.value)}`;
    case "language":
      return `<tspan fill="${escapeXml(row.color)}">●</tspan> ${valueSpan(row.text)}`;
    default:
      return "";
  }
};

/** Fixed-width key/value panel in the style of `neofetch`. */
export const renderNeofetch = ({ analysis, profile, theme, fields, maxLanguages, generatedAt }: CardInput): string => {
  const palette = PALETTES[theme];
  const { totals } = analysis;
  const net = netLines(totals);

  const locValue = `${formatCount(net)} ( ${formatCount(totals.additions)}++, ${formatCount(totals.deletions)}-- )`;
  const locParts = formatKeyValue("Lines of Code", locValue, PANEL_COLUMNS);
  // Colour the two halves only while the value survived untruncated.
  const locStyled =
    locParts.value === locValue
      ? `<tspan class="value">${formatCount(net)} ( <tspan class="add">${formatCount(totals.additions)}++</tspan>, <tspan class="del">${formatCount(totals.deletions)}--</tspan> )</tspan>`
      : undefined;

  const rows: Row[] = [
    { kind: "plain", text: formatIdentityHeader(profile.name, profile.login, PANEL_COLUMNS) },
    ...fields.map((field): Row => ({ kind: "pair", parts: formatKeyValue(field.key, field.value, PANEL_COLUMNS) })),
  ];

  const contacts = contactFields(profile);
  if (contacts.length > 0) {
    rows.push({ kind: "gap" }, { kind: "plain", text: formatSectionHeader("Contact", PANEL_COLUMNS), className: "separator" });
    contacts.forEach((field) => rows.push({ kind: "pair", parts: formatKeyValue(field.key, field.value, PANEL_COLUMNS) }));
  }

  rows.push(
    { kind: "gap" },
    { kind: "plain", text: formatSectionHeader("GitHub Stats", PANEL_COLUMNS), className: "separator" },
    {
      kind: "pair",
      parts: formatKeyValue(
        "Repos",
        `${formatCount(profile.ownedRepositories)} {Contributed: ${formatCount(profile.contributedRepositories)}} | Stars: ${formatCount(profile.totalStars)}`,
        PANEL_COLUMNS
      ),
    },
    {
      kind: "pair",
      parts: formatKeyValue(
        "Commits",
        `${formatCount(totals.commits)} | Followers: ${formatCount(profile.followers)}`,
        PANEL_COLUMNS
      ),
    },
    { kind: "pair", parts: locParts, value: locStyled }
  );

  const languages = topLanguages(analysis, maxLanguages ?? DEFAULT_LANGUAGES);
  if (languages.length > 0) {
    rows.push({ kind: "gap" }, { kind: "bar" });
    languages.forEach((stat) =>
      rows.push({
        kind: "language",
        color: stat.color,
        text: truncateToWidth(formatLanguageLine(stat, totals), PANEL_COLUMNS - visibleWidth("● ")),
      })
    );
  }

  let y = TOP;
  const body: string[] = [];
  for (const row of rows) {
    if (row.kind === "gap") {
      y += LINE_HEIGHT / 2;
      continue;
    }
    if (row.kind === "bar") {
      const segments = languageBarSegments(analysis, BAR_WIDTH)
        .map(
          (segment) =>
            `<rect x="${segment.x.toFixed(1)}" y="0" width="${segment.width.toFixed(1)}" height="${BAR_HEIGHT}" fill="${escapeXml(segment.color)}" rx="1"/>`
        )
        .join("");
      body.push(
        `<g transform="translate(${X}, ${y - BAR_HEIGHT})"><rect width="${BAR_WIDTH}" height="${BAR_HEIGHT}" rx="1" class="track"/>${segments}</g>`
      );
      y += LINE_HEIGHT;
      continue;
    }
    body.push(`<text x="${X}" y="${y}">${renderRow(row)}</text>`);
    y += LINE_HEIGHT;
  }

  const height = y + 10;
  const stamp = generatedAt.toISOString().slice(0, 10);

  return `<?xml version="1.0" encoding="UTF-8"?>
<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${height}" viewBox="0 0 ${WIDTH} ${height}" font-family="${MONO_FONT}" font-size="14px">
<title>${escapeXml(`${profile.name} (@${profile.login}) · generated ${stamp}`)}</title>
<style>
.key { fill: ${palette.key}; font-weight: bold; }
.value { fill: ${palette.value}; }
.add { fill: ${palette.add}; }
.del { fill: ${palette.del}; }
.separator { fill: ${palette.text}; }
.track { fill: ${palette.border}; }
text, tspan { white-space: pre; }
</style>
<rect width="${WIDTH}" height="${height}" fill="${palette.background}" rx="15"/>
<g fill="${palette.text}">
${body.join("\n")}
</g>
</svg>
`;
};
