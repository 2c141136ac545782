import { languagePercentage, netLines } from "../aggregate";
import { padEndToWidth, truncateToWidth } from "../text";
import { formatCount, formatSigned } from "../utils";
import { type CardInput, topLanguages } from "./layout";
import { MONO_FONT, PALETTES, type Palette, escapeXml } from "./svg";

export const BOX_INNER_COLUMNS = 64;

const WIDTH = 800;
const CONTENT_X = 40;
const CONTENT_TOP = 70;
const LINE_HEIGHT = 14;
const CHAR_WIDTH = 6.6;
const DEFAULT_LANGUAGES = 10;

type Line = {
  text: string;
  color: keyof Palette;
  bold?: boolean;
  dot?: string;
};

/** `│` + content fitted to the box + `│`. */
export const boxLine = (content: string): string => {
  return `│${padEndToWidth(truncateToWidth(content, BOX_INNER_COLUMNS), BOX_INNER_COLUMNS)}│`;
};

export const boxTop = (title: string): string => {
  return `┌${padEndToWidth(truncateToWidth(`─ ${title} `, BOX_INNER_COLUMNS), BOX_INNER_COLUMNS, "─")}┐`;
};

export const boxBottom = (): string => `└${"─".repeat(BOX_INNER_COLUMNS)}┘`;

/** Terminal window with a box-drawn stats panel, a prompt line and a blinking cursor. */
export const renderTerminal = ({ analysis, profile, theme, fields, maxLanguages, generatedAt }: CardInput): string => {
  const palette = PALETTES[theme];
  const { totals } = analysis;
  const blank: Line = { text: boxLine(""), color: "border" };
  const joined = new Date(profile.createdAt).getUTCFullYear();

  const lines: Line[] = [
    { text: boxTop("GitHub Stats"), color: "border", bold: true },
    blank,
    {
      text: boxLine(`  ${profile.name} (@${profile.login})${Number.isNaN(joined) ? "" : ` - Joined ${joined}`}`),
      color: "text",
    },
  ];
  if (profile.bio) lines.push({ text: boxLine(`  ${profile.bio}`), color: "muted" });
  fields.forEach((field) => lines.push({ text: boxLine(`  ${field.key}: ${field.value}`), color: "muted" }));

  lines.push(
    blank,
    { text: boxLine("  Repository Stats:"), color: "blue", bold: true },
    {
      text: boxLine(
        `     Public Repos: ${formatCount(profile.publicRepositories)} │ Total Stars: ${formatCount(profile.totalStars)} │ Forks: ${formatCount(profile.totalForks)}`
      ),
      color: "text",
    },
    {
      text: boxLine(`     Followers: ${formatCount(profile.followers)} │ Following: ${formatCount(profile.following)}`),
      color: "text",
    },
    blank,
    { text: boxLine("  Contribution Stats:"), color: "green", bold: true },
    {
      text: boxLine(
        `     Commits: ${formatCount(totals.commits)} │ Issues: ${formatCount(profile.totalIssues)} │ PRs: ${formatCount(profile.totalPullRequests)}`
      ),
      color: "text",
    },
    {
      text: boxLine(`     Reviews: ${formatCount(profile.totalReviews)} │ Repositories: ${formatCount(totals.repositories)}`),
      color: "text",
    },
    blank,
    { text: boxLine("  Language Analysis (by commit percentage):"), color: "yellow", bold: true },
    { text: boxLine(`  ${"═".repeat(BOX_INNER_COLUMNS - 4)}`), color: "border" }
  );

  for (const stat of topLanguages(analysis, maxLanguages ?? DEFAULT_LANGUAGES)) {
    const { commits, additions, deletions } = stat.weighted;
    lines.push({
      text: boxLine(
        `  ● ${stat.name}: ${languagePercentage(stat, totals).toFixed(1)}%, ${formatCount(commits)} commits, +${formatCount(additions)}/-${formatCount(deletions)}`
      ),
      color: "text",
      dot: stat.color,
    });
  }

  if (totals.additions > 0) {
    const net = netLines(totals);
    lines.push(
      blank,
      { text: boxLine("  Code Statistics:"), color: "blue", bold: true },
      {
        text: boxLine(`     Lines Added: ${formatCount(totals.additions)} │ Deleted: ${formatCount(totals.deletions)}`),
        color: "text",
      },
      { text: boxLine(`     Net Change: ${formatSigned(net)} lines`), color: net >= 0 ? "green" : "del" }
    );
  }

  lines.push(blank, { text: boxBottom(), color: "border", bold: true });

  const stamp = `${generatedAt.toISOString().slice(0, 19).replace("T", " ")} UTC`;
  const prompt = `${profile.login}@github:~$ # Generated on ${stamp}`;
  lines.push({ text: prompt, color: "accent" });

  const height = CONTENT_TOP + lines.length * LINE_HEIGHT + 40;
  const body = lines
    .map((line, index) => {
      const y = CONTENT_TOP + index * LINE_HEIGHT;
      const text = `<text x="${CONTENT_X}" y="${y}" fill="${palette[line.color]}"${line.bold ? ' font-weight="600"' : ""}>${escapeXml(line.text)}</text>`;
      const dot = line.dot
        ? `<circle cx="${(CONTENT_X + 3.5 * CHAR_WIDTH).toFixed(1)}" cy="${y - 4}" r="3" fill="${escapeXml(line.dot)}"/>`
        : "";
      return `${text}${dot}`;
    })
    .join("\n  ");

  const cursorY = CONTENT_TOP + (lines.length - 1) * LINE_HEIGHT - 10;
  const cursorX = CONTENT_X + (prompt.length + 1) * CHAR_WIDTH;

  return `<?xml version="1.0" encoding="UTF-8"?>
<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${height}" viewBox="0 0 ${WIDTH} ${height}" font-family="${MONO_FONT}" font-size="11">
  <style>text { white-space: pre; }</style>
  <rect width="${WIDTH}" height="${height}" fill="${palette.background}" rx="6"/>
  <rect x="20" y="20" width="${WIDTH - 40}" height="${height - 40}" fill="${palette.panel}" stroke="${palette.border}" stroke-width="1" rx="6"/>
  <rect x="20" y="20" width="${WIDTH - 40}" height="30" fill="${palette.titleBar}" rx="6"/>
  <circle cx="35" cy="35" r="4" fill="#ff5f56"/>
  <circle cx="50" cy="35" r="4" fill="#ffbd2e"/>
  <circle cx="65" cy="35" r="4" fill="#27ca3f"/>
  <text x="${WIDTH / 2}" y="40" text-anchor="middle" font-size="12" font-weight="500" fill="${palette.text}">${escapeXml(`${profile.login}@github:~$ github-stats`)}</text>
  ${body}
  <rect x="${cursorX.toFixed(1)}" y="${cursorY}" width="7" height="12" fill="${palette.cursor}">
    <animate attributeName="opacity" values="1;0;1" dur="1.5s" repeatCount="indefinite"/>
  </rect>
</svg>
`;
};
