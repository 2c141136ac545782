import { languagePercentage, netLines } from "./aggregate";
import { padEndToWidth, truncateToWidth } from "./text";
import type { Analysis, Logger } from "./types";
import { formatCount, formatSigned } from "./utils";

const BAR_COLUMNS = 40;

export const formatBytes = (bytes: number): string => {
  const units = ["B", "KB", "MB", "GB"];
  let value = bytes;
  for (const unit of units) {
    if (value < 1024) return `${value.toFixed(1)}${unit}`;
    value /= 1024;
  }
  return `${value.toFixed(1)}TB`;
};

/** `█` for the share of the largest language, `░` for the rest. */
export const asciiBar = (value: number, max: number, columns = BAR_COLUMNS): string => {
  const filled = max > 0 ? Math.max(0, Math.min(columns, Math.floor((value / max) * columns))) : 0;
  return `${"█".repeat(filled)}${"░".repeat(columns - filled)}`;
};

const cell = (text: string, width: number) => padEndToWidth(truncateToWidth(text, width), width);
const right = (text: string, width: number) => text.padStart(width);

export const printReport = (
  analysis: Analysis,
  options: { topN: number; showYearly: boolean },
  log: Logger = console
): void => {
  const { totals, period } = analysis;

  log.log("");
  log.log(`  ◈  Period        ${period.from.slice(0, 10)} to ${period.to.slice(0, 10)} (${analysis.years.length} years)`);
  log.log(`  ✦  Commits       ${formatCount(totals.commits)}`);
  log.log(`  ✦  Repositories  ${formatCount(totals.repositories)}`);
  log.log(`  ✦  Lines         +${formatCount(totals.additions)} / -${formatCount(totals.deletions)} (net ${formatSigned(netLines(totals))})`);
  if (analysis.failedSlices.length > 0) {
    log.log(`  ⚠  Missing years ${analysis.failedSlices.join(", ")}`);
  }

  if (analysis.languages.length === 0) {
    log.log("\n  ✗  No language data found for the specified period.");
    return;
  }

  const top = analysis.languages.slice(0, options.topN);
  log.log(`\n  Top ${top.length} languages by weighted commits`);
  log.log(
    `  ${cell("#", 4)}${cell("Language", 20)}${right("Commits", 10)}${right("Share", 9)}${right("Lines+", 12)}${right("Lines-", 12)}${right("Repos", 7)}${right("Bytes", 10)}`
  );
  top.forEach((stat, index) => {
    log.log(
      `  ${cell(`${index + 1}.`, 4)}${cell(stat.name, 20)}${right(formatCount(stat.weighted.commits), 10)}${right(`${languagePercentage(stat, totals).toFixed(1)}%`, 9)}${right(formatCount(stat.weighted.additions), 12)}${right(formatCount(stat.weighted.deletions), 12)}${right(String(stat.repositories.size), 7)}${right(formatBytes(stat.bytes), 10)}`
    );
  });

  const max = Math.max(...top.map((stat) => stat.weighted.commits));
  log.log("");
  top.slice(0, 10).forEach((stat) => {
    log.log(`  ${cell(stat.name, 15)} │${asciiBar(stat.weighted.commits, max)}│ ${right(languagePercentage(stat, totals).toFixed(1), 5)}%`);
  });

  if (options.showYearly) {
    const recent = analysis.years.filter((year) => year.commits > 0).slice(-5);
    if (recent.length > 0) log.log("\n  Yearly breakdown");
    for (const year of recent) {
      log.log(`  ${year.year}: ${formatCount(year.commits)} commits`);
      year.languages
        .filter((language) => language.commits > 0)
        .slice(0, 3)
        .forEach((language) => {
          const share = (language.commits / year.commits) * 100;
          log.log(`    • ${language.name}: ${Math.round(language.commits)} commits (${share.toFixed(1)}%)`);
        });
    }
  }

  const repositories = analysis.repositories.slice(0, 5);
  if (repositories.length > 0) log.log("\n  Most active repositories");
  for (const repo of repositories) {
    const flags = `${repo.isFork ? " (fork)" : ""}${repo.isPrivate ? " (private)" : ""}`;
    log.log(`  • ${repo.name}${flags}`);
    log.log(
      `    ${formatCount(repo.commits)} commits, +${formatCount(repo.additions)}/-${formatCount(repo.deletions)} lines, primary: ${repo.primaryLanguage ?? "Unknown"}`
    );
  }
};
