import { languagePercentage } from "../aggregate";
import { padEndToWidth, truncateToWidth, visibleWidth } from "../text";
import type { Analysis, LanguageStat, ProfileField, RunTotals, UserProfile, Theme } from "../types";
import { formatCount } from "../utils";

export type CardInput = {
  analysis: Analysis;
  profile: UserProfile;
  theme: Theme;
  fields: ProfileField[];
  maxLanguages?: number;
  generatedAt: Date;
};

export type CardRenderer = (input: CardInput) => string;

export type KeyValueParts = {
  key: string;
  dots: string;
  value: string;
};

/**
 * `. Key:` + dot leader + ` value`, exactly `width` columns. The value is truncated when it
 * would leave less than one dot.
 */
export const formatKeyValue = (key: string, value: string, width: number): KeyValueParts => {
  const safeKey = truncateToWidth(key, Math.max(4, width - 12));
  const keyWidth = visibleWidth(`. ${safeKey}:`);
  const fitted = truncateToWidth(value, Math.max(0, width - keyWidth - 2));
  const dots = ".".repeat(Math.max(1, width - keyWidth - 1 - visibleWidth(fitted)));
  return { key: safeKey, dots, value: fitted };
};

export const joinKeyValue = (parts: KeyValueParts): string => `. ${parts.key}:${parts.dots} ${parts.value}`;

/** `Name -—- @login -——…—-—-`, exactly `width` columns unless the login alone overflows. */
export const formatIdentityHeader = (name: string, login: string, width: number): string => {
  const fixed = ` -—- @${login} -`;
  const tail = "—-—-";
  const available = width - visibleWidth(fixed) - visibleWidth(tail);
  const fittedName = truncateToWidth(name, Math.max(0, available));
  const middle = Math.max(0, available - visibleWidth(fittedName));
  return `${fittedName}${fixed}${"—".repeat(middle)}${tail}`;
};

export const formatSectionHeader = (title: string, width: number): string => {
  return padEndToWidth(truncateToWidth(`— ${title} `, width), width, "—");
};

export const topLanguages = (analysis: Analysis, limit: number): LanguageStat[] => {
  return analysis.languages.slice(0, Math.max(0, limit));
};

/** `name: 12.3%, 1,234 commits, +5,678/-910` from the weighted bucket. */
export const formatLanguageLine = (stat: LanguageStat, totals: RunTotals): string => {
  const percentage = languagePercentage(stat, totals).toFixed(1);
  const { commits, additions, deletions } = stat.weighted;
  return `${stat.name}: ${percentage}%, ${formatCount(commits)} commits, +${formatCount(additions)}/-${formatCount(deletions)}`;
};

export type BarSegment = {
  x: number;
  width: number;
  color: string;
};

/** Proportional segments across `width`; segments narrower than 1px are left out. */
export const languageBarSegments = (analysis: Analysis, width: number): BarSegment[] => {
  const segments: BarSegment[] = [];
  let x = 0;
  for (const stat of analysis.languages) {
    const segmentWidth = (languagePercentage(stat, analysis.totals) / 100) * width;
    if (segmentWidth < 1) continue;
    segments.push({ x, width: segmentWidth, color: stat.color });
    x += segmentWidth;
  }
  return segments;
};
