import { fallbackColor } from "./colors";
import type {
  Analysis,
  Bucket,
  ContributionRecord,
  LanguageStat,
  RecordFilters,
  RepositorySummary,
  RunTotals,
  YearBundle,
  YearSummary,
} from "./types";

export const DEFAULT_FILTERS: RecordFilters = {
  excludeForks: false,
  excludePrivate: false,
  minCommits: 1,
};

const EMPTY_BUCKET: Bucket = { commits: 0, additions: 0, deletions: 0 };

type Accumulator = {
  totals: RunTotals;
  languages: ReadonlyMap<string, LanguageStat>;
  repositories: ReadonlyMap<string, RepositorySummary>;
  years: ReadonlyMap<number, { commits: number; languages: ReadonlyMap<string, number> }>;
};

const emptyAccumulator = (): Accumulator => ({
  totals: { commits: 0, additions: 0, deletions: 0, repositories: 0 },
  languages: new Map(),
  repositories: new Map(),
  years: new Map(),
});

export const isRecordIncluded = (record: ContributionRecord, filters: RecordFilters): boolean => {
  if (filters.excludeForks && record.isFork) return false;
  if (filters.excludePrivate && record.isPrivate) return false;
  return record.commitCount >= filters.minCommits;
};

export const sumCommitDeltas = (record: ContributionRecord): { additions: number; deletions: number } => {
  return (record.commits ?? []).reduce(
    (sum, commit) => ({
      additions: sum.additions + commit.additions,
      deletions: sum.deletions + commit.deletions,
    }),
    { additions: 0, deletions: 0 }
  );
};

const addToBucket = (bucket: Bucket, delta: Bucket): Bucket => ({
  commits: bucket.commits + delta.commits,
  additions: bucket.additions + delta.additions,
  deletions: bucket.deletions + delta.deletions,
});

const scaleBucket = (bucket: Bucket, factor: number): Bucket => ({
  commits: bucket.commits * factor,
  additions: bucket.additions * factor,
  deletions: bucket.deletions * factor,
});

const withRepository = (set: ReadonlySet<string>, repository: string): ReadonlySet<string> => {
  if (set.has(repository)) return set;
  return new Set([...set, repository]);
};

/**
 * Byte share of each declared language, in declaration order. Shares are taken against the
 * sum of the declared sizes, so they add up to 1 unless that sum is zero (then all are 0).
 */
export const languageShares = (record: ContributionRecord): Array<{ name: string; share: number }> => {
  const totalBytes = record.languages.reduce((sum, language) => sum + language.bytes, 0);
  return record.languages.map((language) => ({
    name: language.name,
    share: totalBytes > 0 ? language.bytes / totalBytes : 0,
  }));
};

const applyRecord = (acc: Accumulator, record: ContributionRecord, year: number): Accumulator => {
  const lines = sumCommitDeltas(record);
  const raw: Bucket = { commits: record.commitCount, ...lines };
  const languages = new Map(acc.languages);

  const touch = (name: string, color: string | null): LanguageStat => {
    const existing = languages.get(name);
    const resolvedColor = color ?? existing?.color ?? fallbackColor(name);
    return existing
      ? { ...existing, color: resolvedColor }
      : {
          name,
          color: resolvedColor,
          direct: EMPTY_BUCKET,
          weighted: EMPTY_BUCKET,
          bytes: 0,
          repositories: new Set<string>(),
        };
  };

  if (record.primaryLanguage) {
    const stat = touch(record.primaryLanguage.name, record.primaryLanguage.color);
    languages.set(stat.name, {
      ...stat,
      direct: addToBucket(stat.direct, raw),
      repositories: withRepository(stat.repositories, record.repository),
    });
  }

  const shares = languageShares(record);
  const yearEntry = acc.years.get(year) ?? { commits: 0, languages: new Map<string, number>() };
  const yearLanguages = new Map(yearEntry.languages);

  record.languages.forEach((language, index) => {
    const share = shares[index]?.share ?? 0;
    const stat = touch(language.name, language.color);
    languages.set(stat.name, {
      ...stat,
      weighted: addToBucket(stat.weighted, scaleBucket(raw, share)),
      bytes: stat.bytes + language.bytes,
      repositories: withRepository(stat.repositories, record.repository),
    });
    yearLanguages.set(language.name, (yearLanguages.get(language.name) ?? 0) + raw.commits * share);
  });

  const repositories = new Map(acc.repositories);
  const previousRepo = repositories.get(record.repository);
  repositories.set(record.repository, {
    name: record.repository,
    commits: (previousRepo?.commits ?? 0) + raw.commits,
    additions: (previousRepo?.additions ?? 0) + raw.additions,
    deletions: (previousRepo?.deletions ?? 0) + raw.deletions,
    primaryLanguage: record.primaryLanguage?.name ?? previousRepo?.primaryLanguage ?? null,
    isFork: record.isFork,
    isPrivate: record.isPrivate,
  });

  const years = new Map(acc.years);
  years.set(year, { commits: yearEntry.commits + raw.commits, languages: yearLanguages });

  return {
    totals: {
      commits: acc.totals.commits + raw.commits,
      additions: acc.totals.additions + raw.additions,
      deletions: acc.totals.deletions + raw.deletions,
      repositories: repositories.size,
    },
    languages,
    repositories,
    years,
  };
};

const byCommitsDescending = <T>(commitsOf: (item: T) => number) => (a: T, b: T) => commitsOf(b) - commitsOf(a);

/**
 * Folds year bundles into one Analysis. Records rejected by `filters` contribute nothing.
 * Languages are ordered by weighted commits, descending; `Array.prototype.sort` is stable, so
 * equal values keep the order in which the languages were first accumulated.
 */
export const aggregate = (
  bundles: YearBundle[],
  filters: RecordFilters = DEFAULT_FILTERS,
  options: { period?: { from: string; to: string }; failedSlices?: number[] } = {}
): Analysis => {
  const acc = bundles.reduce(
    (outer, bundle) =>
      bundle.records
        .filter((record) => isRecordIncluded(record, filters))
        .reduce((inner, record) => applyRecord(inner, record, bundle.year), outer),
    emptyAccumulator()
  );

  const languages =
    acc.totals.commits > 0
      ? [...acc.languages.values()].sort(byCommitsDescending((stat: LanguageStat) => stat.weighted.commits))
      : [];

  const years: YearSummary[] = [...acc.years.entries()]
    .sort(([a], [b]) => a - b)
    .map(([year, entry]) => ({
      year,
      commits: entry.commits,
      languages: [...entry.languages.entries()]
        .map(([name, commits]) => ({ name, commits }))
        .sort(byCommitsDescending((item: { commits: number }) => item.commits)),
    }));

  const repositories = [...acc.repositories.values()].sort(
    byCommitsDescending((repo: RepositorySummary) => repo.commits)
  );

  return {
    period: options.period ?? {
      from: bundles[0]?.from ?? "",
      to: bundles[bundles.length - 1]?.to ?? "",
    },
    totals: acc.totals,
    languages,
    years,
    repositories,
    failedSlices: options.failedSlices ?? [],
  };
};

export const languagePercentage = (stat: LanguageStat, totals: RunTotals): number => {
  return totals.commits > 0 ? (stat.weighted.commits / totals.commits) * 100 : 0;
};

export const directPercentage = (stat: LanguageStat, totals: RunTotals): number => {
  return totals.commits > 0 ? (stat.direct.commits / totals.commits) * 100 : 0;
};

export const netLines = (totals: RunTotals): number => totals.additions - totals.deletions;

/** Plain-data view of an Analysis; percentages are derived here, at write time. */
export const serializeAnalysis = (analysis: Analysis) => ({
  period: analysis.period,
  summary: {
    ...analysis.totals,
    netLines: netLines(analysis.totals),
    yearsAnalyzed: analysis.years.length,
    failedSlices: analysis.failedSlices,
  },
  languages: analysis.languages.map((stat) => ({
    name: stat.name,
    color: stat.color,
    direct: stat.direct,
    weighted: stat.weighted,
    bytes: stat.bytes,
    repositoryCount: stat.repositories.size,
    percentage: languagePercentage(stat, analysis.totals),
    directPercentage: directPercentage(stat, analysis.totals),
  })),
  years: analysis.years,
  repositories: analysis.repositories,
});
