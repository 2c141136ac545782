import { isRecordIncluded } from "./aggregate";
import { fetchCommitDeltas, fetchYearRecords, type GithubClient } from "./github";
import type { ContributionRecord, Logger, RecordFilters, YearBundle } from "./types";
import { errorMessage, splitIntoYearSlices } from "./utils";

export type FetchContributionsOptions = {
  login: string;
  from: string;
  to: string;
  includeLineCounts: boolean;
  filters: RecordFilters;
};

export type FetchContributionsResult = {
  bundles: YearBundle[];
  failedSlices: number[];
};

/**
 * Walks the window one calendar year at a time. A failed year is logged and skipped; a failed
 * line-count lookup leaves that record without `commits`. Both keep the run going.
 */
export const fetchContributions = async (
  client: GithubClient,
  options: FetchContributionsOptions,
  log: Logger = console
): Promise<FetchContributionsResult> => {
  const { login, includeLineCounts, filters } = options;
  const slices = splitIntoYearSlices(options.from, options.to);
  const bundles: YearBundle[] = [];
  const failedSlices: number[] = [];

  log.log(`  ·  Fetching ${slices.length} year period(s) for @${login}`);

  for (const [index, slice] of slices.entries()) {
    log.log(`  ·  Year ${index + 1}/${slices.length}: ${slice.from.slice(0, 10)} to ${slice.to.slice(0, 10)}`);

    let records: ContributionRecord[];
    try {
      records = await fetchYearRecords(client, login, slice);
    } catch (error) {
      log.warn(`  ⚠  Skipping ${slice.year}: ${errorMessage(error)}`);
      failedSlices.push(slice.year);
      continue;
    }

    if (includeLineCounts) {
      for (const record of records) {
        if (record.isPrivate || !isRecordIncluded(record, filters)) continue;
        try {
          record.commits = await fetchCommitDeltas(client, record.repository, login, slice);
        } catch (error) {
          log.warn(`  ⚠  No line counts for ${record.repository} in ${slice.year}: ${errorMessage(error)}`);
        }
      }
    }

    const commits = records.reduce((sum, record) => sum + record.commitCount, 0);
    log.log(`  ✓  ${slice.year}: ${commits} commits across ${records.length} repositories`);
    bundles.push({ ...slice, records });
  }

  return { bundles, failedSlices };
};
