import { writeFile as writeFileToDisk } from "node:fs/promises";
import { aggregate, serializeAnalysis } from "./aggregate";
import { parseCliArgs } from "./config";
import { fetchContributions } from "./fetcher";
import { type FetchLike, createGithubClient, fetchUserProfile } from "./github";
import { defaultProfileFields, getRenderer, mergeFields } from "./render";
import { printReport } from "./report";
import type { Logger } from "./types";
import { errorMessage, formatISODate } from "./utils";

export type RunDeps = {
  env: NodeJS.ProcessEnv;
  now: () => Date;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  writeFile: (path: string, data: string) => Promise<void>;
  log: Logger;
};

const defaultDeps = (): RunDeps => ({
  env: process.env,
  now: () => new Date(),
  writeFile: (path, data) => writeFileToDisk(path, data, "utf8"),
  log: console,
});

/**
 * One full generation: profile, yearly contributions, aggregation, console report, cards.
 * Resolves to the process exit code; nothing here rejects.
 */
export const run = async (argv: string[], overrides: Partial<RunDeps> = {}): Promise<number> => {
  const deps: RunDeps = { ...defaultDeps(), ...overrides };
  const { log } = deps;

  try {
    const now = deps.now();
    const config = parseCliArgs(argv, deps.env, now);
    if (!config) return 0;
    const client = createGithubClient({
      token: config.token,
      endpoint: config.endpoint,
      requestDelayMs: config.requestDelayMs,
      timeoutMs: config.timeoutMs,
      fetch: deps.fetch,
      sleep: deps.sleep,
    });

    log.log(`  ✦  Generating ${config.style} card for @${config.username}`);
    log.log(`  ·  Window ${formatISODate(new Date(config.window.from))} to ${formatISODate(new Date(config.window.to))}`);

    const profile = await fetchUserProfile(client, config.username);
    const { bundles, failedSlices } = await fetchContributions(
      client,
      {
        login: config.username,
        from: config.window.from,
        to: config.window.to,
        includeLineCounts: config.includeLineCounts,
        filters: config.filters,
      },
      log
    );

    const analysis = aggregate(bundles, config.filters, { period: config.window, failedSlices });
    printReport(analysis, { topN: config.topN, showYearly: config.showYearly }, log);

    if (config.jsonPath) {
      await deps.writeFile(config.jsonPath, `${JSON.stringify(serializeAnalysis(analysis), null, 2)}\n`);
      log.log(`  ✓  Statistics written to ${config.jsonPath}`);
    }

    const render = getRenderer(config.style);
    const fields = mergeFields(defaultProfileFields(profile, now), config.fields);
    for (const theme of config.themes) {
      const svg = render({ analysis, profile, theme, fields, maxLanguages: config.maxLanguages, generatedAt: now });
      await deps.writeFile(config.outputs[theme], svg);
      log.log(`  ✓  ${theme} card written to ${config.outputs[theme]}`);
    }

    if (failedSlices.length > 0) {
      log.warn(`  ⚠  Finished with ${failedSlices.length} missing year(s): ${failedSlices.join(", ")}`);
    }
    return 0;
  } catch (error) {
    log.error(`  ✗  Error: ${errorMessage(error)}`);
    return 1;
  }
};
