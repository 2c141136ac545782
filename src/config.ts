import yargs from "yargs";
import { z } from "zod";
import { DEFAULT_FILTERS } from "./aggregate";
import { DEFAULT_REQUEST_DELAY_MS, DEFAULT_TIMEOUT_MS, GITHUB_GRAPHQL_URL } from "./github";
import type { CardStyle, ProfileField, RecordFilters, Theme } from "./types";
import { DEFAULT_YEARS_BACK, getEnvNumber, isValidUsername, resolveWindow } from "./utils";

export type RunConfig = {
  username: string;
  token: string;
  window: { from: string; to: string };
  includeLineCounts: boolean;
  filters: RecordFilters;
  style: CardStyle;
  themes: Theme[];
  outputs: Record<Theme, string>;
  jsonPath?: string;
  maxLanguages?: number;
  fields: ProfileField[];
  topN: number;
  showYearly: boolean;
  endpoint: string;
  requestDelayMs: number;
  timeoutMs: number;
};

const STYLES = ["neofetch", "terminal"] as const;
const THEMES = ["dark", "light", "both"] as const;

const optionsSchema = z.object({
  username: z
    .string({ required_error: "A GitHub username is required." })
    .refine((value) => isValidUsername(value), "Invalid GitHub username."),
  token: z
    .string({ required_error: "GitHub token required. Use --token or set GITHUB_TOKEN." })
    .min(1, "GitHub token required. Use --token or set GITHUB_TOKEN."),
  years: z.number().int().positive(),
  minCommits: z.number().int().min(0),
  topN: z.number().int().positive(),
  maxLanguages: z.number().int().positive().optional(),
  requestDelayMs: z.number().min(0),
  timeoutMs: z.number().positive(),
  endpoint: z.string().url(),
});

export const parseField = (raw: string): ProfileField => {
  const separator = raw.indexOf("=");
  const key = separator > 0 ? raw.slice(0, separator).trim() : "";
  if (!key) {
    throw new Error(`Invalid --field '${raw}'. Use Key=Value.`);
  }
  return { key, value: raw.slice(separator + 1).trim() };
};

const buildParser = (argv: string[]) =>
  yargs(argv)
    .scriptName("profile-card")
    .usage("$0 <username> [options]")
    .option("token", { type: "string", describe: "GitHub token (defaults to GITHUB_TOKEN)" })
    .option("from-date", { type: "string", describe: "Start date (YYYY-MM-DD)" })
    .option("to-date", { type: "string", describe: "End date (YYYY-MM-DD)" })
    .option("years", { type: "number", default: DEFAULT_YEARS_BACK, describe: "Years to look back when dates are missing" })
    .option("exclude-forks", { type: "boolean", default: false, describe: "Skip forked repositories" })
    .option("exclude-private", { type: "boolean", default: false, describe: "Skip private repositories" })
    .option("line-counts", { type: "boolean", default: true, describe: "Fetch per-commit line counts (--no-line-counts to skip)" })
    .option("min-commits", { type: "number", default: DEFAULT_FILTERS.minCommits, describe: "Minimum commits per repository and year" })
    .option("style", { choices: STYLES, describe: "Card layout (default: neofetch)" })
    .option("theme", { choices: THEMES, describe: "Which themes to render (default: both)" })
    .option("output-dark", { type: "string", default: "profile_dark.svg", describe: "Dark card path" })
    .option("output-light", { type: "string", default: "profile_light.svg", describe: "Light card path" })
    .option("json", { type: "string", describe: "Also write the statistics as JSON" })
    .option("max-languages", { type: "number", describe: "Languages shown on the card" })
    .option("field", { type: "string", array: true, describe: "Extra card field, Key=Value (repeatable)" })
    .option("yearly", { type: "boolean", default: true, describe: "Print the yearly breakdown (--no-yearly to skip)" })
    .option("top-n", { type: "number", default: 15, describe: "Languages in the console report" })
    .strict()
    .help()
    .version(false)
    .exitProcess(false)
    .fail((message, error) => {
      throw error instanceof Error ? error : new Error(message);
    });

/**
 * Turns argv and the environment into a validated RunConfig. Every problem is thrown as one
 * Error whose message lists `field: reason` lines. Returns null once `--help` has been printed.
 */
export const parseCliArgs = (argv: string[], env: NodeJS.ProcessEnv, now: Date): RunConfig | null => {
  const args = buildParser(argv).parseSync();
  if (args.help === true) return null;
  const [username] = args._.map(String);

  const result = optionsSchema.safeParse({
    username,
    token: args.token || env.GITHUB_TOKEN || undefined,
    years: args.years,
    minCommits: args["min-commits"],
    topN: args["top-n"],
    maxLanguages: args["max-languages"],
    requestDelayMs: getEnvNumber(env.REQUEST_DELAY_MS, DEFAULT_REQUEST_DELAY_MS),
    timeoutMs: getEnvNumber(env.REQUEST_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    endpoint: env.GITHUB_GRAPHQL_URL || GITHUB_GRAPHQL_URL,
  });
  if (!result.success) {
    throw new Error(result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("\n"));
  }
  const options = result.data;
  const theme = args.theme ?? "both";

  const window = resolveWindow({
    fromDate: args["from-date"],
    toDate: args["to-date"],
    yearsBack: options.years,
    now,
  });

  return {
    username: options.username,
    token: options.token,
    window,
    includeLineCounts: args["line-counts"],
    filters: {
      excludeForks: args["exclude-forks"],
      excludePrivate: args["exclude-private"],
      minCommits: options.minCommits,
    },
    style: args.style ?? "neofetch",
    themes: theme === "both" ? ["dark", "light"] : [theme],
    outputs: { dark: args["output-dark"], light: args["output-light"] },
    jsonPath: args.json,
    maxLanguages: options.maxLanguages,
    fields: (args.field ?? []).map(parseField),
    topN: options.topN,
    showYearly: args.yearly,
    endpoint: options.endpoint,
    requestDelayMs: options.requestDelayMs,
    timeoutMs: options.timeoutMs,
  };
};
