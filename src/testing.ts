import type { FetchLike } from "./github";
import type { ContributionRecord, UserProfile, YearBundle } from "./types";

export type RecordedRequest = {
  url: string;
  headers: Record<string, string>;
  query: string;
  variables: Record<string, unknown>;
};

export type FakeReply = { status?: number; body: unknown } | Error;

const headersOf = (init: RequestInit): Record<string, string> => {
  const headers: Record<string, string> = {};
  new Headers(init.headers).forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
};

/**
 * In-process stand-in for the GraphQL endpoint. `reply` sees each decoded request and returns
 * the body to send back, or an Error to reject the fetch with.
 */
export const createFakeFetch = (reply: (request: RecordedRequest) => FakeReply) => {
  const requests: RecordedRequest[] = [];
  const fetch: FetchLike = async (url, init) => {
    const payload: unknown = JSON.parse(typeof init.body === "string" ? init.body : "{}");
    const request: RecordedRequest = {
      url,
      headers: headersOf(init),
      query: isObject(payload) && typeof payload.query === "string" ? payload.query : "",
      variables: isObject(payload) && isObject(payload.variables) ? payload.variables : {},
    };
    requests.push(request);
    const result = reply(request);
    if (result instanceof Error) throw result;
    const text = typeof result.body === "string" ? result.body : JSON.stringify(result.body);
    return new Response(text, { status: result.status ?? 200 });
  };
  return { fetch, requests };
};

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const noSleep = async (_ms: number) => {};

export const silentLogger = () => {
  const lines: string[] = [];
  const push = (...args: unknown[]) => {
    lines.push(args.map(String).join(" "));
  };
  return { lines, logger: { log: push, warn: push, error: push } };
};

export const makeRecord = (overrides: Partial<ContributionRecord> = {}): ContributionRecord => ({
  repository: "octo/app",
  isFork: false,
  isPrivate: false,
  primaryLanguage: { name: "TypeScript", color: "#3178c6" },
  languages: [{ name: "TypeScript", color: "#3178c6", bytes: 1000 }],
  commitCount: 10,
  ...overrides,
});

export const makeBundle = (year: number, records: ContributionRecord[]): YearBundle => ({
  year,
  from: `${year}-01-01T00:00:00Z`,
  to: `${year}-12-31T23:59:59Z`,
  records,
});

export const makeProfile = (overrides: Partial<UserProfile> = {}): UserProfile => ({
  login: "octo",
  name: "Octo Cat",
  bio: "",
  company: "",
  location: "",
  email: "",
  website: "",
  twitter: "",
  createdAt: "2020-01-01T00:00:00Z",
  followers: 12,
  following: 3,
  ownedRepositories: 8,
  contributedRepositories: 4,
  starredRepositories: 20,
  publicRepositories: 6,
  totalStars: 42,
  totalForks: 7,
  totalIssues: 5,
  totalPullRequests: 9,
  totalReviews: 2,
  ...overrides,
});

export const userResponse = (login = "octo") => ({
  data: {
    user: {
      login,
      name: "Octo Cat",
      bio: "Builds things",
      company: "Acme",
      location: "Lisbon",
      email: null,
      websiteUrl: "https://example.com",
      twitterUsername: "octo",
      createdAt: "2020-01-01T00:00:00Z",
      followers: { totalCount: 12 },
      following: { totalCount: 3 },
      ownedRepositories: { totalCount: 8 },
      publicRepositories: {
        nodes: [
          { stargazerCount: 30, forkCount: 5, isFork: false },
          { stargazerCount: 12, forkCount: 2, isFork: false },
          { stargazerCount: 0, forkCount: 0, isFork: true },
        ],
      },
      repositoriesContributedTo: { totalCount: 4 },
      starredRepositories: { totalCount: 20 },
      contributionsCollection: {
        totalIssueContributions: 5,
        totalPullRequestContributions: 9,
        totalPullRequestReviewContributions: 2,
      },
    },
  },
});

export const contributionsResponse = (
  repositories: Array<{
    name: string;
    commits: number;
    isPrivate?: boolean;
    isFork?: boolean;
    languages?: Array<{ name: string; size: number }>;
  }>
) => ({
  data: {
    user: {
      contributionsCollection: {
        commitContributionsByRepository: repositories.map((repo) => ({
          repository: {
            nameWithOwner: repo.name,
            isFork: repo.isFork ?? false,
            isPrivate: repo.isPrivate ?? false,
            primaryLanguage: repo.languages?.[0] ? { name: repo.languages[0].name, color: null } : null,
            languages: {
              edges: (repo.languages ?? []).map((language) => ({
                size: language.size,
                node: { name: language.name, color: null },
              })),
            },
          },
          contributions: { nodes: [{ commitCount: repo.commits }] },
        })),
      },
    },
  },
});

export const historyResponse = (commits: Array<{ login: string | null; additions: number; deletions: number }>) => ({
  data: {
    repository: {
      defaultBranchRef: {
        target: {
          history: {
            nodes: commits.map((commit) => ({
              additions: commit.additions,
              deletions: commit.deletions,
              author: { user: commit.login ? { login: commit.login } : null },
            })),
          },
        },
      },
    },
  },
});

export const isContributionsQuery = (request: RecordedRequest) => request.query.includes("commitContributionsByRepository");
export const isHistoryQuery = (request: RecordedRequest) => request.query.includes("history(");
