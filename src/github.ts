import { z } from "zod";
import type { CommitDelta, ContributionRecord, UserProfile, YearSlice } from "./types";
import { sleep } from "./utils";

export const GITHUB_GRAPHQL_URL = "https://api.github.com/graphql";
export const DEFAULT_REQUEST_DELAY_MS = 200;
export const DEFAULT_TIMEOUT_MS = 15_000;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type GithubClientOptions = {
  token: string;
  endpoint?: string;
  requestDelayMs?: number;
  timeoutMs?: number;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
};

export type GithubClient = {
  query: <T>(query: string, variables: Record<string, unknown>, schema: z.ZodType<T, z.ZodTypeDef, unknown>) => Promise<T>;
};

const errorListSchema = z.array(z.object({ message: z.string() }).passthrough());

const envelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: errorListSchema.optional(),
});

/**
 * Minimal GraphQL transport. Requests run one at a time: every call awaits the fixed
 * delay first, then a single POST. A non-200 status, an `errors` list or a body that does
 * not match `schema` all reject; nothing is retried.
 */
export const createGithubClient = (options: GithubClientOptions): GithubClient => {
  const endpoint = options.endpoint ?? GITHUB_GRAPHQL_URL;
  const requestDelayMs = options.requestDelayMs ?? DEFAULT_REQUEST_DELAY_MS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const doFetch: FetchLike = options.fetch ?? ((url, init) => fetch(url, init));
  const wait = options.sleep ?? sleep;

  const query = async <T>(
    text: string,
    variables: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> => {
    await wait(requestDelayMs);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    let body: unknown;
    try {
      const response = await doFetch(endpoint, {
        method: "POST",
        headers: {
          authorization: `bearer ${options.token}`,
          "content-type": "application/json",
          accept: "application/json",
          "user-agent": "profile-card/1.0",
        },
        body: JSON.stringify({ query: text, variables }),
        signal: controller.signal,
      });

      if (response.status !== 200) {
        const detail = await response.text().catch(() => "");
        throw new Error(`GitHub API returned ${response.status}.${detail ? ` ${detail.slice(0, 200)}` : ""}`);
      }
      // The timer stays armed until the body is read.
      body = await response.json();
    } finally {
      clearTimeout(timeout);
    }

    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new Error("GitHub API returned a malformed response.");
    }
    if (envelope.data.errors?.length) {
      throw new Error(`GraphQL errors: ${envelope.data.errors.map((error) => error.message).join("; ")}`);
    }

    const parsed = schema.safeParse(envelope.data.data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`Unexpected response shape at ${issue ? issue.path.join(".") || "data" : "data"}.`);
    }
    return parsed.data;
  };

  return { query };
};

const totalCount = z.object({ totalCount: z.number() });

const languageNode = z.object({ name: z.string(), color: z.string().nullable() });

const USER_QUERY = `
  query($login: String!) {
    user(login: $login) {
      login
      name
      bio
      company
      location
      email
      websiteUrl
      twitterUsername
      createdAt
      followers { totalCount }
      following { totalCount }
      ownedRepositories: repositories(ownerAffiliations: [OWNER]) { totalCount }
      publicRepositories: repositories(first: 100, privacy: PUBLIC, ownerAffiliations: [OWNER]) {
        nodes { stargazerCount forkCount isFork }
      }
      repositoriesContributedTo { totalCount }
      starredRepositories { totalCount }
      contributionsCollection {
        totalIssueContributions
        totalPullRequestContributions
        totalPullRequestReviewContributions
      }
    }
  }
`;

const userSchema = z.object({
  user: z
    .object({
      login: z.string(),
      name: z.string().nullable(),
      bio: z.string().nullable(),
      company: z.string().nullable(),
      location: z.string().nullable(),
      email: z.string().nullable(),
      websiteUrl: z.string().nullable(),
      twitterUsername: z.string().nullable(),
      createdAt: z.string(),
      followers: totalCount,
      following: totalCount,
      ownedRepositories: totalCount,
      publicRepositories: z.object({
        nodes: z.array(z.object({ stargazerCount: z.number(), forkCount: z.number(), isFork: z.boolean() })),
      }),
      repositoriesContributedTo: totalCount,
      starredRepositories: totalCount,
      contributionsCollection: z.object({
        totalIssueContributions: z.number(),
        totalPullRequestContributions: z.number(),
        totalPullRequestReviewContributions: z.number(),
      }),
    })
    .nullable(),
});

export const fetchUserProfile = async (client: GithubClient, login: string): Promise<UserProfile> => {
  const { user } = await client.query(USER_QUERY, { login }, userSchema);
  if (!user) {
    throw new Error(`GitHub user '${login}' not found or not accessible with this token.`);
  }

  const publicRepos = user.publicRepositories.nodes;
  return {
    login: user.login,
    name: user.name || user.login,
    bio: user.bio ?? "",
    company: user.company ?? "",
    location: user.location ?? "",
    email: user.email ?? "",
    website: user.websiteUrl ?? "",
    twitter: user.twitterUsername ?? "",
    createdAt: user.createdAt,
    followers: user.followers.totalCount,
    following: user.following.totalCount,
    ownedRepositories: user.ownedRepositories.totalCount,
    contributedRepositories: user.repositoriesContributedTo.totalCount,
    starredRepositories: user.starredRepositories.totalCount,
    publicRepositories: publicRepos.filter((repo) => !repo.isFork).length,
    totalStars: publicRepos.reduce((sum, repo) => sum + repo.stargazerCount, 0),
    totalForks: publicRepos.reduce((sum, repo) => sum + repo.forkCount, 0),
    totalIssues: user.contributionsCollection.totalIssueContributions,
    totalPullRequests: user.contributionsCollection.totalPullRequestContributions,
    totalReviews: user.contributionsCollection.totalPullRequestReviewContributions,
  };
};

const CONTRIBUTIONS_QUERY = `
  query($login: String!, $from: DateTime!, $to: DateTime!) {
    user(login: $login) {
      contributionsCollection(from: $from, to: $to) {
        commitContributionsByRepository(maxRepositories: 100) {
          repository {
            nameWithOwner
            isFork
            isPrivate
            primaryLanguage { name color }
            languages(first: 15, orderBy: { field: SIZE, direction: DESC }) {
              edges { size node { name color } }
            }
          }
          contributions(first: 100) {
            nodes { commitCount }
          }
        }
      }
    }
  }
`;

const contributionsSchema = z.object({
  user: z
    .object({
      contributionsCollection: z.object({
        commitContributionsByRepository: z.array(
          z.object({
            repository: z.object({
              nameWithOwner: z.string(),
              isFork: z.boolean(),
              isPrivate: z.boolean(),
              primaryLanguage: languageNode.nullable(),
              languages: z
                .object({
                  edges: z.array(z.object({ size: z.number(), node: languageNode })).nullable(),
                })
                .nullable(),
            }),
            contributions: z.object({
              nodes: z.array(z.object({ commitCount: z.number() }).nullable()).nullable(),
            }),
          })
        ),
      }),
    })
    .nullable(),
});

export const fetchYearRecords = async (
  client: GithubClient,
  login: string,
  slice: YearSlice
): Promise<ContributionRecord[]> => {
  const { user } = await client.query(
    CONTRIBUTIONS_QUERY,
    { login, from: slice.from, to: slice.to },
    contributionsSchema
  );
  if (!user) {
    throw new Error(`No user data returned for ${slice.year}.`);
  }

  return user.contributionsCollection.commitContributionsByRepository.map(({ repository, contributions }) => ({
    repository: repository.nameWithOwner,
    isFork: repository.isFork,
    isPrivate: repository.isPrivate,
    primaryLanguage: repository.primaryLanguage,
    languages: (repository.languages?.edges ?? []).map((edge) => ({
      name: edge.node.name,
      color: edge.node.color,
      bytes: edge.size,
    })),
    commitCount: (contributions.nodes ?? []).reduce((sum, node) => sum + (node?.commitCount ?? 0), 0),
  }));
};

const HISTORY_QUERY = `
  query($owner: String!, $name: String!, $since: GitTimestamp!, $until: GitTimestamp!) {
    repository(owner: $owner, name: $name) {
      defaultBranchRef {
        target {
          ... on Commit {
            history(first: 100, since: $since, until: $until) {
              nodes {
                additions
                deletions
                author { user { login } }
              }
            }
          }
        }
      }
    }
  }
`;

const historySchema = z.object({
  repository: z
    .object({
      defaultBranchRef: z
        .object({
          target: z
            .object({
              history: z
                .object({
                  nodes: z.array(
                    z.object({
                      additions: z.number().nullable(),
                      deletions: z.number().nullable(),
                      author: z.object({ user: z.object({ login: z.string() }).nullable() }).nullable(),
                    })
                  ),
                })
                .optional(),
            })
            .nullable(),
        })
        .nullable(),
    })
    .nullable(),
});

/**
 * Per-commit line deltas on the default branch within the slice, restricted to commits
 * whose author resolves to `login` (case-insensitive). Unlinked authors are dropped.
 */
export const fetchCommitDeltas = async (
  client: GithubClient,
  repository: string,
  login: string,
  slice: YearSlice
): Promise<CommitDelta[]> => {
  const [owner, name] = repository.split("/");
  if (!owner || !name) {
    throw new Error(`Invalid repository name '${repository}'.`);
  }

  const data = await client.query(
    HISTORY_QUERY,
    { owner, name, since: slice.from, until: slice.to },
    historySchema
  );
  const nodes = data.repository?.defaultBranchRef?.target?.history?.nodes ?? [];
  const target = login.toLowerCase();

  return nodes
    .filter((commit) => commit.author?.user?.login.toLowerCase() === target)
    .map((commit) => ({
      additions: commit.additions ?? 0,
      deletions: commit.deletions ?? 0,
    }));
};
