import assert from "node:assert/strict";
import { test } from "node:test";
import { createGithubClient, fetchCommitDeltas, fetchUserProfile, fetchYearRecords } from "./github";
import {
  contributionsResponse,
  createFakeFetch,
  historyResponse,
  noSleep,
  userResponse,
} from "./testing";

const slice = { year: 2023, from: "2023-01-01T00:00:00Z", to: "2023-12-31T23:59:59Z" };

test("requests carry the token and wait for the throttle first", async () => {
  const waits: number[] = [];
  const fake = createFakeFetch(() => ({ body: userResponse() }));
  const client = createGithubClient({
    token: "test-secret",
    endpoint: "http://graphql.test/graphql",
    requestDelayMs: 75,
    fetch: fake.fetch,
    sleep: async (ms) => {
      waits.push(ms);
    },
  });

  await fetchUserProfile(client, "octo");

  assert.deepEqual(waits, [75]);
  assert.equal(fake.requests[0]?.url, "http://graphql.test/graphql");
  assert.equal(fake.requests[0]?.headers.authorization, "bearer test-secret");
  assert.deepEqual(fake.requests[0]?.variables, { login: "octo" });
});

test("fetchUserProfile maps the user and sums public repository stats", async () => {
  const fake = createFakeFetch(() => ({ body: userResponse() }));
  const client = createGithubClient({ token: "test-secret", fetch: fake.fetch, sleep: noSleep });

  const profile = await fetchUserProfile(client, "octo");

  assert.equal(profile.name, "Octo Cat");
  assert.equal(profile.email, "");
  assert.equal(profile.website, "https://example.com");
  assert.equal(profile.totalStars, 42);
  assert.equal(profile.totalForks, 7);
  assert.equal(profile.publicRepositories, 2);
  assert.equal(profile.totalPullRequests, 9);
});

test("fetchUserProfile rejects an unknown user", async () => {
  const fake = createFakeFetch(() => ({ body: { data: { user: null } } }));
  const client = createGithubClient({ token: "test-secret", fetch: fake.fetch, sleep: noSleep });

  await assert.rejects(fetchUserProfile(client, "ghost"), {
    message: "GitHub user 'ghost' not found or not accessible with this token.",
  });
});

test("fetchYearRecords builds one record per repository", async () => {
  const fake = createFakeFetch(() => ({
    body: contributionsResponse([
      {
        name: "octo/app",
        commits: 12,
        languages: [
          { name: "TypeScript", size: 900 },
          { name: "CSS", size: 100 },
        ],
      },
      { name: "octo/empty", commits: 1 },
    ]),
  }));
  const client = createGithubClient({ token: "test-secret", fetch: fake.fetch, sleep: noSleep });

  const records = await fetchYearRecords(client, "octo", slice);

  assert.deepEqual(fake.requests[0]?.variables, { login: "octo", from: slice.from, to: slice.to });
  assert.deepEqual(records[0], {
    repository: "octo/app",
    isFork: false,
    isPrivate: false,
    primaryLanguage: { name: "TypeScript", color: null },
    languages: [
      { name: "TypeScript", color: null, bytes: 900 },
      { name: "CSS", color: null, bytes: 100 },
    ],
    commitCount: 12,
  });
  assert.equal(records[1]?.primaryLanguage, null);
  assert.deepEqual(records[1]?.languages, []);
});

test("fetchCommitDeltas keeps only the user's own commits", async () => {
  const fake = createFakeFetch(() => ({
    body: historyResponse([
      { login: "Octo", additions: 10, deletions: 2 },
      { login: "someone-else", additions: 500, deletions: 500 },
      { login: null, additions: 7, deletions: 7 },
      { login: "octo", additions: 3, deletions: 0 },
    ]),
  }));
  const client = createGithubClient({ token: "test-secret", fetch: fake.fetch, sleep: noSleep });

  const deltas = await fetchCommitDeltas(client, "octo/app", "octo", slice);

  assert.deepEqual(deltas, [
    { additions: 10, deletions: 2 },
    { additions: 3, deletions: 0 },
  ]);
  assert.deepEqual(fake.requests[0]?.variables, { owner: "octo", name: "app", since: slice.from, until: slice.to });
});

test("fetchCommitDeltas treats a missing default branch as no commits", async () => {
  const fake = createFakeFetch(() => ({ body: { data: { repository: { defaultBranchRef: null } } } }));
  const client = createGithubClient({ token: "test-secret", fetch: fake.fetch, sleep: noSleep });

  assert.deepEqual(await fetchCommitDeltas(client, "octo/app", "octo", slice), []);
});

test("transport failures reject with a readable message", async () => {
  const cases: Array<{ reply: { status?: number; body: unknown }; message: string }> = [
    { reply: { status: 502, body: "Bad gateway" }, message: "GitHub API returned 502. Bad gateway" },
    { reply: { body: { errors: [{ message: "boom" }] } }, message: "GraphQL errors: boom" },
    { reply: { body: { data: { user: { login: 7 } } } }, message: "Unexpected response shape at user.login." },
    { reply: { body: [] }, message: "GitHub API returned a malformed response." },
  ];

  for (const { reply, message } of cases) {
    const fake = createFakeFetch(() => reply);
    const client = createGithubClient({ token: "test-secret", fetch: fake.fetch, sleep: noSleep });
    await assert.rejects(fetchUserProfile(client, "octo"), { message });
  }
});

test("the request timeout also covers reading the body", async () => {
  let aborted = false;
  const stalledFetch = async (_url: string, init: RequestInit) => {
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('{"data":'));
        init.signal?.addEventListener("abort", () => {
          aborted = true;
          controller.error(new Error("body read aborted"));
        });
      },
    });
    return new Response(stream, { status: 200 });
  };
  const client = createGithubClient({ token: "test-secret", timeoutMs: 20, fetch: stalledFetch, sleep: noSleep });

  await assert.rejects(fetchUserProfile(client, "octo"));
  assert.equal(aborted, true);
});
