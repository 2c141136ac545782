import assert from "node:assert/strict";
import { test } from "node:test";
import { run } from "./run";
import {
  type FakeReply,
  type RecordedRequest,
  contributionsResponse,
  createFakeFetch,
  historyResponse,
  isContributionsQuery,
  isHistoryQuery,
  noSleep,
  silentLogger,
  userResponse,
} from "./testing";

const NOW = new Date("2024-05-10T12:00:00Z");
const ARGS = ["octo", "--from-date", "2021-01-01", "--to-date", "2023-12-31"];

const githubStub = (request: RecordedRequest): FakeReply => {
  if (isHistoryQuery(request)) {
    return { body: historyResponse([{ login: "octo", additions: 20, deletions: 5 }]) };
  }
  if (isContributionsQuery(request)) {
    if (String(request.variables.from).startsWith("2022")) {
      return { status: 502, body: "Bad gateway" };
    }
    return {
      body: contributionsResponse([{ name: "octo/app", commits: 6, languages: [{ name: "TypeScript", size: 100 }] }]),
    };
  }
  return { body: userResponse() };
};

const setup = (reply: (request: RecordedRequest) => FakeReply = githubStub) => {
  const files = new Map<string, string>();
  const fake = createFakeFetch(reply);
  const output = silentLogger();
  const deps = {
    env: { GITHUB_TOKEN: "test-secret" },
    now: () => NOW,
    fetch: fake.fetch,
    sleep: noSleep,
    writeFile: async (path: string, data: string) => {
      files.set(path, data);
    },
    log: output.logger,
  };
  return { files, fake, lines: output.lines, deps };
};

test("run writes both cards and the JSON even when a year fails", async () => {
  const { files, lines, deps } = setup();

  const code = await run([...ARGS, "--json", "stats.json"], deps);

  assert.equal(code, 0);
  assert.deepEqual([...files.keys()].sort(), ["profile_dark.svg", "profile_light.svg", "stats.json"]);
  const stats = JSON.parse(files.get("stats.json") ?? "{}");
  assert.equal(stats.summary.commits, 12);
  assert.equal(stats.summary.additions, 40);
  assert.deepEqual(stats.summary.failedSlices, [2022]);
  assert.equal(stats.languages[0].name, "TypeScript");
  assert.equal(stats.languages[0].percentage, 100);
  assert.ok(files.get("profile_dark.svg")?.startsWith('<?xml version="1.0" encoding="UTF-8"?>'));
  assert.ok(lines.includes("  ⚠  Finished with 1 missing year(s): 2022"));
});

test("run renders one theme with the terminal style", async () => {
  const { files, deps } = setup();

  const code = await run([...ARGS, "--style", "terminal", "--theme", "dark", "--output-dark", "card.svg"], deps);

  assert.equal(code, 0);
  assert.deepEqual([...files.keys()], ["card.svg"]);
  assert.ok(files.get("card.svg")?.includes("octo@github:~$ # Generated on 2024-05-10 12:00:00 UTC"));
});

test("run fails without a token and sends nothing", async () => {
  const { fake, files, lines, deps } = setup();

  const code = await run(ARGS, { ...deps, env: {} });

  assert.equal(code, 1);
  assert.equal(fake.requests.length, 0);
  assert.equal(files.size, 0);
  assert.ok(lines.includes("  ✗  Error: token: GitHub token required. Use --token or set GITHUB_TOKEN."));
});

test("run fails on a malformed date", async () => {
  const { lines, deps } = setup();

  const code = await run(["octo", "--from-date", "2023/01/01"], deps);

  assert.equal(code, 1);
  assert.ok(lines.includes("  ✗  Error: Invalid from-date format. Use YYYY-MM-DD."));
});

test("run fails when the user cannot be resolved", async () => {
  const { files, lines, deps } = setup(() => ({ body: { data: { user: null } } }));

  const code = await run(ARGS, deps);

  assert.equal(code, 1);
  assert.equal(files.size, 0);
  assert.ok(lines.includes("  ✗  Error: GitHub user 'octo' not found or not accessible with this token."));
});

test("run exits cleanly after printing help", async () => {
  const { fake, files, lines, deps } = setup();

  const code = await run(["--help"], { ...deps, env: {} });

  assert.equal(code, 0);
  assert.equal(fake.requests.length, 0);
  assert.equal(files.size, 0);
  assert.equal(lines.some((line) => line.includes("Error")), false);
});
