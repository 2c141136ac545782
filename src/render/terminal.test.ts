import assert from "node:assert/strict";
import { test } from "node:test";
import { aggregate } from "../aggregate";
import { visibleWidth } from "../text";
import { makeBundle, makeProfile, makeRecord } from "../testing";
import { getRenderer } from "./index";
import { BOX_INNER_COLUMNS, boxBottom, boxLine, boxTop, renderTerminal } from "./terminal";

const BOX_WIDTH = BOX_INNER_COLUMNS + 2;

test("box lines are always the same width", () => {
  assert.equal(visibleWidth(boxLine("")), BOX_WIDTH);
  assert.equal(visibleWidth(boxLine("  short")), BOX_WIDTH);
  assert.equal(visibleWidth(boxLine(`  ${"very long ".repeat(20)}`)), BOX_WIDTH);
  assert.equal(visibleWidth(boxTop("GitHub Stats")), BOX_WIDTH);
  assert.equal(visibleWidth(boxBottom()), BOX_WIDTH);
  assert.ok(boxTop("GitHub Stats").startsWith("┌─ GitHub Stats ─"));
});

test("a wide character at the edge leaves the box one column of padding", () => {
  const line = boxLine(`  ${"漢".repeat(40)}`);

  assert.ok(line.endsWith("... │"));
  assert.equal(visibleWidth(line), BOX_WIDTH);
});

test("renderTerminal prints the prompt and the language analysis", () => {
  const analysis = aggregate([
    makeBundle(2023, [makeRecord({ commitCount: 3, commits: [{ additions: 10, deletions: 4 }] })]),
  ]);
  const svg = renderTerminal({
    analysis,
    profile: makeProfile(),
    theme: "light",
    fields: [],
    generatedAt: new Date("2024-05-10T12:00:00Z"),
  });

  assert.ok(svg.includes("octo@github:~$ # Generated on 2024-05-10 12:00:00 UTC"));
  assert.ok(svg.includes("Octo Cat (@octo) - Joined 2020"));
  assert.ok(svg.includes("● TypeScript: 100.0%, 3 commits, +10/-4"));
  assert.ok(svg.includes("Net Change: +6 lines"));
});

test("renderTerminal leaves out code statistics without line counts", () => {
  const analysis = aggregate([makeBundle(2023, [makeRecord()])]);
  const svg = getRenderer("terminal")({
    analysis,
    profile: makeProfile(),
    theme: "dark",
    fields: [],
    generatedAt: new Date("2024-05-10T12:00:00Z"),
  });

  assert.equal(svg.includes("Code Statistics"), false);
  assert.ok(svg.includes("Commits: 10"));
});
