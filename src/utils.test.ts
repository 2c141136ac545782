import assert from "node:assert/strict";
import { test } from "node:test";
import {
  formatCount,
  formatSigned,
  getEnvNumber,
  isValidISODate,
  isValidUsername,
  resolveWindow,
  splitIntoYearSlices,
} from "./utils";

test("splitIntoYearSlices cuts the window at calendar year boundaries", () => {
  const slices = splitIntoYearSlices("2021-06-01T00:00:00Z", "2023-03-15T23:59:59Z");

  assert.deepEqual(slices, [
    { year: 2021, from: "2021-06-01T00:00:00Z", to: "2021-12-31T23:59:59Z" },
    { year: 2022, from: "2022-01-01T00:00:00Z", to: "2022-12-31T23:59:59Z" },
    { year: 2023, from: "2023-01-01T00:00:00Z", to: "2023-03-15T23:59:59Z" },
  ]);
});

test("splitIntoYearSlices returns one slice for a window inside a single year", () => {
  const slices = splitIntoYearSlices("2024-02-01T00:00:00Z", "2024-02-01T00:00:00Z");

  assert.deepEqual(slices, [{ year: 2024, from: "2024-02-01T00:00:00Z", to: "2024-02-01T00:00:00Z" }]);
});

test("splitIntoYearSlices rejects a reversed window", () => {
  assert.throws(
    () => splitIntoYearSlices("2024-02-01T00:00:00Z", "2023-02-01T00:00:00Z"),
    /must not be before/
  );
});

test("resolveWindow derives the start from yearsBack when no dates are given", () => {
  const window = resolveWindow({ yearsBack: 1, now: new Date("2024-05-10T12:34:56.789Z") });

  assert.deepEqual(window, { from: "2023-05-11T12:34:56Z", to: "2024-05-10T12:34:56Z" });
});

test("resolveWindow covers whole days for explicit dates", () => {
  const window = resolveWindow({
    fromDate: "2022-03-01",
    toDate: "2022-03-31",
    yearsBack: 5,
    now: new Date("2024-01-01T00:00:00Z"),
  });

  assert.deepEqual(window, { from: "2022-03-01T00:00:00Z", to: "2022-03-31T23:59:59Z" });
});

test("resolveWindow rejects malformed and reversed dates", () => {
  const now = new Date("2024-01-01T00:00:00Z");
  assert.throws(() => resolveWindow({ fromDate: "2023-02-30", yearsBack: 1, now }), {
    message: "Invalid from-date format. Use YYYY-MM-DD.",
  });
  assert.throws(() => resolveWindow({ toDate: "03/01/2023", yearsBack: 1, now }), {
    message: "Invalid to-date format. Use YYYY-MM-DD.",
  });
  assert.throws(() => resolveWindow({ fromDate: "2023-05-01", toDate: "2023-04-01", yearsBack: 1, now }), {
    message: "The 'to' date must not be before 'from'.",
  });
});

test("validators accept GitHub logins and calendar dates only", () => {
  assert.equal(isValidUsername("octo-cat"), true);
  assert.equal(isValidUsername("-octo"), false);
  assert.equal(isValidUsername(""), false);
  assert.equal(isValidISODate("2024-02-29"), true);
  assert.equal(isValidISODate("2023-02-29"), false);
});

test("number helpers", () => {
  assert.equal(formatCount(1234.9), "1,234");
  assert.equal(formatSigned(-1500), "-1,500");
  assert.equal(formatSigned(0), "+0");
  assert.equal(getEnvNumber("250", 200), 250);
  assert.equal(getEnvNumber("soon", 200), 200);
  assert.equal(getEnvNumber(undefined, 200), 200);
});
