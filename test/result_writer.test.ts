import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { Problem } from "../src/contracts/problem";
import {
  formatResultCsv,
  validateResultSet,
  writeResultSet,
} from "../src/gateway/result_writer";

const problems: Problem[] = [
  { id: "p1", statement: "a" },
  { id: "p2", statement: "b" },
  { id: "p3", statement: "c" },
];

describe("formatResultCsv", () => {
  it("writes the header and one line per row", () => {
    expect(formatResultCsv([{ id: "p1", answer: 4 }, { id: "p2", answer: 0 }])).toBe(
      "id,answer\np1,4\np2,0\n"
    );
  });

  it("quotes ids that need it", () => {
    expect(formatResultCsv([{ id: 'a,"b"', answer: 1 }])).toBe('id,answer\n"a,""b""",1\n');
  });
});

describe("validateResultSet", () => {
  it("accepts one in-range answer per problem in problem order", () => {
    const rows = [
      { id: "p1", answer: 0 },
      { id: "p2", answer: 99999 },
      { id: "p3", answer: 7 },
    ];
    expect(validateResultSet(rows, problems)).toEqual([]);
  });

  it("reports missing and duplicate ids", () => {
    const rows = [
      { id: "p1", answer: 1 },
      { id: "p1", answer: 2 },
    ];
    expect(validateResultSet(rows, problems)).toEqual([
      "expected 3 rows, got 2",
      'duplicate id "p1"',
      'missing id "p2"',
      'missing id "p3"',
    ]);
  });

  it("reports out-of-range and non-integer answers", () => {
    const rows = [
      { id: "p1", answer: -1 },
      { id: "p2", answer: 100000 },
      { id: "p3", answer: 2.5 },
    ];
    expect(validateResultSet(rows, problems)).toEqual([
      'answer for "p1" is outside [0, 99999]',
      'answer for "p2" is outside [0, 99999]',
      'answer for "p3" is not an integer',
    ]);
  });

  it("reports rows out of problem order", () => {
    const rows = [
      { id: "p2", answer: 1 },
      { id: "p1", answer: 1 },
      { id: "p3", answer: 1 },
    ];
    expect(validateResultSet(rows, problems)).toEqual(["row 1 is not in problem order"]);
  });
});

describe("writeResultSet", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "results-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates parent directories and leaves no temp file behind", async () => {
    const path = join(dir, "out", "submission.csv");
    await writeResultSet(path, [{ id: "p1", answer: 12 }]);

    expect(await readFile(path, "utf8")).toBe("id,answer\np1,12\n");
    expect(await readdir(join(dir, "out"))).toEqual(["submission.csv"]);
  });

  it("replaces an existing file", async () => {
    const path = join(dir, "submission.csv");
    await writeResultSet(path, [{ id: "p1", answer: 1 }]);
    await writeResultSet(path, [{ id: "p1", answer: 2 }]);
    expect(await readFile(path, "utf8")).toBe("id,answer\np1,2\n");
  });
});
