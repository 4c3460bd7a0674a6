import { randomBytes } from "node:crypto";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { ANSWER_MAX, ANSWER_MIN } from "../contracts/endpoints";
import type { Problem, ResultRow } from "../contracts/problem";

export const RESULT_HEADER = "id,answer";

export class ResultSetError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`result set invalid: ${issues.join("; ")}`);
    this.name = "ResultSetError";
    this.issues = issues;
  }
}

const escapeCell = (value: string) =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

export function formatResultCsv(rows: readonly ResultRow[]): string {
  const lines = [RESULT_HEADER, ...rows.map((row) => `${escapeCell(row.id)},${row.answer}`)];
  return `${lines.join("\n")}\n`;
}

/**
 * Checks that `rows` has exactly one in-range integer answer per problem, in
 * problem order. Returns the issues found; empty means valid.
 */
export function validateResultSet(rows: readonly ResultRow[], problems: readonly Problem[]): string[] {
  const issues: string[] = [];

  if (rows.length !== problems.length) {
    issues.push(`expected ${problems.length} rows, got ${rows.length}`);
  }

  const seen = new Set<string>();
  for (const row of rows) {
    if (seen.has(row.id)) {
      issues.push(`duplicate id "${row.id}"`);
    }
    seen.add(row.id);
    if (!Number.isInteger(row.answer)) {
      issues.push(`answer for "${row.id}" is not an integer`);
    } else if (row.answer < ANSWER_MIN || row.answer > ANSWER_MAX) {
      issues.push(`answer for "${row.id}" is outside [${ANSWER_MIN}, ${ANSWER_MAX}]`);
    }
  }

  for (const problem of problems) {
    if (!seen.has(problem.id)) {
      issues.push(`missing id "${problem.id}"`);
    }
  }

  if (issues.length === 0) {
    const outOfOrder = problems.findIndex((problem, index) => rows[index]?.id !== problem.id);
    if (outOfOrder !== -1) {
      issues.push(`row ${outOfOrder + 1} is not in problem order`);
    }
  }

  return issues;
}

/** Writes through a temp file and rename so a reader never sees a partial file. */
export async function writeResultSet(path: string, rows: readonly ResultRow[]): Promise<void> {
  const tmp = `${path}.tmp.${randomBytes(4).toString("hex")}`;
  await mkdir(dirname(path), { recursive: true });
  try {
    await writeFile(tmp, formatResultCsv(rows), "utf8");
    await rename(tmp, path);
  } catch (error) {
    await rm(tmp, { force: true });
    throw error;
  }
}
