import { readFile } from "node:fs/promises";

import type { Problem } from "../contracts/problem";

export type ProblemSet = {
  problems: Problem[];
  // Present when the file carries an `answer` column (reference sets).
  referenceAnswers: Map<string, number>;
};

export class ProblemSourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProblemSourceError";
  }
}

/** RFC 4180 rows: quoted cells may hold commas, doubled quotes and newlines. */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = "";
  let inQuotes = false;
  let sawAny = false;

  const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  for (let i = 0; i < source.length; i++) {
    const ch = source[i];
    sawAny = true;

    if (inQuotes) {
      if (ch === '"') {
        if (source[i + 1] === '"') {
          cell += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        cell += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      continue;
    }
    if (ch === ",") {
      row.push(cell);
      cell = "";
      continue;
    }
    if (ch === "\r" && source[i + 1] === "\n") {
      continue;
    }
    if (ch === "\n" || ch === "\r") {
      row.push(cell);
      rows.push(row);
      row = [];
      cell = "";
      sawAny = false;
      continue;
    }
    cell += ch;
  }

  if (inQuotes) {
    throw new ProblemSourceError("unterminated quoted cell");
  }
  if (sawAny || row.length > 0) {
    row.push(cell);
    rows.push(row);
  }
  return rows;
}

export function parseProblemsCsv(text: string): ProblemSet {
  const rows = parseCsv(text).filter((row) => !(row.length === 1 && row[0] === ""));
  const header = rows.shift();
  if (!header) {
    throw new ProblemSourceError("problem file is empty");
  }

  const columns = header.map((name) => name.trim());
  const idIdx = columns.indexOf("id");
  const problemIdx = columns.indexOf("problem");
  const answerIdx = columns.indexOf("answer");
  if (idIdx === -1 || problemIdx === -1) {
    throw new ProblemSourceError(`problem file header must contain id,problem (got ${columns.join(",")})`);
  }

  const problems: Problem[] = [];
  const referenceAnswers = new Map<string, number>();
  const seen = new Set<string>();

  rows.forEach((row, index) => {
    const line = index + 2;
    if (row.length !== columns.length) {
      throw new ProblemSourceError(
        `row ${line} has ${row.length} cells, header has ${columns.length}`
      );
    }
    const id = row[idIdx].trim();
    if (!id) {
      throw new ProblemSourceError(`row ${line} has an empty id`);
    }
    if (seen.has(id)) {
      throw new ProblemSourceError(`duplicate problem id "${id}" at row ${line}`);
    }
    seen.add(id);
    problems.push({ id, statement: row[problemIdx] });

    if (answerIdx !== -1) {
      const rawAnswer = row[answerIdx].trim();
      if (rawAnswer !== "") {
        const answer = Number(rawAnswer);
        if (!Number.isInteger(answer)) {
          throw new ProblemSourceError(`row ${line} has a non-integer answer "${rawAnswer}"`);
        }
        referenceAnswers.set(id, answer);
      }
    }
  });

  return { problems, referenceAnswers };
}

export async function loadProblems(path: string): Promise<ProblemSet> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ProblemSourceError(
      `cannot read problem file ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseProblemsCsv(text);
}
