/**
 * schema-applier.ts — Idempotent schema application
 *
 * ULS Callbook — FCC amateur license registry importer
 *
 * sql/schema.sql is applied on every run, statement by statement. Statements
 * must each be safe to re-run; this module only splits, executes in order and
 * stops at the first failure.
 *
 * Splitting is naive: a `;` inside a string literal or function body ends the
 * statement. Keep definitions single-expression.
 */

import { readFile } from "node:fs/promises";
import type { Database } from "../db.js";
import { ImportError, ImportErrorCode, describeError } from "../errors.js";
import { log } from "../logger.js";

const PREVIEW_LENGTH = 200;

/** Strip full-line `--` comments and leading block comments from one segment. */
function stripComments(segment: string): string {
  let text = segment
    .split("\n")
    .filter((line) => !line.trim().startsWith("--"))
    .join("\n")
    .trim();

  while (text.startsWith("/*")) {
    const end = text.indexOf("*/");
    if (end < 0) return "";
    text = text.slice(end + 2).trim();
  }
  return text;
}

/** Split a schema script into executable statements. */
export function splitSqlStatements(sql: string): string[] {
  const body = sql.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n");
  const statements: string[] = [];
  for (const segment of body.split(";")) {
    const statement = stripComments(segment);
    if (statement.length > 0) statements.push(statement);
  }
  return statements;
}

/** Collapse whitespace and cut to a single diagnostic line. */
export function previewStatement(statement: string, max = PREVIEW_LENGTH): string {
  const oneLine = statement.replace(/\s+/g, " ").trim();
  return oneLine.length > max ? `${oneLine.slice(0, max)}...` : oneLine;
}

export async function loadSchemaFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (err) {
    throw new ImportError(ImportErrorCode.SCHEMA_FAILED, `cannot read schema: ${describeError(err)}`, {
      detail: path,
      cause: err,
    });
  }
}

export async function applySchema(db: Database, sql: string): Promise<{ statements: number }> {
  const statements = splitSqlStatements(sql);
  log.db.info({ statements: statements.length }, "applying schema");

  for (const [i, statement] of statements.entries()) {
    try {
      await db.query(statement);
    } catch (err) {
      throw new ImportError(
        ImportErrorCode.SCHEMA_FAILED,
        `schema failed at statement ${i + 1}/${statements.length}: ${describeError(err)}`,
        { detail: previewStatement(statement), cause: err },
      );
    }
  }

  log.db.info({ statements: statements.length }, "schema applied");
  return { statements: statements.length };
}
