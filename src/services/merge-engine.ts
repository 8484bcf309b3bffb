/**
 * merge-engine.ts — Staging → final table upserts
 *
 * ULS Callbook — FCC amateur license registry importer
 *
 * Each final table has a declarative plan: its staging source, natural key and
 * a cleaning rule per column. `buildMergeSql()` turns a plan into a single
 * INSERT … SELECT DISTINCT ON … ON CONFLICT statement:
 *
 *   - rows whose key is not an integer are dropped
 *   - within one load, the highest load_seq per key wins (last line in the file)
 *   - across loads, every mutable column takes the incoming value
 */

import type { Database } from "../db.js";
import { asImportError, ImportErrorCode } from "../errors.js";
import { log } from "../logger.js";
import { SOURCE_KINDS, type SourceKind } from "./staged-loader.js";

// ─── Plans ──────────────────────────────────────────────────────

export type ColumnRule =
  | { kind: "text"; width?: number }
  | { kind: "date" };

export interface MergeColumn {
  name: string;
  /** Staging column; defaults to `name` */
  source?: string;
  rule: ColumnRule;
}

export interface MergePlan {
  kind: SourceKind;
  targetTable: string;
  stagingTable: string;
  naturalKey: string;
  columns: readonly MergeColumn[];
}

const text = (width?: number): ColumnRule => ({ kind: "text", width });
const date: ColumnRule = { kind: "date" };

export const MERGE_PLANS: Readonly<Record<SourceKind, MergePlan>> = {
  hd: {
    kind: "hd",
    targetTable: "hd",
    stagingTable: "stg_hd",
    naturalKey: "unique_system_identifier",
    columns: [
      { name: "record_type", rule: text(2) },
      { name: "call_sign", rule: text(10) },
      { name: "license_status", rule: text(1) },
      { name: "grant_date", rule: date },
      { name: "expired_date", rule: date },
      { name: "last_action_date", rule: date },
    ],
  },
  en: {
    kind: "en",
    targetTable: "en",
    stagingTable: "stg_en",
    naturalKey: "unique_system_identifier",
    columns: [
      { name: "record_type", rule: text(2) },
      { name: "call_sign", rule: text(10) },
      { name: "entity_name", rule: text(200) },
      { name: "first_name", rule: text(40) },
      { name: "last_name", rule: text(40) },
      { name: "street_address", rule: text(80) },
      { name: "city", rule: text(40) },
      { name: "state", rule: text(2) },
      { name: "zip_code", rule: text(10) },
    ],
  },
  am: {
    kind: "am",
    targetTable: "am",
    stagingTable: "stg_am",
    naturalKey: "unique_system_identifier",
    columns: [
      { name: "call_sign", rule: text(10) },
      { name: "operator_class", rule: text(1) },
    ],
  },
};

// ─── SQL generation ─────────────────────────────────────────────

export function cleanExpression(column: MergeColumn): string {
  const source = column.source ?? column.name;
  switch (column.rule.kind) {
    case "date":
      return `uls_parse_date(${source})`;
    case "text": {
      const trimmed = `BTRIM(${source})`;
      const cut = column.rule.width === undefined ? trimmed : `LEFT(${trimmed}, ${column.rule.width})`;
      return `NULLIF(${cut}, '')`;
    }
  }
}

export function buildMergeSql(plan: MergePlan): string {
  const key = plan.naturalKey;
  const targetColumns = [key, ...plan.columns.map((c) => c.name)];
  const selectList = [
    `BTRIM(${key})::bigint AS ${key}`,
    ...plan.columns.map((c) => `${cleanExpression(c)} AS ${c.name}`),
  ];
  const updates = plan.columns.map((c) => `${c.name} = EXCLUDED.${c.name}`);

  return [
    `INSERT INTO ${plan.targetTable} (${targetColumns.join(", ")})`,
    `SELECT DISTINCT ON (BTRIM(${key})::bigint)`,
    `  ${selectList.join(",\n  ")}`,
    `FROM ${plan.stagingTable}`,
    `WHERE ${key} ~ '^\\s*[0-9]+\\s*$'`,
    `ORDER BY BTRIM(${key})::bigint, load_seq DESC`,
    `ON CONFLICT (${key}) DO UPDATE SET`,
    `  ${updates.join(",\n  ")}`,
  ].join("\n");
}

// ─── Execution ──────────────────────────────────────────────────

export async function mergePlan(db: Database, plan: MergePlan): Promise<number> {
  try {
    const result = await db.query(buildMergeSql(plan));
    const rows = result.rowCount ?? 0;
    log.db.info({ table: plan.targetTable, rows }, "merge complete");
    return rows;
  } catch (err) {
    throw asImportError(err, ImportErrorCode.MERGE_FAILED, `merge into ${plan.targetTable} failed`, plan.targetTable);
  }
}

/** Merge every staging table into its final table. Resolves to upserted row counts. */
export async function mergeAll(db: Database): Promise<Record<SourceKind, number>> {
  log.db.info("merging staging into final tables");
  const counts: Record<SourceKind, number> = { hd: 0, en: 0, am: 0 };
  for (const kind of SOURCE_KINDS) {
    counts[kind] = await mergePlan(db, MERGE_PLANS[kind]);
  }
  return counts;
}
