/**
 * verification.ts — Post-merge diagnostics
 *
 * ULS Callbook — FCC amateur license registry importer
 *
 * Advisory only: counts are logged for operators and returned to the
 * coordinator, which never fails a run on their values.
 */

import type { Database } from "../db.js";
import { asImportError, ImportErrorCode } from "../errors.js";
import { log } from "../logger.js";

export interface ClassCount {
  operatorClass: string | null;
  rows: number;
}

export interface Diagnostics {
  tableCounts: Record<"hd" | "en" | "am", number>;
  operatorClasses: ClassCount[];
  view: {
    totalRows: number;
    clubRows: number;
    nullNameRows: number;
  };
}

export interface DiagnosticsOptions {
  /** How many operator classes to report (default 10) */
  topClasses?: number;
}

type CountRow = { n: string | number };
type ClassRow = { operator_class: string | null; n: string | number };
type ViewRow = { total_rows: string | number; club_rows: string | number; null_name_rows: string | number };

/** pg returns COUNT(*) as a string (bigint). */
function toCount(value: string | number | undefined): number {
  if (value === undefined) return 0;
  const n = typeof value === "number" ? value : Number.parseInt(value, 10);
  return Number.isFinite(n) ? n : 0;
}

export async function collectDiagnostics(db: Database, options: DiagnosticsOptions = {}): Promise<Diagnostics> {
  const topClasses = options.topClasses ?? 10;

  try {
    const tableCounts = { hd: 0, en: 0, am: 0 };
    for (const table of ["hd", "en", "am"] as const) {
      const result = await db.query<CountRow>(`SELECT COUNT(*) AS n FROM ${table}`);
      tableCounts[table] = toCount(result.rows[0]?.n);
    }

    const classes = await db.query<ClassRow>(
      `SELECT operator_class, COUNT(*) AS n FROM am
       GROUP BY operator_class ORDER BY n DESC, operator_class NULLS LAST LIMIT $1`,
      [topClasses],
    );
    const operatorClasses = classes.rows.map((row) => ({
      operatorClass: row.operator_class,
      rows: toCount(row.n),
    }));

    const viewResult = await db.query<ViewRow>(
      `SELECT COUNT(*) AS total_rows,
              COUNT(*) FILTER (WHERE operator_class_name = 'Club') AS club_rows,
              COUNT(*) FILTER (WHERE operator_class_name IS NULL) AS null_name_rows
       FROM v_callbook`,
    );
    const viewRow = viewResult.rows[0];
    const view = {
      totalRows: toCount(viewRow?.total_rows),
      clubRows: toCount(viewRow?.club_rows),
      nullNameRows: toCount(viewRow?.null_name_rows),
    };

    const diagnostics: Diagnostics = { tableCounts, operatorClasses, view };
    log.db.info({ ...tableCounts, operatorClasses, ...view }, "post-merge diagnostics");
    return diagnostics;
  } catch (err) {
    throw asImportError(err, ImportErrorCode.VERIFY_FAILED, "diagnostics failed");
  }
}
