/**
 * staged-loader.ts — Bulk loads of ULS .dat files into staging tables
 *
 * ULS Callbook — FCC amateur license registry importer
 *
 * One loader variant per source kind. Each variant names its staging table,
 * the columns it fills and how a pipe-split record maps onto them. Rows are
 * streamed through `COPY ... FROM STDIN` in COPY text format.
 */

import { createReadStream } from "node:fs";
import { access } from "node:fs/promises";
import { basename } from "node:path";
import { createInterface } from "node:readline";
import type { Database } from "../db.js";
import { ImportError, ImportErrorCode, asImportError } from "../errors.js";
import { log } from "../logger.js";

// ─── Source Kinds ───────────────────────────────────────────────

export const SOURCE_KINDS = ["hd", "en", "am"] as const;
export type SourceKind = (typeof SOURCE_KINDS)[number];

export type StagingValue = string | null;

export interface LoaderVariant {
  readonly kind: SourceKind;
  /** File name inside the upstream ZIP */
  readonly fileName: string;
  readonly stagingTable: string;
  readonly columns: readonly string[];
  mapRecord(fields: readonly string[]): StagingValue[];
}

/** Empty source fields become NULL. */
function field(fields: readonly string[], position: number): StagingValue {
  const value = fields[position - 1];
  return value === undefined || value === "" ? null : value;
}

function byPositions(positions: readonly number[]) {
  return (fields: readonly string[]): StagingValue[] => positions.map((p) => field(fields, p));
}

const EN_COLUMNS = [
  "record_type",
  "unique_system_identifier",
  "uls_file_number",
  "ebf_number",
  "call_sign",
  "entity_type",
  "licensee_id",
  "entity_name",
  "first_name",
  "mi",
  "last_name",
  "suffix",
  "phone",
  "fax",
  "email",
  "street_address",
  "city",
  "state",
  "zip_code",
  "po_box",
  "attention_line",
  "sgin",
  "frn",
] as const;

/** HD.dat carries ~59 fields; only registration facts are kept. */
const HD_LOADER: LoaderVariant = {
  kind: "hd",
  fileName: "HD.dat",
  stagingTable: "stg_hd",
  columns: [
    "record_type",
    "unique_system_identifier",
    "call_sign",
    "license_status",
    "grant_date",
    "expired_date",
    "last_action_date",
  ],
  mapRecord: byPositions([1, 2, 5, 6, 8, 9, 10]),
};

const EN_LOADER: LoaderVariant = {
  kind: "en",
  fileName: "EN.dat",
  stagingTable: "stg_en",
  columns: EN_COLUMNS,
  mapRecord: byPositions(EN_COLUMNS.map((_, i) => i + 1)),
};

/** AM.dat position 6 is the authoritative operator class (E/A/G/T/N). */
const AM_LOADER: LoaderVariant = {
  kind: "am",
  fileName: "AM.dat",
  stagingTable: "stg_am",
  columns: ["record_type", "unique_system_identifier", "uls_file_number", "ebf_number", "call_sign", "operator_class"],
  mapRecord: byPositions([1, 2, 3, 4, 5, 6]),
};

export const LOADERS: Readonly<Record<SourceKind, LoaderVariant>> = {
  hd: HD_LOADER,
  en: EN_LOADER,
  am: AM_LOADER,
};

export function loaderFor(kind: SourceKind): LoaderVariant {
  return LOADERS[kind];
}

/** File names the extractor must find in the archive. */
export function requiredSourceFiles(): string[] {
  return SOURCE_KINDS.map((kind) => LOADERS[kind].fileName);
}

// ─── COPY text encoding ─────────────────────────────────────────

const COPY_ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  "\t": "\\t",
  "\n": "\\n",
  "\r": "\\r",
};

export function encodeCopyValue(value: StagingValue): string {
  if (value === null) return "\\N";
  return value.replace(/[\\\t\n\r]/g, (ch) => COPY_ESCAPES[ch] ?? ch);
}

export function encodeCopyRow(values: readonly StagingValue[]): string {
  return `${values.map(encodeCopyValue).join("\t")}\n`;
}

// ─── Loading ────────────────────────────────────────────────────

const CHUNK_TARGET = 64 * 1024;

/** Read a pipe-delimited file, yielding COPY text in ~64KB chunks. */
async function* copyChunks(
  variant: LoaderVariant,
  filePath: string,
  counter: { rows: number },
): AsyncGenerator<string> {
  const lines = createInterface({ input: createReadStream(filePath, "utf8"), crlfDelay: Infinity });
  let buffer = "";
  for await (const raw of lines) {
    const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
    if (line.length === 0) continue;
    buffer += encodeCopyRow(variant.mapRecord(line.split("|")));
    counter.rows += 1;
    if (buffer.length >= CHUNK_TARGET) {
      yield buffer;
      buffer = "";
    }
  }
  if (buffer.length > 0) yield buffer;
}

/**
 * Truncate the variant's staging table and COPY the file into it.
 * `load_seq` restarts at 1, so later lines always sort after earlier ones.
 */
export async function loadStaging(
  db: Database,
  variant: LoaderVariant,
  filePath: string,
): Promise<{ rows: number }> {
  const file = basename(filePath);
  try {
    await access(filePath);
  } catch (err) {
    throw new ImportError(ImportErrorCode.EXTRACT_FAILED, `missing source file ${file}`, {
      detail: filePath,
      cause: err,
    });
  }

  log.db.info({ table: variant.stagingTable, file }, "loading staging table");
  const counter = { rows: 0 };
  try {
    await db.query(`TRUNCATE ${variant.stagingTable} RESTART IDENTITY`);
    const accepted = await db.copyFrom(
      `COPY ${variant.stagingTable} (${variant.columns.join(", ")}) FROM STDIN`,
      copyChunks(variant, filePath, counter),
    );
    log.db.info({ table: variant.stagingTable, rows: accepted, lines: counter.rows }, "staging load complete");
    return { rows: accepted };
  } catch (err) {
    throw asImportError(
      err,
      ImportErrorCode.LOAD_FAILED,
      `load into ${variant.stagingTable} failed`,
      `${variant.stagingTable} <- ${file}`,
    );
  }
}
