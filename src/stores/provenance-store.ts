/**
 * provenance-store.ts — Import provenance record
 *
 * ULS Callbook — FCC amateur license registry importer
 *
 * One record per import job, holding three kinds of truth:
 *   - execution history   (last_run_*)
 *   - data freshness      (local_data_updated_at)
 *   - upstream identity   (source_*)
 *
 * Two physical copies:
 *   - canonical: a namespaced JSON document, one key per job (import-state.json)
 *   - marker:    the same payload as a flat JSON file (.last_import)
 *
 * The marker is only read when the canonical namespace is absent or empty.
 * Both are replaced via temp file + rename, so readers never see a torn write.
 *
 * `persist()` takes a run's update, not a whole record: it re-reads the stored
 * record immediately before writing and folds the update into that, so a run
 * that started before another run persisted never writes stale identity back.
 *
 * Pattern: createProvenanceStore({ statePath, metaPath, namespace }) → ProvenanceStore.
 */

import { randomBytes } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { describeError } from "../errors.js";
import { log } from "../logger.js";

// ═══════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════

export const RUN_RESULTS = ["success", "skipped_locked", "skipped_unchanged", "failed"] as const;
export type RunResult = (typeof RUN_RESULTS)[number];

export interface ProvenanceRecord {
  lastRunStartedAt: string;
  lastRunFinishedAt: string;
  /** Empty when the job has never run */
  lastRunResult: RunResult | "";
  lastRunSkipReason: string;
  /** Advances only on success; never moves backward */
  localDataUpdatedAt: string;
  sourceUrl: string;
  sourceEtag: string;
  /** Raw Last-Modified header value */
  sourceLastModifiedAt: string;
  sourceZipSha256: string;
  sourceZipBytes: number | null;
}

/** What one run contributes. Run fields always apply; the rest only when non-empty. */
export interface ProvenanceUpdate {
  lastRunStartedAt: string;
  lastRunFinishedAt: string;
  lastRunResult: RunResult;
  lastRunSkipReason: string;
  localDataUpdatedAt?: string;
  sourceUrl?: string;
  sourceEtag?: string;
  sourceLastModifiedAt?: string;
  sourceZipSha256?: string;
  sourceZipBytes?: number | null;
}

export type ProvenanceSource = "state" | "marker" | "none";

export interface PriorProvenance {
  record: ProvenanceRecord;
  source: ProvenanceSource;
}

export interface ProvenanceStoreOptions {
  statePath: string;
  metaPath: string;
  namespace: string;
}

export interface ProvenanceStore {
  readonly namespace: string;
  readPrior(): Promise<PriorProvenance>;
  /** Merge `update` into the currently stored record and write both copies. Resolves to what was written. */
  persist(update: ProvenanceUpdate): Promise<ProvenanceRecord>;
  /** The whole canonical document, every namespace; empty when absent or unreadable */
  readDocument(): Promise<Record<string, unknown>>;
}

// ═══════════════════════════════════════════════════════════
// Pure record logic
// ═══════════════════════════════════════════════════════════

export function emptyProvenance(): ProvenanceRecord {
  return {
    lastRunStartedAt: "",
    lastRunFinishedAt: "",
    lastRunResult: "",
    lastRunSkipReason: "",
    localDataUpdatedAt: "",
    sourceUrl: "",
    sourceEtag: "",
    sourceLastModifiedAt: "",
    sourceZipSha256: "",
    sourceZipBytes: null,
  };
}

/** UTC, second precision: 2024-05-01T12:00:00Z */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function sticky(prior: string, fresh: string | undefined): string {
  return fresh !== undefined && fresh !== "" ? fresh : prior;
}

/**
 * Fold one run's update into the prior record.
 *
 * Precedence:
 * - last_run_* always take the update's values
 * - source_* take the update's value only when it is non-empty (non-null for bytes)
 * - local_data_updated_at moves only on success, and only forward
 */
export function mergeProvenance(prior: ProvenanceRecord, update: ProvenanceUpdate): ProvenanceRecord {
  let localDataUpdatedAt = prior.localDataUpdatedAt;
  const fresh = update.localDataUpdatedAt ?? "";
  if (update.lastRunResult === "success" && fresh !== "" && fresh > localDataUpdatedAt) {
    localDataUpdatedAt = fresh;
  }

  return {
    lastRunStartedAt: update.lastRunStartedAt,
    lastRunFinishedAt: update.lastRunFinishedAt,
    lastRunResult: update.lastRunResult,
    lastRunSkipReason: update.lastRunSkipReason,
    localDataUpdatedAt,
    sourceUrl: sticky(prior.sourceUrl, update.sourceUrl),
    sourceEtag: sticky(prior.sourceEtag, update.sourceEtag),
    sourceLastModifiedAt: sticky(prior.sourceLastModifiedAt, update.sourceLastModifiedAt),
    sourceZipSha256: sticky(prior.sourceZipSha256, update.sourceZipSha256),
    sourceZipBytes:
      update.sourceZipBytes !== undefined && update.sourceZipBytes !== null
        ? update.sourceZipBytes
        : prior.sourceZipBytes,
  };
}

// ═══════════════════════════════════════════════════════════
// Wire format (snake_case JSON)
// ═══════════════════════════════════════════════════════════

export type ProvenanceJson = Record<string, string | number | null>;

export function toProvenanceJson(record: ProvenanceRecord): ProvenanceJson {
  return {
    last_run_started_at: record.lastRunStartedAt,
    last_run_finished_at: record.lastRunFinishedAt,
    last_run_result: record.lastRunResult,
    last_run_skip_reason: record.lastRunSkipReason,
    local_data_updated_at: record.localDataUpdatedAt,
    source_url: record.sourceUrl,
    source_etag: record.sourceEtag,
    source_last_modified_at: record.sourceLastModifiedAt,
    source_zip_sha256: record.sourceZipSha256,
    source_zip_bytes: record.sourceZipBytes,
  };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(raw: Record<string, unknown>, key: string): string {
  const value = raw[key];
  return typeof value === "string" ? value : "";
}

function isRunResult(value: string): value is RunResult {
  return RUN_RESULTS.some((r) => r === value);
}

/** Lenient parse: missing or mistyped fields fall back to their empty value. */
export function parseProvenanceJson(raw: unknown): ProvenanceRecord {
  if (!isObject(raw)) return emptyProvenance();

  const result = stringField(raw, "last_run_result");
  const bytes = raw.source_zip_bytes;

  return {
    lastRunStartedAt: stringField(raw, "last_run_started_at"),
    lastRunFinishedAt: stringField(raw, "last_run_finished_at"),
    lastRunResult: isRunResult(result) ? result : "",
    lastRunSkipReason: stringField(raw, "last_run_skip_reason"),
    localDataUpdatedAt: stringField(raw, "local_data_updated_at"),
    sourceUrl: stringField(raw, "source_url"),
    sourceEtag: stringField(raw, "source_etag"),
    sourceLastModifiedAt: stringField(raw, "source_last_modified_at"),
    sourceZipSha256: stringField(raw, "source_zip_sha256"),
    sourceZipBytes: typeof bytes === "number" && Number.isSafeInteger(bytes) && bytes >= 0 ? bytes : null,
  };
}

/** Pretty JSON with object keys sorted at every depth, newline-terminated. */
export function stableJson(value: unknown): string {
  const sortKeys = (v: unknown): unknown => {
    if (Array.isArray(v)) return v.map(sortKeys);
    if (!isObject(v)) return v;
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(v).sort()) out[key] = sortKeys(v[key]);
    return out;
  };
  return `${JSON.stringify(sortKeys(value), null, 2)}\n`;
}

// ═══════════════════════════════════════════════════════════
// File store
// ═══════════════════════════════════════════════════════════

type ReadOutcome = { status: "missing" } | { status: "corrupt"; error: string } | { status: "ok"; value: unknown };

async function readJsonFile(path: string): Promise<ReadOutcome> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    if (isObject(err) && err.code === "ENOENT") return { status: "missing" };
    return { status: "corrupt", error: describeError(err) };
  }
  try {
    const value: unknown = JSON.parse(text);
    return { status: "ok", value };
  } catch (err) {
    return { status: "corrupt", error: describeError(err) };
  }
}

function tempPathFor(path: string): string {
  return join(dirname(path), `.${basename(path)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`);
}

export function createProvenanceStore(options: ProvenanceStoreOptions): ProvenanceStore {
  const { statePath, metaPath, namespace } = options;

  async function readDocument(): Promise<Record<string, unknown>> {
    const outcome = await readJsonFile(statePath);
    if (outcome.status === "missing") return {};
    if (outcome.status === "corrupt") {
      log.provenance.warn({ statePath, err: outcome.error }, "state document unreadable, treating as absent");
      return {};
    }
    if (!isObject(outcome.value)) {
      log.provenance.warn({ statePath }, "state document is not an object, treating as absent");
      return {};
    }
    return outcome.value;
  }

  async function readPriorFrom(document: Record<string, unknown>): Promise<PriorProvenance> {
    const entry = document[namespace];
    if (isObject(entry) && Object.keys(entry).length > 0) {
      return { record: parseProvenanceJson(entry), source: "state" };
    }

    const marker = await readJsonFile(metaPath);
    if (marker.status === "ok" && isObject(marker.value) && Object.keys(marker.value).length > 0) {
      log.provenance.info({ metaPath }, "state namespace empty, using marker");
      return { record: parseProvenanceJson(marker.value), source: "marker" };
    }
    if (marker.status === "corrupt") {
      log.provenance.warn({ metaPath, err: marker.error }, "marker unreadable, ignoring");
    }

    return { record: emptyProvenance(), source: "none" };
  }

  return {
    namespace,

    readDocument,

    async readPrior(): Promise<PriorProvenance> {
      return readPriorFrom(await readDocument());
    },

    async persist(update: ProvenanceUpdate): Promise<ProvenanceRecord> {
      const current = await readDocument();
      const { record: stored } = await readPriorFrom(current);
      const record = mergeProvenance(stored, update);
      const payload = toProvenanceJson(record);
      const document = { ...current, [namespace]: payload };

      const stateTmp = tempPathFor(statePath);
      const metaTmp = tempPathFor(metaPath);
      try {
        await mkdir(dirname(statePath), { recursive: true });
        await mkdir(dirname(metaPath), { recursive: true });
        await writeFile(stateTmp, stableJson(document), "utf8");
        await writeFile(metaTmp, stableJson(payload), "utf8");
        await rename(stateTmp, statePath);
        await rename(metaTmp, metaPath);
      } catch (err) {
        await rm(stateTmp, { force: true });
        await rm(metaTmp, { force: true });
        throw err;
      }

      log.provenance.info(
        { statePath, metaPath, namespace, result: record.lastRunResult },
        "provenance persisted",
      );
      return record;
    },
  };
}
