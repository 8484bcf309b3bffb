/**
 * run-coordinator.ts — Import run state machine
 *
 * ULS Callbook — FCC amateur license registry importer
 *
 *   START → LOCK ─(held)→ skipped_locked
 *         → CHECK_CHANGE ─(unchanged)→ skipped_unchanged
 *         → SCHEMA → FETCH → EXTRACT → LOAD → MERGE → VERIFY → PERSIST(success)
 *
 * Any fault in SCHEMA..MERGE ends in `failed`. Every terminal state persists
 * exactly one provenance record and emits one "import outcome" log line.
 * Skips and failures are returned, never thrown.
 *
 * Prior provenance is read only once the lock is held, and persisting merges
 * into whatever is stored at that moment, so a run that lost the lock never
 * rolls back the identity another run just recorded.
 *
 * The advisory lock is released in `finally`, after persistence, whatever
 * persistence did.
 */

import type { ImporterConfig } from "../config.js";
import type { AdvisoryLock, Database } from "../db.js";
import { ImportError, ImportErrorCode, asImportError, describeError, type ImportErrorCodeValue } from "../errors.js";
import { log } from "../logger.js";
import {
  emptyProvenance,
  formatTimestamp,
  mergeProvenance,
  type ProvenanceRecord,
  type ProvenanceStore,
  type ProvenanceUpdate,
} from "../stores/provenance-store.js";
import { prepareSourceFiles } from "./archive-extractor.js";
import {
  ensureArtifact,
  fileSize,
  hashFile,
  probeRemote,
  type ArtifactResult,
  type EnsureArtifactOptions,
  type RemoteMeta,
} from "./artifact-fetcher.js";
import { canReuseArtifact, detectChange, type ChangeSignal } from "./change-detector.js";
import { mergeAll } from "./merge-engine.js";
import { applySchema, loadSchemaFile } from "./schema-applier.js";
import { LOADERS, SOURCE_KINDS, loadStaging, requiredSourceFiles, type SourceKind } from "./staged-loader.js";
import { collectDiagnostics, type Diagnostics } from "./verification.js";

// ─── Types ──────────────────────────────────────────────────────

export type Phase =
  | "lock"
  | "check_change"
  | "schema"
  | "fetch"
  | "extract"
  | "load"
  | "merge"
  | "verify"
  | "persist";

interface OutcomeBase {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  /** Phases entered, in order */
  phases: Phase[];
  /** The record as persisted (or as it would have been, if persisting failed) */
  record: ProvenanceRecord;
  persisted: boolean;
}

export type RunOutcome =
  | (OutcomeBase & {
      result: "success";
      artifact: ArtifactResult;
      rows: Record<SourceKind, number>;
      diagnostics: Diagnostics | null;
    })
  | (OutcomeBase & { result: "skipped_locked"; reason: string })
  | (OutcomeBase & { result: "skipped_unchanged"; reason: string; signal: ChangeSignal })
  | (OutcomeBase & { result: "failed"; phase: Phase; error: ImportError });

/** Side-effecting operations the coordinator drives; swapped for fakes in tests. */
export interface ImportOps {
  probeRemote(url: string, timeoutMs: number): Promise<RemoteMeta>;
  /** SHA-256 of a local file, or null when it does not exist */
  localDigest(path: string): Promise<string | null>;
  readSchema(path: string): Promise<string>;
  ensureArtifact(url: string, destPath: string, options: EnsureArtifactOptions): Promise<ArtifactResult>;
  prepareSourceFiles(zipPath: string, extractDir: string, required: readonly string[]): Promise<Map<string, string>>;
}

export type RunConfig = Pick<
  ImporterConfig,
  | "sourceUrl"
  | "probeTimeoutMs"
  | "downloadTimeoutMs"
  | "minReuseBytes"
  | "zipPath"
  | "extractDir"
  | "schemaPath"
  | "lockEnabled"
  | "lockName"
  | "skipIfUnchanged"
>;

export interface RunDeps {
  config: RunConfig;
  db: Database;
  store: ProvenanceStore;
  ops?: Partial<ImportOps>;
  now?: () => Date;
}

export const LOCK_HELD_REASON = "lock held by another run";

const defaultOps: ImportOps = {
  probeRemote,
  async localDigest(path) {
    if ((await fileSize(path)) === null) return null;
    return (await hashFile(path)).sha256;
  },
  readSchema: loadSchemaFile,
  ensureArtifact,
  prepareSourceFiles,
};

const PHASE_ERROR_CODES: Record<Phase, ImportErrorCodeValue> = {
  lock: ImportErrorCode.LOCK_FAILED,
  check_change: ImportErrorCode.FETCH_FAILED,
  schema: ImportErrorCode.SCHEMA_FAILED,
  fetch: ImportErrorCode.FETCH_FAILED,
  extract: ImportErrorCode.EXTRACT_FAILED,
  load: ImportErrorCode.LOAD_FAILED,
  merge: ImportErrorCode.MERGE_FAILED,
  verify: ImportErrorCode.VERIFY_FAILED,
  persist: ImportErrorCode.VERIFY_FAILED,
};

// ─── Coordinator ────────────────────────────────────────────────

type Terminal =
  | { result: "success"; artifact: ArtifactResult; remote: RemoteMeta; rows: Record<SourceKind, number>; diagnostics: Diagnostics | null }
  | { result: "skipped_locked"; reason: string }
  | { result: "skipped_unchanged"; reason: string; signal: ChangeSignal; remote: RemoteMeta }
  | { result: "failed"; phase: Phase; error: ImportError };

function provenanceUpdate(
  terminal: Terminal,
  startedAt: string,
  finishedAt: string,
  sourceUrl: string,
): ProvenanceUpdate {
  const run = { lastRunStartedAt: startedAt, lastRunFinishedAt: finishedAt, lastRunResult: terminal.result };
  switch (terminal.result) {
    case "success":
      return {
        ...run,
        lastRunSkipReason: "",
        localDataUpdatedAt: finishedAt,
        sourceUrl,
        sourceEtag: terminal.remote.etag,
        sourceLastModifiedAt: terminal.remote.lastModified,
        sourceZipSha256: terminal.artifact.sha256,
        sourceZipBytes: terminal.artifact.bytesWritten,
      };
    case "skipped_unchanged":
      return {
        ...run,
        lastRunSkipReason: terminal.reason,
        sourceUrl,
        sourceEtag: terminal.remote.etag,
        sourceLastModifiedAt: terminal.remote.lastModified,
      };
    case "skipped_locked":
      return { ...run, lastRunSkipReason: terminal.reason };
    case "failed":
      // Identity seen during a failed run is not what the store reflects.
      return { ...run, lastRunSkipReason: "" };
  }
}

function toOutcome(terminal: Terminal, base: OutcomeBase): RunOutcome {
  switch (terminal.result) {
    case "success":
      return {
        ...base,
        result: "success",
        artifact: terminal.artifact,
        rows: terminal.rows,
        diagnostics: terminal.diagnostics,
      };
    case "skipped_locked":
      return { ...base, result: "skipped_locked", reason: terminal.reason };
    case "skipped_unchanged":
      return { ...base, result: "skipped_unchanged", reason: terminal.reason, signal: terminal.signal };
    case "failed":
      return { ...base, result: "failed", phase: terminal.phase, error: terminal.error };
  }
}

function logOutcome(outcome: RunOutcome): void {
  switch (outcome.result) {
    case "failed":
      log.import.error(
        {
          result: outcome.result,
          phase: outcome.phase,
          tag: outcome.error.tag,
          code: outcome.error.code,
          detail: outcome.error.detail,
          err: outcome.error.message,
          durationMs: outcome.durationMs,
        },
        "import outcome",
      );
      return;
    case "success":
      log.import.info(
        { result: outcome.result, rows: outcome.rows, sha256: outcome.artifact.sha256, durationMs: outcome.durationMs },
        "import outcome",
      );
      return;
    default:
      log.import.info(
        { result: outcome.result, reason: outcome.reason, durationMs: outcome.durationMs },
        "import outcome",
      );
  }
}

interface RunState {
  phase: Phase;
  phases: Phase[];
  lock: AdvisoryLock | null;
  prior: ProvenanceRecord;
}

async function execute(deps: RunDeps, ops: ImportOps, state: RunState): Promise<Terminal> {
  const { config, db } = deps;
  const enter = (phase: Phase): void => {
    state.phase = phase;
    state.phases.push(phase);
    log.import.debug({ phase }, "phase start");
  };

  if (config.lockEnabled) {
    enter("lock");
    state.lock = await db.tryAdvisoryLock(config.lockName);
    if (!state.lock) {
      return { result: "skipped_locked", reason: LOCK_HELD_REASON };
    }
    log.import.info({ lock: config.lockName }, "lock acquired");
  }

  const { record: prior, source } = await deps.store.readPrior();
  state.prior = prior;
  log.import.info({ source, lastRunResult: prior.lastRunResult }, "prior provenance loaded");

  let remote: RemoteMeta | null = null;
  if (config.skipIfUnchanged) {
    enter("check_change");
    remote = await ops.probeRemote(config.sourceUrl, config.probeTimeoutMs);
    const decision = await detectChange({
      enabled: true,
      remote,
      localArtifactPath: config.zipPath,
      prior,
      hashFile: ops.localDigest,
    });
    if (decision.action === "skip") {
      return { result: "skipped_unchanged", reason: decision.reason, signal: decision.signal, remote };
    }
    log.import.info({ reason: decision.reason }, "upstream changed, continuing");
  }

  enter("schema");
  await applySchema(db, await ops.readSchema(config.schemaPath));

  enter("fetch");
  // A full run always records fresh upstream identity.
  if (remote === null) {
    remote = await ops.probeRemote(config.sourceUrl, config.probeTimeoutMs);
  }
  const artifact = await ops.ensureArtifact(config.sourceUrl, config.zipPath, {
    timeoutMs: config.downloadTimeoutMs,
    minReuseBytes: config.minReuseBytes,
    expectedLength: remote.contentLength,
    allowReuse: canReuseArtifact(remote, prior),
  });

  enter("extract");
  const files = await ops.prepareSourceFiles(config.zipPath, config.extractDir, requiredSourceFiles());

  enter("load");
  for (const kind of SOURCE_KINDS) {
    const variant = LOADERS[kind];
    const path = files.get(variant.fileName);
    if (path === undefined) {
      throw new ImportError(ImportErrorCode.EXTRACT_FAILED, `missing ${variant.fileName} after extract`);
    }
    await loadStaging(db, variant, path);
  }

  enter("merge");
  const rows = await mergeAll(db);

  enter("verify");
  let diagnostics: Diagnostics | null = null;
  try {
    diagnostics = await collectDiagnostics(db);
  } catch (err) {
    log.import.warn({ err: describeError(err) }, "diagnostics failed; continuing");
  }

  return { result: "success", artifact, remote, rows, diagnostics };
}

/** Run one import end to end. Never throws for skips or pipeline failures. */
export async function runImport(deps: RunDeps): Promise<RunOutcome> {
  const { config, store } = deps;
  const ops: ImportOps = { ...defaultOps, ...deps.ops };
  const now = deps.now ?? (() => new Date());

  const started = now();
  const startedAt = formatTimestamp(started);
  const state: RunState = { phase: "lock", phases: [], lock: null, prior: emptyProvenance() };

  try {
    let terminal: Terminal;
    try {
      terminal = await execute(deps, ops, state);
    } catch (err) {
      const error = asImportError(err, PHASE_ERROR_CODES[state.phase], `${state.phase} failed`);
      terminal = { result: "failed", phase: state.phase, error };
    }

    const finished = now();
    const finishedAt = formatTimestamp(finished);
    const update = provenanceUpdate(terminal, startedAt, finishedAt, config.sourceUrl);

    state.phases.push("persist");
    let record: ProvenanceRecord;
    let persisted = false;
    try {
      record = await store.persist(update);
      persisted = true;
    } catch (err) {
      log.import.warn({ err: describeError(err) }, "provenance persist failed; outcome unchanged");
      record = mergeProvenance(state.prior, update);
    }

    const outcome = toOutcome(terminal, {
      startedAt,
      finishedAt,
      durationMs: finished.getTime() - started.getTime(),
      phases: state.phases,
      record,
      persisted,
    });
    logOutcome(outcome);
    return outcome;
  } finally {
    await releaseLock(state.lock);
  }
}

async function releaseLock(lock: AdvisoryLock | null): Promise<void> {
  if (!lock) return;
  try {
    await lock.release();
    log.import.debug({ lock: lock.name }, "lock released");
  } catch (err) {
    log.import.warn({ lock: lock.name, err: describeError(err) }, "lock release failed; session drop frees it");
  }
}

/** 0 for success and skips, 1 for failure. */
export function exitCodeFor(outcome: RunOutcome): number {
  return outcome.result === "failed" ? 1 : 0;
}
