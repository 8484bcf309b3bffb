#!/usr/bin/env node

/**
 * uls-import.ts — Importer CLI
 *
 *   run (default)  probe, download, load and merge the ULS amateur snapshot
 *   status         print the stored provenance record
 *
 * Exit code 0 for success and skips, 1 for failures and usage errors.
 */

import { resolveConfig, type ImporterConfig } from "../src/config.js";
import { createPgDatabase, createPool } from "../src/db.js";
import { describeError, isImportError } from "../src/errors.js";
import { log } from "../src/logger.js";
import { exitCodeFor, runImport } from "../src/services/run-coordinator.js";
import { createProvenanceStore, toProvenanceJson } from "../src/stores/provenance-store.js";

function usage(): string {
  return [
    "Usage:",
    "  uls-import [run] [--skip-if-unchanged | --no-skip-if-unchanged] [--lock | --no-lock]",
    "             [--source-url <url>] [--data-dir <dir>] [--db-url <postgres-url>]",
    "             [--state-path <path>] [--meta-path <path>]",
    "  uls-import status [--data-dir <dir>] [--state-path <path>] [--meta-path <path>]",
  ].join("\n");
}

function storeFor(config: ImporterConfig) {
  return createProvenanceStore({
    statePath: config.statePath,
    metaPath: config.metaPath,
    namespace: config.namespace,
  });
}

async function cmdRun(config: ImporterConfig): Promise<number> {
  const pool = createPool(config.databaseUrl);
  try {
    const outcome = await runImport({ config, db: createPgDatabase(pool), store: storeFor(config) });
    if (outcome.result === "failed") {
      console.error(`❌ import failed [${outcome.error.tag}] ${outcome.error.message}`);
      if (outcome.error.detail) console.error(`detail=${outcome.error.detail}`);
    } else if (outcome.result === "success") {
      console.log(`✅ import complete hd=${outcome.rows.hd} en=${outcome.rows.en} am=${outcome.rows.am}`);
      console.log(`sha256=${outcome.artifact.sha256}`);
    } else {
      console.log(`⏭  ${outcome.result}: ${outcome.reason}`);
    }
    return exitCodeFor(outcome);
  } finally {
    await pool.end();
  }
}

async function cmdStatus(config: ImporterConfig): Promise<number> {
  const { record, source } = await storeFor(config).readPrior();
  const payload = {
    namespace: config.namespace,
    source,
    statePath: config.statePath,
    metaPath: config.metaPath,
    record: toProvenanceJson(record),
  };
  console.log(JSON.stringify(payload, null, 2));
  return 0;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (args.includes("--help") || args.includes("-h")) {
    console.log(usage());
    return;
  }

  let config: ImporterConfig;
  try {
    config = resolveConfig(process.env, args);
  } catch (err) {
    console.error(describeError(err));
    console.error(usage());
    process.exitCode = 1;
    return;
  }

  log.boot.info(
    { command: config.command, sourceUrl: config.sourceUrl, dataDir: config.dataDir, namespace: config.namespace },
    "importer starting",
  );

  process.exitCode = config.command === "status" ? await cmdStatus(config) : await cmdRun(config);
}

main().catch((error) => {
  const tag = isImportError(error) ? `[${error.tag}] ` : "";
  console.error(`${tag}${describeError(error)}`);
  process.exitCode = 1;
});
