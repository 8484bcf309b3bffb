/**
 * provenance-store.test.ts — Record merge rules, wire format, dual atomic persistence
 */

import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  createProvenanceStore,
  emptyProvenance,
  formatTimestamp,
  mergeProvenance,
  parseProvenanceJson,
  stableJson,
  toProvenanceJson,
  type ProvenanceRecord,
  type ProvenanceUpdate,
} from "../src/stores/provenance-store.js";

const KNOWN_GOOD: ProvenanceRecord = {
  lastRunStartedAt: "2024-05-01T03:00:00Z",
  lastRunFinishedAt: "2024-05-01T03:20:00Z",
  lastRunResult: "success",
  lastRunSkipReason: "",
  localDataUpdatedAt: "2024-05-01T03:20:00Z",
  sourceUrl: "https://example.test/l_amat.zip",
  sourceEtag: "\"abc\"",
  sourceLastModifiedAt: "Tue, 30 Apr 2024 22:00:00 GMT",
  sourceZipSha256: "1111111111111111111111111111111111111111111111111111111111111111",
  sourceZipBytes: 180_000_000,
};

/** Folding this into an empty record yields exactly KNOWN_GOOD. */
const KNOWN_GOOD_UPDATE: ProvenanceUpdate = { ...KNOWN_GOOD, lastRunResult: "success" };

function runFields(result: ProvenanceUpdate["lastRunResult"], finishedAt = "2024-05-08T03:05:00Z"): ProvenanceUpdate {
  return {
    lastRunStartedAt: "2024-05-08T03:00:00Z",
    lastRunFinishedAt: finishedAt,
    lastRunResult: result,
    lastRunSkipReason: "",
  };
}

// ═══════════════════════════════════════════════════════════
// Pure record logic
// ═══════════════════════════════════════════════════════════

describe("mergeProvenance", () => {
  it("keeps known-good identity on a failed run", () => {
    const next = mergeProvenance(KNOWN_GOOD, runFields("failed"));

    expect(next.lastRunResult).toBe("failed");
    expect(next.lastRunStartedAt).toBe("2024-05-08T03:00:00Z");
    expect(next.lastRunSkipReason).toBe("");
    expect(next.localDataUpdatedAt).toBe(KNOWN_GOOD.localDataUpdatedAt);
    expect(next.sourceEtag).toBe(KNOWN_GOOD.sourceEtag);
    expect(next.sourceZipSha256).toBe(KNOWN_GOOD.sourceZipSha256);
    expect(next.sourceZipBytes).toBe(KNOWN_GOOD.sourceZipBytes);
  });

  it("takes fresh identity only when non-empty", () => {
    const next = mergeProvenance(KNOWN_GOOD, {
      ...runFields("success"),
      localDataUpdatedAt: "2024-05-08T03:05:00Z",
      sourceEtag: "\"def\"",
      sourceLastModifiedAt: "",
      sourceZipSha256: "2222222222222222222222222222222222222222222222222222222222222222",
      sourceZipBytes: null,
    });

    expect(next.sourceEtag).toBe("\"def\"");
    expect(next.sourceLastModifiedAt).toBe(KNOWN_GOOD.sourceLastModifiedAt);
    expect(next.sourceZipSha256).toBe("2222222222222222222222222222222222222222222222222222222222222222");
    expect(next.sourceZipBytes).toBe(KNOWN_GOOD.sourceZipBytes);
    expect(next.localDataUpdatedAt).toBe("2024-05-08T03:05:00Z");
  });

  it("always overwrites the run fields", () => {
    const skipped = mergeProvenance(KNOWN_GOOD, { ...runFields("skipped_locked"), lastRunSkipReason: "lock held by another run" });
    expect(skipped.lastRunResult).toBe("skipped_locked");
    expect(skipped.lastRunSkipReason).toBe("lock held by another run");

    const next = mergeProvenance(skipped, runFields("failed"));
    expect(next.lastRunSkipReason).toBe("");
  });

  it("never moves local_data_updated_at backward", () => {
    const next = mergeProvenance(KNOWN_GOOD, { ...runFields("success"), localDataUpdatedAt: "2024-04-01T00:00:00Z" });
    expect(next.localDataUpdatedAt).toBe(KNOWN_GOOD.localDataUpdatedAt);
  });

  it("advances local_data_updated_at only on success", () => {
    const skipped = mergeProvenance(KNOWN_GOOD, {
      ...runFields("skipped_unchanged"),
      localDataUpdatedAt: "2024-05-08T03:05:00Z",
    });
    expect(skipped.localDataUpdatedAt).toBe(KNOWN_GOOD.localDataUpdatedAt);
  });

  it("fills an empty record on the first success", () => {
    const next = mergeProvenance(emptyProvenance(), {
      ...runFields("success"),
      localDataUpdatedAt: "2024-05-08T03:05:00Z",
      sourceUrl: "https://example.test/l_amat.zip",
      sourceZipSha256: "abc",
      sourceZipBytes: 0,
    });
    expect(next.localDataUpdatedAt).toBe("2024-05-08T03:05:00Z");
    expect(next.sourceZipSha256).toBe("abc");
    expect(next.sourceZipBytes).toBe(0);
    expect(next.sourceEtag).toBe("");
  });
});

describe("formatTimestamp", () => {
  it("formats UTC with second precision", () => {
    expect(formatTimestamp(new Date("2024-05-01T12:34:56.789Z"))).toBe("2024-05-01T12:34:56Z");
  });
});

// ═══════════════════════════════════════════════════════════
// Wire format
// ═══════════════════════════════════════════════════════════

describe("wire format", () => {
  it("uses snake_case keys", () => {
    expect(toProvenanceJson(KNOWN_GOOD)).toEqual({
      last_run_started_at: "2024-05-01T03:00:00Z",
      last_run_finished_at: "2024-05-01T03:20:00Z",
      last_run_result: "success",
      last_run_skip_reason: "",
      local_data_updated_at: "2024-05-01T03:20:00Z",
      source_url: "https://example.test/l_amat.zip",
      source_etag: "\"abc\"",
      source_last_modified_at: "Tue, 30 Apr 2024 22:00:00 GMT",
      source_zip_sha256: "1111111111111111111111111111111111111111111111111111111111111111",
      source_zip_bytes: 180_000_000,
    });
  });

  it("parses its own output", () => {
    expect(parseProvenanceJson(toProvenanceJson(KNOWN_GOOD))).toEqual(KNOWN_GOOD);
  });

  it("tolerates missing and mistyped fields", () => {
    const parsed = parseProvenanceJson({
      last_run_result: "exploded",
      source_etag: 5,
      source_zip_bytes: "12",
      source_url: "https://example.test/l_amat.zip",
    });
    expect(parsed).toEqual({ ...emptyProvenance(), sourceUrl: "https://example.test/l_amat.zip" });
    expect(parseProvenanceJson(null)).toEqual(emptyProvenance());
    expect(parseProvenanceJson(["x"])).toEqual(emptyProvenance());
  });

  it("writes sorted, indented JSON with a trailing newline", () => {
    expect(stableJson({ b: 1, a: { d: 1, c: 2 } })).toBe('{\n  "a": {\n    "c": 2,\n    "d": 1\n  },\n  "b": 1\n}\n');
  });
});

// ═══════════════════════════════════════════════════════════
// File store
// ═══════════════════════════════════════════════════════════

describe("createProvenanceStore", () => {
  const dirs: string[] = [];

  afterEach(async () => {
    for (const dir of dirs) {
      await rm(dir, { recursive: true, force: true });
    }
    dirs.length = 0;
  });

  async function setup() {
    const dir = await mkdtemp(join(tmpdir(), "uls-provenance-"));
    dirs.push(dir);
    const statePath = join(dir, "import-state.json");
    const metaPath = join(dir, ".last_import");
    const store = createProvenanceStore({ statePath, metaPath, namespace: "uls_import" });
    return { dir, statePath, metaPath, store };
  }

  it("reports an empty record when nothing exists", async () => {
    const { store } = await setup();
    expect(await store.readPrior()).toEqual({ record: emptyProvenance(), source: "none" });
    expect(await store.readDocument()).toEqual({});
  });

  it("persists to both copies and reads back from the canonical one", async () => {
    const { dir, statePath, metaPath, store } = await setup();

    await store.persist(KNOWN_GOOD_UPDATE);

    expect(await store.readPrior()).toEqual({ record: KNOWN_GOOD, source: "state" });
    const state: unknown = JSON.parse(await readFile(statePath, "utf8"));
    const marker: unknown = JSON.parse(await readFile(metaPath, "utf8"));
    expect(state).toEqual({ uls_import: toProvenanceJson(KNOWN_GOOD) });
    expect(marker).toEqual(toProvenanceJson(KNOWN_GOOD));
    expect((await readdir(dir)).sort()).toEqual([".last_import", "import-state.json"]);
  });

  it("resolves to the record it wrote", async () => {
    const { store } = await setup();

    const written = await store.persist(KNOWN_GOOD_UPDATE);

    expect(written).toEqual(KNOWN_GOOD);
  });

  it("merges into what is stored at write time, not what was read earlier", async () => {
    const { statePath, store } = await setup();
    const before = await store.readPrior();
    expect(before.source).toBe("none");

    // Another run lands a newer success between this run's read and its write.
    const newer: ProvenanceRecord = {
      ...KNOWN_GOOD,
      lastRunFinishedAt: "2024-05-08T03:20:00Z",
      localDataUpdatedAt: "2024-05-08T03:20:00Z",
      sourceEtag: "\"def\"",
      sourceZipSha256: "f".repeat(64),
    };
    await writeFile(statePath, JSON.stringify({ uls_import: toProvenanceJson(newer) }), "utf8");

    const written = await store.persist({
      lastRunStartedAt: "2024-05-08T03:10:00Z",
      lastRunFinishedAt: "2024-05-08T03:10:01Z",
      lastRunResult: "skipped_locked",
      lastRunSkipReason: "lock held by another run",
    });

    expect(written).toEqual({
      ...newer,
      lastRunStartedAt: "2024-05-08T03:10:00Z",
      lastRunFinishedAt: "2024-05-08T03:10:01Z",
      lastRunResult: "skipped_locked",
      lastRunSkipReason: "lock held by another run",
    });
    expect(await store.readPrior()).toEqual({ record: written, source: "state" });
  });

  it("merges into the marker when the canonical namespace is missing", async () => {
    const { metaPath, store } = await setup();
    await writeFile(metaPath, JSON.stringify(toProvenanceJson(KNOWN_GOOD)), "utf8");

    const written = await store.persist(runFields("failed"));

    expect(written.localDataUpdatedAt).toBe(KNOWN_GOOD.localDataUpdatedAt);
    expect(written.sourceZipSha256).toBe(KNOWN_GOOD.sourceZipSha256);
    expect(written.lastRunResult).toBe("failed");
    expect(await store.readPrior()).toEqual({ record: written, source: "state" });
  });

  it("preserves other namespaces", async () => {
    const { statePath, store } = await setup();
    await writeFile(statePath, JSON.stringify({ other_job: { last_run_result: "success" } }), "utf8");

    await store.persist(KNOWN_GOOD_UPDATE);

    expect(await store.readDocument()).toEqual({
      other_job: { last_run_result: "success" },
      uls_import: toProvenanceJson(KNOWN_GOOD),
    });
  });

  it("falls back to the marker when the namespace is absent", async () => {
    const { metaPath, store } = await setup();
    await writeFile(metaPath, JSON.stringify(toProvenanceJson(KNOWN_GOOD)), "utf8");

    expect(await store.readPrior()).toEqual({ record: KNOWN_GOOD, source: "marker" });
  });

  it("falls back to the marker when the namespace is empty", async () => {
    const { statePath, metaPath, store } = await setup();
    await writeFile(statePath, JSON.stringify({ uls_import: {} }), "utf8");
    await writeFile(metaPath, JSON.stringify(toProvenanceJson(KNOWN_GOOD)), "utf8");

    const prior = await store.readPrior();
    expect(prior.source).toBe("marker");
  });

  it("ignores the marker when the canonical namespace is present", async () => {
    const { statePath, metaPath, store } = await setup();
    await writeFile(statePath, JSON.stringify({ uls_import: { source_etag: "\"canonical\"" } }), "utf8");
    await writeFile(metaPath, JSON.stringify({ source_etag: "\"marker\"" }), "utf8");

    const prior = await store.readPrior();
    expect(prior.source).toBe("state");
    expect(prior.record.sourceEtag).toBe("\"canonical\"");
  });

  it("treats a corrupt canonical document as absent", async () => {
    const { statePath, store } = await setup();
    await writeFile(statePath, "{not json", "utf8");

    expect(await store.readPrior()).toEqual({ record: emptyProvenance(), source: "none" });

    await store.persist(KNOWN_GOOD_UPDATE);
    expect(await store.readDocument()).toEqual({ uls_import: toProvenanceJson(KNOWN_GOOD) });
  });

  it("leaves both copies untouched when a write cannot happen", async () => {
    const { dir, statePath } = await setup();
    await writeFile(statePath, "{\"uls_import\":{\"source_etag\":\"old\"}}", "utf8");
    await writeFile(join(dir, "blocker"), "", "utf8");
    const store = createProvenanceStore({
      statePath,
      metaPath: join(dir, "blocker", "marker.json"),
      namespace: "uls_import",
    });

    await expect(store.persist(KNOWN_GOOD_UPDATE)).rejects.toThrow();

    expect(await readFile(statePath, "utf8")).toBe("{\"uls_import\":{\"source_etag\":\"old\"}}");
    expect((await readdir(dir)).sort()).toEqual(["blocker", "import-state.json"]);
  });
});
