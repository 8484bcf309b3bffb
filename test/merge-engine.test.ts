/**
 * merge-engine.test.ts — Merge plans, generated upsert SQL, execution
 */

import { describe, it, expect } from "vitest";
import { MERGE_PLANS, buildMergeSql, cleanExpression, mergeAll } from "../src/services/merge-engine.js";
import { FakeDatabase } from "./helpers/fake-database.js";

describe("cleanExpression", () => {
  it("trims, truncates and nulls empty text", () => {
    expect(cleanExpression({ name: "call_sign", rule: { kind: "text", width: 10 } })).toBe(
      "NULLIF(LEFT(BTRIM(call_sign), 10), '')",
    );
    expect(cleanExpression({ name: "note", rule: { kind: "text" } })).toBe("NULLIF(BTRIM(note), '')");
  });

  it("parses dates through uls_parse_date", () => {
    expect(cleanExpression({ name: "grant_date", rule: { kind: "date" } })).toBe("uls_parse_date(grant_date)");
  });

  it("reads from a differently named staging column", () => {
    expect(cleanExpression({ name: "zip", source: "zip_code", rule: { kind: "text", width: 10 } })).toBe(
      "NULLIF(LEFT(BTRIM(zip_code), 10), '')",
    );
  });
});

describe("buildMergeSql", () => {
  it("generates a last-row-wins upsert for am", () => {
    expect(buildMergeSql(MERGE_PLANS.am)).toBe(
      [
        "INSERT INTO am (unique_system_identifier, call_sign, operator_class)",
        "SELECT DISTINCT ON (BTRIM(unique_system_identifier)::bigint)",
        "  BTRIM(unique_system_identifier)::bigint AS unique_system_identifier,",
        "  NULLIF(LEFT(BTRIM(call_sign), 10), '') AS call_sign,",
        "  NULLIF(LEFT(BTRIM(operator_class), 1), '') AS operator_class",
        "FROM stg_am",
        String.raw`WHERE unique_system_identifier ~ '^\s*[0-9]+\s*$'`,
        "ORDER BY BTRIM(unique_system_identifier)::bigint, load_seq DESC",
        "ON CONFLICT (unique_system_identifier) DO UPDATE SET",
        "  call_sign = EXCLUDED.call_sign,",
        "  operator_class = EXCLUDED.operator_class",
      ].join("\n"),
    );
  });

  it("keeps one row per key, preferring the latest staged row", () => {
    // Two staged rows sharing a key collapse to the one with the highest load_seq.
    const sql = buildMergeSql(MERGE_PLANS.hd);
    expect(sql).toContain("SELECT DISTINCT ON (BTRIM(unique_system_identifier)::bigint)");
    expect(sql).toContain("ORDER BY BTRIM(unique_system_identifier)::bigint, load_seq DESC");
    expect(sql).toContain("call_sign = EXCLUDED.call_sign");
  });

  it("overwrites every mutable column on conflict", () => {
    for (const plan of Object.values(MERGE_PLANS)) {
      const sql = buildMergeSql(plan);
      for (const column of plan.columns) {
        expect(sql).toContain(`  ${column.name} = EXCLUDED.${column.name}`);
      }
      expect(sql).not.toContain(`${plan.naturalKey} = EXCLUDED`);
    }
  });

  it("parses hd dates and truncates en addresses", () => {
    const hd = buildMergeSql(MERGE_PLANS.hd);
    expect(hd).toContain("uls_parse_date(grant_date) AS grant_date");
    expect(hd).toContain("uls_parse_date(expired_date) AS expired_date");
    expect(hd).toContain("uls_parse_date(last_action_date) AS last_action_date");

    const en = buildMergeSql(MERGE_PLANS.en);
    expect(en).toContain("NULLIF(LEFT(BTRIM(entity_name), 200), '') AS entity_name");
    expect(en).toContain("NULLIF(LEFT(BTRIM(street_address), 80), '') AS street_address");
    expect(en).toContain("NULLIF(LEFT(BTRIM(state), 2), '') AS state");
  });
});

describe("mergeAll", () => {
  it("runs one upsert per final table and reports row counts", async () => {
    const db = new FakeDatabase()
      .respond(/^INSERT INTO hd /, [], 5)
      .respond(/^INSERT INTO en /, [], 3)
      .respond(/^INSERT INTO am /, [], 4);

    const counts = await mergeAll(db);

    expect(counts).toEqual({ hd: 5, en: 3, am: 4 });
    expect(db.statements().map((sql) => sql.split(" ")[2])).toEqual(["hd", "en", "am"]);
  });

  it("issues identical statements on a repeated merge", async () => {
    const db = new FakeDatabase();
    await mergeAll(db);
    await mergeAll(db);
    const statements = db.statements();
    expect(statements).toHaveLength(6);
    expect(statements.slice(3)).toEqual(statements.slice(0, 3));
  });

  it("wraps store errors with the target table", async () => {
    const db = new FakeDatabase().failWhen(/^INSERT INTO en /, new Error("value too long"));

    await expect(mergeAll(db)).rejects.toMatchObject({
      code: "MERGE_FAILED",
      message: "merge into en failed: value too long",
      detail: "en",
    });
    expect(db.statements()).toHaveLength(2);
  });
});
