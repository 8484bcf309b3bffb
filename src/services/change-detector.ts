/**
 * change-detector.ts — Upstream change decision
 *
 * ULS Callbook — FCC amateur license registry importer
 *
 * Decides whether the upstream artifact is the one already reflected locally.
 * First match wins:
 *   disabled              → proceed
 *   etag equal            → skip
 *   last-modified equal   → skip
 *   local digest equal    → skip
 *   otherwise             → proceed
 *
 * Empty values never match, so a first run can never be skipped.
 */

import type { RemoteMeta } from "./artifact-fetcher.js";
import type { ProvenanceRecord } from "../stores/provenance-store.js";

export type ChangeSignal = "etag" | "last_modified" | "sha256";

export type ChangeDecision =
  | { action: "proceed"; reason: string }
  | { action: "skip"; signal: ChangeSignal; reason: string };

export interface DetectChangeInput {
  enabled: boolean;
  remote: RemoteMeta;
  /** Path of a previously downloaded artifact, present or not */
  localArtifactPath: string;
  prior: Pick<ProvenanceRecord, "sourceEtag" | "sourceLastModifiedAt" | "sourceZipSha256">;
  /** Digest of the local artifact, or null when it does not exist */
  hashFile: (path: string) => Promise<string | null>;
}

function sameNonEmpty(a: string, b: string): boolean {
  return a !== "" && b !== "" && a === b;
}

export async function detectChange(input: DetectChangeInput): Promise<ChangeDecision> {
  const { enabled, remote, prior } = input;

  if (!enabled) {
    return { action: "proceed", reason: "change detection disabled" };
  }

  if (sameNonEmpty(remote.etag, prior.sourceEtag)) {
    return { action: "skip", signal: "etag", reason: `upstream etag unchanged (${remote.etag})` };
  }

  if (sameNonEmpty(remote.lastModified, prior.sourceLastModifiedAt)) {
    return {
      action: "skip",
      signal: "last_modified",
      reason: `upstream last-modified unchanged (${remote.lastModified})`,
    };
  }

  // Only pay for hashing when there is something to compare against.
  if (prior.sourceZipSha256 !== "") {
    const localDigest = await input.hashFile(input.localArtifactPath);
    if (localDigest !== null && sameNonEmpty(localDigest, prior.sourceZipSha256)) {
      return { action: "skip", signal: "sha256", reason: "local artifact digest matches last import" };
    }
  }

  return { action: "proceed", reason: "no matching change signal" };
}

/**
 * Whether a ZIP already on disk may stand in for the upstream artifact.
 * Only when upstream still reports the identity last recorded, or reports
 * nothing at all; otherwise the file on disk is an older snapshot.
 */
export function canReuseArtifact(
  remote: RemoteMeta,
  prior: Pick<ProvenanceRecord, "sourceEtag" | "sourceLastModifiedAt">,
): boolean {
  if (remote.etag === "" && remote.lastModified === "") return true;
  return sameNonEmpty(remote.etag, prior.sourceEtag) || sameNonEmpty(remote.lastModified, prior.sourceLastModifiedAt);
}
