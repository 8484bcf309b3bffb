/**
 * artifact-fetcher.ts — Upstream artifact probe and download
 *
 * ULS Callbook — FCC amateur license registry importer
 *
 * Two entry points:
 *   probeRemote()   — HEAD only; never throws, returns a zero value on failure
 *   ensureArtifact() — reuse a previous complete download or stream a new one
 *
 * Downloads are written to a temp file beside the destination and renamed into
 * place, so a reader never sees a partial ZIP.
 */

import { createHash, randomBytes, type Hash } from "node:crypto";
import { createReadStream, createWriteStream } from "node:fs";
import { mkdir, rename, rm, stat } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { Readable, Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import { ImportError, ImportErrorCode, describeError } from "../errors.js";
import { log } from "../logger.js";

// ─── Types ──────────────────────────────────────────────────────

export interface RemoteMeta {
  /** Entity tag exactly as sent (quotes and weak prefix kept) */
  etag: string;
  /** Raw Last-Modified header value */
  lastModified: string;
  contentLength: number | null;
}

export interface FetchResult {
  sha256: string;
  bytesWritten: number;
}

export interface ArtifactResult extends FetchResult {
  path: string;
  /** True when an existing file was kept instead of downloading */
  reused: boolean;
}

export interface FetchOptions {
  timeoutMs: number;
  /** Probed content length; a mismatch is logged, not fatal */
  expectedLength?: number | null;
}

export interface EnsureArtifactOptions extends FetchOptions {
  /** Files larger than this are treated as a complete prior download */
  minReuseBytes: number;
  /** False when upstream has moved past the file on disk (default true) */
  allowReuse?: boolean;
}

export const EMPTY_REMOTE_META: Readonly<RemoteMeta> = Object.freeze({
  etag: "",
  lastModified: "",
  contentLength: null,
});

const USER_AGENT = "uls-callbook-importer/1.0";

// ─── Probe ──────────────────────────────────────────────────────

function parseContentLength(raw: string | null): number | null {
  if (raw == null) return null;
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * Fetch remote change identity without downloading the body.
 * Any failure yields EMPTY_REMOTE_META: "no signal", so the run proceeds.
 */
export async function probeRemote(url: string, timeoutMs: number): Promise<RemoteMeta> {
  try {
    const res = await fetch(url, {
      method: "HEAD",
      redirect: "follow",
      headers: { "User-Agent": USER_AGENT },
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!res.ok) {
      log.fetch.warn({ url, status: res.status }, "probe returned non-success status");
      return { ...EMPTY_REMOTE_META };
    }
    const meta: RemoteMeta = {
      etag: (res.headers.get("etag") ?? "").trim(),
      lastModified: (res.headers.get("last-modified") ?? "").trim(),
      contentLength: parseContentLength(res.headers.get("content-length")),
    };
    log.fetch.debug({ url, ...meta }, "probe complete");
    return meta;
  } catch (err) {
    log.fetch.warn({ url, err: describeError(err) }, "probe failed");
    return { ...EMPTY_REMOTE_META };
  }
}

// ─── Hashing ────────────────────────────────────────────────────

/** Stream a SHA-256 digest of a file. */
export async function hashFile(path: string): Promise<FetchResult> {
  const hash = createHash("sha256");
  let bytes = 0;
  for await (const chunk of createReadStream(path)) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    hash.update(buf);
    bytes += buf.byteLength;
  }
  return { sha256: hash.digest("hex"), bytesWritten: bytes };
}

/** Size of a regular file, or null when it does not exist. */
export async function fileSize(path: string): Promise<number | null> {
  try {
    const info = await stat(path);
    return info.isFile() ? info.size : null;
  } catch {
    return null;
  }
}

// ─── Download ───────────────────────────────────────────────────

/** Pass-through that feeds every chunk into a running digest. */
function digesting(hash: Hash, counter: { bytes: number }): Transform {
  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      hash.update(chunk);
      counter.bytes += chunk.byteLength;
      callback(null, chunk);
    },
  });
}

function tempPathFor(destPath: string): string {
  const suffix = `${process.pid}.${randomBytes(4).toString("hex")}.part`;
  return join(dirname(destPath), `.${basename(destPath)}.${suffix}`);
}

/**
 * Stream `url` to `destPath` via a same-directory temp file and atomic rename.
 * The digest is computed while writing.
 */
export async function fetchArtifact(url: string, destPath: string, options: FetchOptions): Promise<FetchResult> {
  await mkdir(dirname(destPath), { recursive: true });
  const tmpPath = tempPathFor(destPath);

  log.fetch.info({ url, destPath }, "download starting");

  const hash = createHash("sha256");
  const counter = { bytes: 0 };

  try {
    const res = await fetch(url, {
      redirect: "follow",
      headers: { "User-Agent": USER_AGENT },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    if (!res.ok) {
      throw new Error(`HTTP ${res.status} ${res.statusText}`.trim());
    }
    if (res.body === null) {
      throw new Error("response has no body");
    }

    await pipeline(Readable.fromWeb(res.body), digesting(hash, counter), createWriteStream(tmpPath));
    await rename(tmpPath, destPath);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw new ImportError(ImportErrorCode.FETCH_FAILED, `download failed: ${describeError(err)}`, {
      detail: url,
      cause: err,
    });
  }

  const bytesWritten = counter.bytes;
  const expected = options.expectedLength ?? null;
  if (expected !== null && expected !== bytesWritten) {
    log.fetch.warn({ url, expected, bytesWritten }, "content-length mismatch");
  }

  const result = { sha256: hash.digest("hex"), bytesWritten };
  log.fetch.info({ destPath, ...result }, "download complete");
  return result;
}

/**
 * Reuse an existing artifact above the size floor, otherwise download it.
 * The floor is a cost heuristic; pair with the change detector for freshness.
 */
export async function ensureArtifact(
  url: string,
  destPath: string,
  options: EnsureArtifactOptions,
): Promise<ArtifactResult> {
  const existing = await fileSize(destPath);
  if (existing !== null && options.allowReuse === false) {
    log.fetch.info({ destPath, bytes: existing }, "upstream changed, replacing existing artifact");
  } else if (existing !== null && existing > options.minReuseBytes) {
    log.fetch.info({ destPath, bytes: existing }, "artifact exists, skipping download");
    const digest = await hashFile(destPath);
    return { path: destPath, reused: true, ...digest };
  }

  const fetched = await fetchArtifact(url, destPath, options);
  return { path: destPath, reused: false, ...fetched };
}
