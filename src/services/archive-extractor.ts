/**
 * archive-extractor.ts — ZIP extraction and encoding normalization
 *
 * ULS Callbook — FCC amateur license registry importer
 *
 * The ULS .dat files are Latin-1. Each extracted file is re-encoded to UTF-8
 * beside itself (`HD.dat` → `HD.dat.utf8`); Latin-1 decoding never fails, and
 * NUL bytes (which PostgreSQL text cannot hold) become U+FFFD.
 */

import { createReadStream, createWriteStream } from "node:fs";
import { mkdir, rename, rm } from "node:fs/promises";
import { basename, join } from "node:path";
import { Transform, type Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import yauzl from "yauzl";
import { ImportError, ImportErrorCode, describeError } from "../errors.js";
import { log } from "../logger.js";

export interface ExtractedFile {
  name: string;
  path: string;
  bytes: number;
}

// ─── ZIP helpers ────────────────────────────────────────────────

function openZip(zipPath: string): Promise<yauzl.ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(zipPath, { lazyEntries: true, autoClose: true }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(err ?? new Error(`could not open ${zipPath}`));
        return;
      }
      resolve(zipfile);
    });
  });
}

function openEntryStream(zipfile: yauzl.ZipFile, entry: yauzl.Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err, stream) => {
      if (err || !stream) {
        reject(err ?? new Error(`could not read ${entry.fileName}`));
        return;
      }
      resolve(stream);
    });
  });
}

async function writeAtomically(source: Readable | AsyncIterable<Buffer>, destPath: string, transform?: Transform): Promise<void> {
  const tmpPath = `${destPath}.${process.pid}.tmp`;
  try {
    if (transform) {
      await pipeline(source, transform, createWriteStream(tmpPath));
    } else {
      await pipeline(source, createWriteStream(tmpPath));
    }
    await rename(tmpPath, destPath);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}

/**
 * Extract the named entries (matched by base name, case-insensitive) into
 * `destDir`, overwriting earlier extractions. Entries not asked for are skipped.
 */
export async function extractEntries(
  zipPath: string,
  destDir: string,
  wanted: readonly string[],
): Promise<Map<string, ExtractedFile>> {
  await mkdir(destDir, { recursive: true });
  log.fetch.info({ zipPath, destDir }, "extracting archive");

  let zipfile: yauzl.ZipFile;
  try {
    zipfile = await openZip(zipPath);
  } catch (err) {
    throw new ImportError(ImportErrorCode.EXTRACT_FAILED, `extract failed: ${describeError(err)}`, {
      detail: zipPath,
      cause: err,
    });
  }

  const found = new Map<string, ExtractedFile>();

  return new Promise((resolve, reject) => {
    const fail = (err: unknown): void => {
      zipfile.close();
      reject(
        new ImportError(ImportErrorCode.EXTRACT_FAILED, `extract failed: ${describeError(err)}`, {
          detail: zipPath,
          cause: err,
        }),
      );
    };

    zipfile.on("error", fail);
    zipfile.on("end", () => resolve(found));
    zipfile.on("entry", (entry: yauzl.Entry) => {
      const entryName = basename(entry.fileName);
      const name = wanted.find((w) => w.toLowerCase() === entryName.toLowerCase());
      if (!name || entry.fileName.endsWith("/")) {
        zipfile.readEntry();
        return;
      }

      const path = join(destDir, name);
      openEntryStream(zipfile, entry)
        .then((stream) => writeAtomically(stream, path))
        .then(() => {
          found.set(name, { name, path, bytes: entry.uncompressedSize });
          zipfile.readEntry();
        })
        .catch(fail);
    });

    zipfile.readEntry();
  });
}

// ─── Encoding normalization ─────────────────────────────────────

/** Decode Latin-1 bytes; NUL becomes U+FFFD. */
export function decodeLatin1(chunk: Buffer): string {
  return chunk.toString("latin1").replace(/\u0000/g, "\uFFFD");
}

function latin1ToUtf8(): Transform {
  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      callback(null, Buffer.from(decodeLatin1(chunk), "utf8"));
    },
  });
}

/** Re-encode a Latin-1 file to UTF-8 at `<src>.utf8`. */
export async function normalizeToUtf8(srcPath: string): Promise<string> {
  const destPath = `${srcPath}.utf8`;
  log.fetch.debug({ src: basename(srcPath), dest: basename(destPath) }, "re-encoding to utf-8");
  try {
    await writeAtomically(createReadStream(srcPath), destPath, latin1ToUtf8());
  } catch (err) {
    throw new ImportError(ImportErrorCode.EXTRACT_FAILED, `re-encode failed: ${describeError(err)}`, {
      detail: basename(srcPath),
      cause: err,
    });
  }
  return destPath;
}

/**
 * Extract the required files, fail if any is missing, and normalize each.
 * Resolves to UTF-8 paths keyed by the requested file name.
 */
export async function prepareSourceFiles(
  zipPath: string,
  extractDir: string,
  required: readonly string[],
): Promise<Map<string, string>> {
  const extracted = await extractEntries(zipPath, extractDir, required);

  for (const name of required) {
    const file = extracted.get(name);
    if (!file) {
      throw new ImportError(ImportErrorCode.EXTRACT_FAILED, `missing ${name} after extract`, {
        detail: basename(zipPath),
      });
    }
    log.fetch.info({ file: file.path, bytes: file.bytes }, "found source file");
  }

  const normalized = new Map<string, string>();
  for (const name of required) {
    normalized.set(name, await normalizeToUtf8(join(extractDir, name)));
  }
  return normalized;
}
