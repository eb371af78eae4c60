/**
 * Export of stored full texts to disk.
 *
 * Each full text is written as `<sanitized doi>.<file kind>`. When that name is
 * taken by a file with different content, a letter is appended (`a`, `b`, ...);
 * when it is taken by a file with the same content, the export is skipped.
 */

import { createHash } from "node:crypto";
import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createSilentLogger, type Logger } from "./logger.js";
import type { FulltextStore } from "./store/types.js";

export class FileWithSameContentError extends Error {
  constructor(readonly filePath: string) {
    super(`File ${filePath} has same contents.`);
    this.name = "FileWithSameContentError";
  }
}

export interface ExportSummary {
  written: string[];
  skipped: string[];
}

function md5(data: Uint8Array): string {
  return createHash("md5").update(data).digest("hex");
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
}

function nextLetter(letter: string): string {
  return letter === "" ? "a" : String.fromCharCode(letter.charCodeAt(0) + 1);
}

/** File system friendly base name for a DOI, e.g. "10.1234_abc.def". */
export function doiBasename(doi: string): string {
  return doi.replace(/[/\\:*?"<>|\s]+/g, "_");
}

/**
 * Pick a free file name `<basename><letter>.<ext>` for `content`.
 *
 * @throws FileWithSameContentError when a candidate already holds identical content
 */
export async function determineFilename(
  basename: string,
  ext: string,
  content: Uint8Array,
  extraLetter = ""
): Promise<string> {
  const filePath = `${basename}${extraLetter}.${ext}`;
  if (!(await exists(filePath))) return filePath;

  if (md5(await readFile(filePath)) === md5(content)) {
    throw new FileWithSameContentError(filePath);
  }
  return await determineFilename(basename, ext, content, nextLetter(extraLetter));
}

/**
 * Write every stored full text into `outDir`.
 * Files whose identical content is already there are skipped.
 */
export async function exportFulltexts(
  store: FulltextStore,
  outDir: string,
  logger: Logger = createSilentLogger()
): Promise<ExportSummary> {
  await mkdir(outDir, { recursive: true });
  const summary: ExportSummary = { written: [], skipped: [] };

  for (const record of await store.listFulltexts()) {
    if (!record.content) continue;
    const ext = record.contentType ?? "unknown";

    try {
      const filePath = await determineFilename(join(outDir, doiBasename(record.doi)), ext, record.content);
      await writeFile(filePath, record.content);
      summary.written.push(filePath);
      logger.info("fulltext_exported", { doi: record.doi, file: filePath });
    } catch (err) {
      if (!(err instanceof FileWithSameContentError)) throw err;
      summary.skipped.push(err.filePath);
      logger.info("fulltext_export_skipped", { doi: record.doi, file: err.filePath });
    }
  }

  return summary;
}
