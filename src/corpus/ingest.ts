import { existsSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import { resolve } from "node:path";
import AdmZip from "adm-zip";

export interface IngestResult {
  zipPath: string;
  dest: string;
  /** Archive entries that were files, in archive order */
  files: string[];
}

/**
 * Unpack a policy archive into a data directory, creating it if needed.
 * Existing files with the same names are overwritten.
 */
export async function ingestZip(zipPath: string, dest: string): Promise<IngestResult> {
  const source = resolve(zipPath);
  const target = resolve(dest);

  if (!existsSync(source)) {
    throw new Error(`ZIP not found: ${source}`);
  }

  await mkdir(target, { recursive: true });
  const zip = new AdmZip(source);
  zip.extractAllTo(target, true);

  return {
    zipPath: source,
    dest: target,
    files: zip
      .getEntries()
      .filter((entry) => !entry.isDirectory)
      .map((entry) => entry.entryName),
  };
}
