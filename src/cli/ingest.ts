import chalk from "chalk";
import { ingestZip } from "../corpus/ingest.js";
import type { IngestResult } from "../corpus/ingest.js";
import type { Logger } from "../utils/logger.js";

export interface IngestCommandOptions {
  zip: string;
  dest: string;
  logger: Logger;
  print?: (line: string) => void;
}

/**
 * Unzip a policy archive into the data directory.
 */
export async function runIngest(options: IngestCommandOptions): Promise<number> {
  const { zip, dest, logger } = options;
  const print = options.print ?? ((line: string) => console.log(line));

  let result: IngestResult;
  try {
    result = await ingestZip(zip, dest);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  logger.debug(`ingest: ${result.files.length} file(s) written`);
  print(`Unzipped ${chalk.blue(result.zipPath)} -> ${chalk.blue(result.dest)}`);
  return 0;
}
