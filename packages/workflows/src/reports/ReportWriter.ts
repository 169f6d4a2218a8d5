/**
 * Report Writer
 * =============
 * Persists workflow results as pretty-printed JSON named
 * `<prefix>_<unixSeconds>.json` under the output directory.
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { ClockPort } from '@alphaminer/core';
import { createPackageLogger } from '@alphaminer/utils';
import type { ReportSink } from '../types';

const logger = createPackageLogger('@alphaminer/workflows');

export class ReportWriter implements ReportSink {
  constructor(
    private readonly outputDir: string,
    private readonly clock: ClockPort
  ) {}

  getOutputDir(): string {
    return this.outputDir;
  }

  /**
   * Path a report with this prefix would be written to right now
   */
  pathFor(prefix: string): string {
    const unixSeconds = Math.floor(this.clock.nowMs() / 1000);
    return path.join(this.outputDir, `${prefix}_${unixSeconds}.json`);
  }

  async write(prefix: string, data: unknown): Promise<string> {
    const filePath = this.pathFor(prefix);
    await mkdir(this.outputDir, { recursive: true });
    await writeFile(filePath, JSON.stringify(data, null, 2), 'utf8');
    logger.info('Report saved', { path: filePath });
    return filePath;
  }
}

/**
 * Write a report, logging instead of throwing when the write fails. Returns
 * the path, or null when nothing was written.
 */
export async function tryWriteReport(
  sink: ReportSink | undefined,
  prefix: string,
  data: unknown
): Promise<string | null> {
  if (!sink) {
    return null;
  }
  try {
    return await sink.write(prefix, data);
  } catch (error) {
    logger.error('Failed to save report', error, { prefix });
    return null;
  }
}
