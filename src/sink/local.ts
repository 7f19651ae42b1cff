import fs from 'node:fs';
import fsp from 'node:fs/promises';
import path from 'node:path';
import { firstFreeName, reportName } from './naming.js';
import type { ReportSink } from './types.js';

export const LOCAL_REPORT_PREFIX = 'AUDITORIA';

/**
 * Write file atomically using write-to-temp-then-rename pattern.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fsp.mkdir(dir, { recursive: true });

  // Create temp file in same directory (required for atomic rename)
  const tempPath = path.join(dir, `.tmp-${process.pid}-${Date.now()}`);

  try {
    await fsp.writeFile(tempPath, content, 'utf-8');
    await fsp.rename(tempPath, filePath);
  } catch (err) {
    await fsp.rm(tempPath, { force: true });
    throw err;
  }
}

/** Reports under `<outputRoot>/<owner>/`. */
export class LocalReportSink implements ReportSink {
  constructor(
    private outputRoot: string,
    private now: () => Date = () => new Date(),
  ) {}

  get description(): string {
    return `local:${this.outputRoot}`;
  }

  async write(owner: string, sourceFilename: string, content: string): Promise<string> {
    const dir = path.join(this.outputRoot, owner);
    const name = await firstFreeName(
      reportName(LOCAL_REPORT_PREFIX, owner, sourceFilename, this.now()),
      async (candidate) => fs.existsSync(path.join(dir, candidate)),
    );
    const filePath = path.join(dir, name);
    await writeFileAtomic(filePath, content);
    return filePath;
  }
}
