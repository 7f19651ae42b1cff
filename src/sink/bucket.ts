import type { Bucket } from '../storage/types.js';
import { firstFreeName, reportName } from './naming.js';
import type { ReportSink } from './types.js';

export const BUCKET_REPORT_PREFIX = 'RELATORIO';

/** Reports uploaded flat to the output bucket as markdown. */
export class BucketReportSink implements ReportSink {
  constructor(
    private bucket: Bucket,
    private now: () => Date = () => new Date(),
  ) {}

  get description(): string {
    return `bucket:${this.bucket.name}`;
  }

  async write(owner: string, sourceFilename: string, content: string): Promise<string> {
    const name = await firstFreeName(
      reportName(BUCKET_REPORT_PREFIX, owner, sourceFilename, this.now()),
      (candidate) => this.bucket.exists(candidate),
    );
    await this.bucket.upload(name, Buffer.from(content, 'utf-8'), 'text/markdown');
    return `${this.bucket.name}/${name}`;
  }
}
