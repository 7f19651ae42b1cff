export interface ReportSink {
  readonly description: string;
  /** Stores a new report and returns where it went. Never overwrites an earlier report. */
  write(owner: string, sourceFilename: string, content: string): Promise<string>;
}
