/**
 * Error thrown when serialized run record text cannot be turned back
 * into a valid RunRecord.
 */
export class RunRecordParseError extends Error {
  override readonly name = 'RunRecordParseError';
  /** Run id of the offending row, when known */
  readonly runId: string | null;
  readonly issues: string[];

  constructor(issues: string[], runId: string | null = null) {
    const location = runId ? ` for run ${runId}` : '';
    super(`Invalid run record${location}: ${issues.join('; ')}`);
    this.runId = runId;
    this.issues = issues;
    Object.setPrototypeOf(this, RunRecordParseError.prototype);
  }
}
