/** Base class for every failure the sync core reports */
export class TaskSyncError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A task line whose marker/priority/name shape does not parse. Aborts the whole document. */
export class GrammarMismatchError extends TaskSyncError {
  readonly line: string;
  readonly lineNumber: number | null;

  constructor(line: string, lineNumber: number | null = null) {
    const where = lineNumber != null ? `line ${lineNumber}: ` : '';
    super(`${where}'${line}' does not match the task line format`);
    this.line = line;
    this.lineNumber = lineNumber;
  }
}

/** A store record that cannot be decoded. Aborts the whole load. */
export class StoreRecordMalformedError extends TaskSyncError {
  readonly lineNumber: number;
  readonly reason: string;

  constructor(lineNumber: number, reason: string) {
    super(`Malformed task record on line ${lineNumber}: ${reason}`);
    this.lineNumber = lineNumber;
    this.reason = reason;
  }
}
