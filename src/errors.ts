export type SnapshotErrorCode =
  | 'INVALID_DATE_FORMAT'
  | 'MASTER_LIST_MISSING'
  | 'MASTER_LIST_UNREADABLE'
  | 'QUERY_FAILED'
  | 'EMPTY_WINDOW_RESULT'
  | 'SNAPSHOT_LIST_MISSING';

/**
 * Base class for every failure the tool reports to an operator.
 * `hint` names the corrective action and is printed under the message.
 */
export class SnapshotError extends Error {
  readonly code: SnapshotErrorCode;
  readonly hint: string | null;

  constructor(code: SnapshotErrorCode, message: string, options?: { hint?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.hint = options?.hint ?? null;
  }
}

export class InvalidDateFormatError extends SnapshotError {
  readonly input: string;

  constructor(input: string) {
    super('INVALID_DATE_FORMAT', `Invalid target date "${input}"`, {
      hint: 'Use the YYYYMMDD format, e.g. 20191115',
    });
    this.input = input;
  }
}

export class MasterListMissingError extends SnapshotError {
  readonly path: string;

  constructor(path: string) {
    super('MASTER_LIST_MISSING', `Master list not found: ${path}`, {
      hint: 'Build the master list for this domain first (see the "dedupe" command)',
    });
    this.path = path;
  }
}

export class MasterListUnreadableError extends SnapshotError {
  readonly path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super('MASTER_LIST_UNREADABLE', `Master list ${path} is unreadable: ${reason}`, {
      hint: 'Rebuild the master list; it must be a JSON array of objects with an "original" URL',
      cause,
    });
    this.path = path;
  }
}

export class QueryFailedError extends SnapshotError {
  readonly urlPattern: string;

  constructor(urlPattern: string, reason: string, cause?: unknown) {
    super('QUERY_FAILED', `Archive index query for ${urlPattern} failed: ${reason}`, {
      hint: 'Check network access to the archive index and retry later',
      cause,
    });
    this.urlPattern = urlPattern;
  }
}

export class EmptyWindowResultError extends SnapshotError {
  constructor(urlPattern: string, from: string, to: string) {
    super('EMPTY_WINDOW_RESULT', `No captures of ${urlPattern} between ${from} and ${to}`, {
      hint: 'Pick another target date or check that the domain is archived',
    });
  }
}

export class SnapshotListMissingError extends SnapshotError {
  readonly path: string;

  constructor(path: string) {
    super('SNAPSHOT_LIST_MISSING', `Snapshot list not found: ${path}`, {
      hint: 'Run the "find" command for this domain and date first',
    });
    this.path = path;
  }
}
