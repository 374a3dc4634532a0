/**
 * Evernote note-store types and error handling.
 *
 * Plain records exchanged with the {@link NoteStore} interface, plus the
 * error hierarchy every SDK rejection is mapped onto.
 */

// --- Records ---

/** A notebook in the user's account. */
export interface Notebook {
  guid: string;
  name: string;
  /** Whether new notes land here when no notebook is given. */
  defaultNotebook: boolean;
}

/** Everything needed to create a note. */
export interface NoteDraft {
  title: string;
  /** ENML document body. */
  content: string;
  /** Target notebook; the account default when omitted. */
  notebookGuid?: string;
  tagNames?: string[];
}

/** A note as returned by the service after creation. */
export interface CreatedNote {
  guid: string;
  title: string;
}

/** The account that owns the developer token. */
export interface AccountUser {
  username: string;
  email: string;
}

/**
 * Minimal note-store interface expected by the connector.
 *
 * Decouples the connector from the Evernote SDK so it can be faked in
 * tests.
 */
export interface NoteStore {
  listNotebooks(): Promise<Notebook[]>;
  createNotebook(name: string): Promise<Notebook>;
  createNote(draft: NoteDraft): Promise<CreatedNote>;
  getUser(): Promise<AccountUser>;
}

// --- Error codes ---

/**
 * Symbolic names of the EDAM error codes.
 * @see https://dev.evernote.com/doc/reference/Errors.html#Enum_EDAMErrorCode
 */
export const EDAM_ERROR_CODES: Readonly<Record<number, string>> = {
  1: 'UNKNOWN',
  2: 'BAD_DATA_FORMAT',
  3: 'PERMISSION_DENIED',
  4: 'INTERNAL_ERROR',
  5: 'DATA_REQUIRED',
  6: 'LIMIT_REACHED',
  7: 'QUOTA_REACHED',
  8: 'INVALID_AUTH',
  9: 'AUTH_EXPIRED',
  10: 'DATA_CONFLICT',
  11: 'ENML_VALIDATION',
  12: 'SHARD_UNAVAILABLE',
  13: 'LEN_TOO_SHORT',
  14: 'LEN_TOO_LONG',
  15: 'TOO_FEW',
  16: 'TOO_MANY',
  17: 'UNSUPPORTED_OPERATION',
  18: 'TAKEN_DOWN',
  19: 'RATE_LIMIT_REACHED',
};

export const RATE_LIMIT_REACHED = 19;

// --- Error Types ---

/** Base error class for failures reported by Evernote. */
export class EvernoteError extends Error {
  constructor(
    message: string,
    public readonly errorCode?: number,
  ) {
    super(message);
    this.name = 'EvernoteError';
  }

  /** Symbolic EDAM code name, e.g. `INVALID_AUTH`. */
  get codeName(): string | undefined {
    return this.errorCode === undefined ? undefined : EDAM_ERROR_CODES[this.errorCode];
  }
}

/** Error thrown when the account's API rate limit is exhausted. */
export class EvernoteRateLimitError extends EvernoteError {
  constructor(
    message: string,
    /** Seconds until the limit resets. */
    public readonly rateLimitDuration: number,
  ) {
    super(message, RATE_LIMIT_REACHED);
    this.name = 'EvernoteRateLimitError';
  }
}

/** Error thrown when the service could not be reached at all. */
export class EvernoteConnectionError extends EvernoteError {
  constructor(
    message: string,
    public readonly systemCode: string,
  ) {
    super(message);
    this.name = 'EvernoteConnectionError';
  }
}

/** Error thrown when asked to save a chat with no content. */
export class EmptyChatError extends Error {
  constructor(message = 'chat content cannot be empty') {
    super(message);
    this.name = 'EmptyChatError';
  }
}

// --- Mapping ---

/**
 * Map a rejection from the Evernote SDK onto the error hierarchy.
 *
 * EDAM exceptions arrive as plain objects carrying a numeric `errorCode`
 * (system exceptions add `message` and, for rate limits,
 * `rateLimitDuration`). Node system errors such as `ECONNREFUSED` become
 * {@link EvernoteConnectionError}. Anything else is returned unchanged so
 * the caller can rethrow it.
 *
 * @param action - What was being attempted, e.g. `create note`.
 */
export function toEvernoteError(error: unknown, action: string): unknown {
  if (error instanceof EvernoteError) {
    return error;
  }

  if (typeof error === 'object' && error !== null && 'errorCode' in error) {
    const code = typeof error.errorCode === 'number' ? error.errorCode : 1;
    const name = EDAM_ERROR_CODES[code] ?? `UNKNOWN_${code}`;
    const detail =
      'message' in error && typeof error.message === 'string' && error.message
        ? error.message
        : `${name} (${code})`;
    const message = `Failed to ${action}: ${detail}`;

    if (
      code === RATE_LIMIT_REACHED &&
      'rateLimitDuration' in error &&
      typeof error.rateLimitDuration === 'number'
    ) {
      return new EvernoteRateLimitError(message, error.rateLimitDuration);
    }
    return new EvernoteError(message, code);
  }

  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return new EvernoteConnectionError(
      `Could not reach Evernote to ${action}: ${error.message}`,
      error.code,
    );
  }

  return error;
}
