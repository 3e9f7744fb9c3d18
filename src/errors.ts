export type ErrorCode =
  | 'invalid_level'
  | 'empty_level_spec'
  | 'duplicate_level'
  | 'missing_boxer'
  | 'session_consumed'
  | 'no_content'
  | 'invalid_options'
  | 'malformed_data'
  | 'backend';

export type ErrorDetails = Record<string, unknown>;

export class OcrNestError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: ErrorDetails;

  constructor(code: ErrorCode, message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class InvalidLevelError extends OcrNestError {
  constructor(level: string, message = `Unknown level: ${level}`, details?: ErrorDetails) {
    super('invalid_level', message, { level, ...details });
  }
}

export class EmptyLevelSpecError extends OcrNestError {
  constructor(message = 'At least one level is required') {
    super('empty_level_spec', message);
  }
}

export class DuplicateLevelError extends OcrNestError {
  constructor(level: string) {
    super('duplicate_level', `Level declared more than once: ${level}`, { level });
  }
}

export class MissingBoxerError extends OcrNestError {
  constructor(level: string) {
    super('missing_boxer', `No group boxer for level: ${level}`, { level });
  }
}

export class SessionConsumedError extends OcrNestError {
  constructor(message = 'Grouping session already ran; cursors are single-use') {
    super('session_consumed', message);
  }
}

/** The backend recognized nothing at all, as opposed to an empty document */
export class NoContentError extends OcrNestError {
  constructor(message = 'No recognizable content', details?: ErrorDetails) {
    super('no_content', message, details);
  }
}

export class InvalidOptionsError extends OcrNestError {
  constructor(message = 'Invalid OCR options', details?: ErrorDetails) {
    super('invalid_options', message, details);
  }
}

/** Backend output that cannot be read as a page (rows without parents, etc.) */
export class MalformedDataError extends OcrNestError {
  constructor(message: string, details?: ErrorDetails) {
    super('malformed_data', message, details);
  }
}

export class OcrBackendError extends OcrNestError {
  constructor(message: string, cause: unknown, details?: ErrorDetails) {
    super('backend', message, details, { cause });
  }
}
