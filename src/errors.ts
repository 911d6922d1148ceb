export type FlagErrorKind = 'malformed-input' | 'missing-data' | 'configuration';

export class FlagEngineError extends Error {
  readonly kind: FlagErrorKind;

  constructor(kind: FlagErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** A field value that cannot be normalized (unparseable URL, non-string name). */
export class MalformedInputError extends FlagEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('malformed-input', message, options);
  }
}

/** Data a comparison needs is absent, e.g. a linked parent that never resolved. */
export class MissingDataError extends FlagEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('missing-data', message, options);
  }
}

/** Fatal at startup: the gate cannot run without its disallow-list. */
export class ConfigurationError extends FlagEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('configuration', message, options);
  }
}

export function describeFault(err: unknown): string {
  if (err instanceof FlagEngineError) return `${err.kind}: ${err.message}`;
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
