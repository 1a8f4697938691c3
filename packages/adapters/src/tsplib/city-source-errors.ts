export type CitySourceErrorCode = 'source_unreadable' | 'source_malformed';

export abstract class CitySourceError extends Error {
  abstract readonly code: CitySourceErrorCode;

  constructor(
    message: string,
    readonly source: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The source could not be read at all (missing file, permissions, …). */
export class CitySourceUnreadableError extends CitySourceError {
  readonly code = 'source_unreadable' as const;
}

/** The source was read but does not describe a valid city collection. */
export class CitySourceMalformedError extends CitySourceError {
  readonly code = 'source_malformed' as const;

  constructor(
    message: string,
    source: string,
    /** 1-based line number, when the problem is tied to one line. */
    readonly line?: number,
  ) {
    super(line === undefined ? message : `${message} (line ${line})`, source);
  }
}
