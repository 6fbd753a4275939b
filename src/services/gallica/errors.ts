/**
 * Gallica Error Classes
 *
 * FAIL-FAST: These errors propagate to the tool layer unchanged.
 * SnippetUnavailableError is the one exception: callers turn it into an empty list.
 */

export type GallicaErrorCategory =
  | 'MALFORMED_QUERY'
  | 'INVALID_IDENTIFIER'
  | 'INVALID_PAGE'
  | 'REMOTE_ERROR'
  | 'PARSE_ERROR'
  | 'SNIPPET_UNAVAILABLE'
  | 'REQUEST_TIMEOUT';

export class GallicaError extends Error {
  constructor(
    message: string,
    public readonly category: GallicaErrorCategory
  ) {
    super(message);
    this.name = 'GallicaError';
  }
}

/**
 * Query text that does not follow the boolean/phrase grammar.
 * Never repaired silently.
 */
export class MalformedQueryError extends GallicaError {
  constructor(
    message: string,
    public readonly position?: number
  ) {
    super(position === undefined ? message : `${message} (at offset ${position})`, 'MALFORMED_QUERY');
    this.name = 'MalformedQueryError';
  }
}

export class InvalidIdentifierError extends GallicaError {
  constructor(public readonly identifier: string) {
    super(
      `Not a Gallica ARK identifier: "${identifier}". Expected e.g. ark:/12148/bpt6k5619759j`,
      'INVALID_IDENTIFIER'
    );
    this.name = 'InvalidIdentifierError';
  }
}

export class InvalidPageError extends GallicaError {
  constructor(
    message: string,
    public readonly page: number,
    public readonly pageSize: number
  ) {
    super(message, 'INVALID_PAGE');
    this.name = 'InvalidPageError';
  }
}

/**
 * Non-2xx answer, SRU diagnostic, or network failure (status 0)
 */
export class RemoteError extends GallicaError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: string
  ) {
    super(message, 'REMOTE_ERROR');
    this.name = 'RemoteError';
  }
}

/**
 * Envelope that cannot be interpreted (bad XML, unexpected root)
 */
export class ParseError extends GallicaError {
  constructor(message: string) {
    super(message, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

/**
 * Document has no searchable OCR. Not a transport failure.
 */
export class SnippetUnavailableError extends GallicaError {
  constructor(public readonly identifier: string) {
    super(`No searchable OCR text for ${identifier}`, 'SNIPPET_UNAVAILABLE');
    this.name = 'SnippetUnavailableError';
  }
}

export class TimeoutError extends GallicaError {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message, 'REQUEST_TIMEOUT');
    this.name = 'TimeoutError';
  }
}
