/**
 * Error hierarchy for failed TVMaze requests.
 *
 * Every error carries the request URL. HTTP failures also carry the response
 * status, which the logger's error serializer uses to decide whether a stack
 * trace is worth keeping.
 */

export class TvmazeError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'TvmazeError'

    // Fix prototype chain – important after TS → JS down-emit
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/** Non-2xx response other than 404 */
export class TvmazeHttpError extends TvmazeError {
  constructor(
    message: string,
    url: string,
    public readonly status: number,
  ) {
    super(message, url)
    this.name = 'TvmazeHttpError'
  }
}

/** Network failure, DNS error or request timeout */
export class TvmazeRequestError extends TvmazeError {
  constructor(message: string, url: string, cause: unknown) {
    super(message, url, { cause })
    this.name = 'TvmazeRequestError'
  }
}

/** 2xx response whose body is not valid JSON */
export class TvmazeParseError extends TvmazeError {
  constructor(
    message: string,
    url: string,
    public readonly responseText: string,
    cause: unknown,
  ) {
    super(message, url, { cause })
    this.name = 'TvmazeParseError'
  }
}

export function isTvmazeError(value: unknown): value is TvmazeError {
  return value instanceof TvmazeError
}
