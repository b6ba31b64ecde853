/** Network or HTTP failure while reaching a remote page or API. */
export class FetchError extends Error {
  name = "FetchError";

  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** A wiki page no longer has the structure the collector expects. */
export class ParseError extends Error {
  name = "ParseError";

  constructor(message: string, readonly page: string) {
    super(message);
  }
}

/** The signing checker could not produce an answer for one firmware. */
export class CheckerUnavailable extends Error {
  name = "CheckerUnavailable";

  constructor(
    message: string,
    readonly identifier: string,
    readonly build: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Writing the catalog to one of its targets failed; the previous copy is intact. */
export class PublishError extends Error {
  name = "PublishError";

  constructor(message: string, readonly target: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
