export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Raised by the discovery engine once a page of the capture index keeps failing
 * after its retry budget. Candidates yielded before the failure stay valid.
 */
export class DiscoveryPageFailure extends Error {
  readonly pagesFetched: number;
  readonly candidatesYielded: number;
  readonly attempts: number;

  constructor(message: string, details: { pagesFetched: number; candidatesYielded: number; attempts: number }) {
    super(message);
    this.name = "DiscoveryPageFailure";
    this.pagesFetched = details.pagesFetched;
    this.candidatesYielded = details.candidatesYielded;
    this.attempts = details.attempts;
  }
}

export class StateFileCorruptError extends Error {
  readonly filePath: string;
  readonly lineNumber: number;

  constructor(filePath: string, lineNumber: number, reason: string) {
    super(`Corrupt state file ${filePath} at line ${lineNumber}: ${reason}`);
    this.name = "StateFileCorruptError";
    this.filePath = filePath;
    this.lineNumber = lineNumber;
  }
}

/** The response body stopped arriving part way through. */
export class ResponseBodyError extends Error {
  constructor(cause: unknown) {
    super(`response body read failed: ${errorMessage(cause)}`, { cause });
    this.name = "ResponseBodyError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
