export type GasEstimationErrorCode =
  | 'TRANSPORT'
  | 'PARSE'
  | 'TIMEOUT'
  | 'ALL_SOURCES_EXHAUSTED';

export class GasEstimationError extends Error {
  constructor(
    public readonly code: GasEstimationErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'GasEstimationError';
  }
}

/** Network or HTTP failure while reaching an oracle. */
export class TransportFailure extends GasEstimationError {
  public readonly status?: number;
  public readonly aborted: boolean;

  constructor(
    message: string,
    options?: { cause?: unknown; status?: number; aborted?: boolean },
  ) {
    super('TRANSPORT', message, { cause: options?.cause });
    this.name = 'TransportFailure';
    this.status = options?.status;
    this.aborted = options?.aborted ?? false;
  }
}

/** The oracle answered, but not with something we can read as a gas price. */
export class ParseFailure extends GasEstimationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PARSE', message, options);
    this.name = 'ParseFailure';
  }
}

export class TimeoutFailure extends GasEstimationError {
  constructor(
    public readonly source: string,
    public readonly allottedMs: number,
  ) {
    super('TIMEOUT', `${source} did not respond within ${allottedMs}ms`);
    this.name = 'TimeoutFailure';
  }
}

export interface SourceFailure {
  /** Position of the source in the priority list. */
  index: number;
  source: string;
  error: GasEstimationError;
}

export class AllSourcesExhaustedError extends GasEstimationError {
  constructor(public readonly failures: SourceFailure[]) {
    super(
      'ALL_SOURCES_EXHAUSTED',
      `All gas price sources failed: ${failures
        .map((f) => `[${f.index}] ${f.source}: ${f.error.message}`)
        .join('; ')}`,
    );
    this.name = 'AllSourcesExhaustedError';
  }
}

export function isGasEstimationError(e: unknown): e is GasEstimationError {
  return e instanceof GasEstimationError;
}

/** Wraps anything a source rejected with into a `GasEstimationError`. */
export function toGasEstimationError(e: unknown): GasEstimationError {
  if (isGasEstimationError(e)) return e;
  const message = e instanceof Error ? e.message : String(e);
  return new TransportFailure(message, { cause: e });
}
