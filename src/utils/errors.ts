import { AllSourcesExhaustedError, isGasEstimationError } from '../gas/errors';

export type SerializedError = {
  name?: string;
  code?: unknown;
  status?: unknown;
  message?: string;
};

export const serializeError = (error: unknown): SerializedError => {
  if (!error || typeof error !== 'object') {
    return { message: String(error) };
  }
  if (isGasEstimationError(error)) {
    return {
      name: error.name,
      code: error.code,
      status: 'status' in error ? error.status : undefined,
      message: error.message,
    };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { message: String(error) };
};

export interface SourceFailureSummary {
  index: number;
  source: string;
  code: string;
  message: string;
}

export const summarizeFailures = (error: AllSourcesExhaustedError): SourceFailureSummary[] =>
  error.failures.map(({ index, source, error: cause }) => ({
    index,
    source,
    code: cause.code,
    message: cause.message,
  }));
