import { ProviderUnavailableError } from '../../../domain/errors/ExtractionErrors.js';

const statusOf = (error: unknown): number | undefined => {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }

  return undefined;
};

export const notConfigured = (provider: string, variable: string): ProviderUnavailableError =>
  new ProviderUnavailableError(provider, 'NOT_CONFIGURED', `set ${variable} to enable this provider`);

/**
 * Wraps an SDK failure so callers can tell a transport problem from a bad response.
 */
export const transportFailure = (provider: string, error: unknown): ProviderUnavailableError => {
  if (error instanceof ProviderUnavailableError) {
    return error;
  }

  const message = error instanceof Error ? error.message : 'Unknown error';
  return new ProviderUnavailableError(provider, 'TRANSPORT', message, { status: statusOf(error), cause: error });
};
