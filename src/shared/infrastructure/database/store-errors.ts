import { StoreUnavailableError } from '../../domain/errors';

/**
 * Error codes that mean "the database could not be reached", as opposed to
 * a query that reached it and failed.
 *
 * - Node socket errors (ECONNREFUSED, ...)
 * - postgres.js connection lifecycle codes (CONNECTION_CLOSED, ...)
 * - SQLSTATE class 08 (connection exception), 57P01-57P03 (shutdown), 53300
 */
const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'CONNECT_TIMEOUT',
  '57P01',
  '57P02',
  '57P03',
  '53300',
]);

function errorCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : null;
  }
  return null;
}

export function isConnectionError(error: unknown): boolean {
  const code = errorCode(error);
  if (code === null) {
    return false;
  }
  return CONNECTION_ERROR_CODES.has(code) || code.startsWith('08');
}

/**
 * Run a store operation, translating connectivity failures into
 * StoreUnavailableError. Other errors propagate untouched.
 */
export async function withStore<T>(
  operation: string,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (isConnectionError(error)) {
      throw new StoreUnavailableError(operation, error);
    }
    throw error;
  }
}
