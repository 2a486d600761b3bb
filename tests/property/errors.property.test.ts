/**
 * Property-based tests for the error hierarchy
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  ApiError,
  AuthenticationError,
  ConnectionClosedError,
  ConnectorError,
  ErrorCode,
  InvalidConfigError,
  InvalidCursorStateError,
  MissingRequiredFieldError,
  QueryError,
  QueryTimeoutError,
  TokenExpiredError,
  isApiError,
  isAuthenticationError,
  isConnectionClosedError,
  isConnectorError,
  isInvalidConfigError,
  isInvalidCursorStateError,
  isMissingRequiredFieldError,
  isQueryError,
  isQueryTimeoutError,
  isTokenExpiredError,
} from '../../src/index.js';

const errorFactories = [
  { create: () => new AuthenticationError(), guard: isAuthenticationError, name: 'AuthenticationError' },
  { create: () => new TokenExpiredError(), guard: isTokenExpiredError, name: 'TokenExpiredError' },
  { create: () => new ApiError(), guard: isApiError, name: 'ApiError' },
  { create: () => new QueryError('failed', 'q-1'), guard: isQueryError, name: 'QueryError' },
  { create: () => new QueryTimeoutError('q-1', 3, 900), guard: isQueryTimeoutError, name: 'QueryTimeoutError' },
  {
    create: () => new InvalidCursorStateError('no query'),
    guard: isInvalidCursorStateError,
    name: 'InvalidCursorStateError',
  },
  { create: () => new ConnectionClosedError(), guard: isConnectionClosedError, name: 'ConnectionClosedError' },
  { create: () => new InvalidConfigError('bad'), guard: isInvalidConfigError, name: 'InvalidConfigError' },
  {
    create: () => new MissingRequiredFieldError('loginUrl'),
    guard: isMissingRequiredFieldError,
    name: 'MissingRequiredFieldError',
  },
];

describe('type guards', () => {
  it('each guard recognizes only its own class', () => {
    fc.assert(
      fc.property(fc.constantFrom(...errorFactories), (factory) => {
        const error = factory.create();

        expect(factory.guard(error)).toBe(true);
        expect(isConnectorError(error)).toBe(true);
        expect(error.name).toBe(factory.name);

        for (const other of errorFactories) {
          if (other.name !== factory.name) {
            expect(other.guard(error)).toBe(false);
          }
        }
      }),
      { numRuns: 100 }
    );
  });

  it('reject values that are not connector errors', () => {
    const nonErrors = [null, undefined, 'string', 42, {}, [], new Error('plain')];

    for (const value of nonErrors) {
      expect(isConnectorError(value)).toBe(false);
      for (const factory of errorFactories) {
        expect(factory.guard(value)).toBe(false);
      }
    }
  });
});

describe('error options', () => {
  it('preserve the cause and correlation id', () => {
    fc.assert(
      fc.property(fc.string(), fc.string({ minLength: 1, maxLength: 64 }), (message, correlationId) => {
        const cause = new Error('socket hang up');
        const error = new ApiError(message, { cause, correlationId, statusCode: 503 });

        expect(error.cause).toBe(cause);
        expect(error.correlationId).toBe(correlationId);
        expect(error.toJSON()).toMatchObject({
          name: 'ApiError',
          message,
          code: ErrorCode.API_ERROR,
          statusCode: 503,
          correlationId,
        });
      }),
      { numRuns: 100 }
    );
  });

  it('always report 401 for an expired token', () => {
    fc.assert(
      fc.property(fc.string(), (message) => {
        const error = new TokenExpiredError(message);

        expect(error.statusCode).toBe(401);
        expect(error.code).toBe(ErrorCode.TOKEN_EXPIRED);
        expect(error).toBeInstanceOf(ConnectorError);
      }),
      { numRuns: 50 }
    );
  });

  it('describe the poll ceiling in a query timeout', () => {
    fc.assert(
      fc.property(fc.nat(1_000), fc.nat(600_000), (attempts, elapsedMs) => {
        const error = new QueryTimeoutError('q-1', attempts, elapsedMs);

        expect(error.message).toBe(`Query q-1 did not finish after ${attempts} status checks (${elapsedMs}ms)`);
        expect(error.toJSON()).toMatchObject({ queryId: 'q-1', attempts, elapsedMs });
      }),
      { numRuns: 50 }
    );
  });
});
