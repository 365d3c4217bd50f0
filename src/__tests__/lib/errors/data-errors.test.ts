import {
  ConnectionError,
  DataError,
  DataTransformError,
  IntegrityError,
  QueryError,
  isDataError,
  isIntegrityError,
  wrapDatabaseError,
} from '@/lib/errors';
import { logger } from '@/lib/logger';

// Mock the logger
jest.mock('@/lib/logger', () => ({
  logger: {
    sync: {
      error: jest.fn(),
      warn: jest.fn(),
    },
  },
}));

function driverError(message: string, fields: Record<string, string>): Error {
  return Object.assign(new Error(message), fields);
}

describe('DataError classes', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('carries code, retryable flag and cause', () => {
    const cause = new Error('socket hang up');
    const error = new DataError('Test error', { code: 'TEST_CODE', cause });

    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_CODE');
    expect(error.retryable).toBe(false);
    expect(error.cause).toBe(cause);
    expect(error.name).toBe('DataError');
  });

  it('names the failed operation', () => {
    expect(new QueryError('trials.count').message).toBe('Database query failed: trials.count');
    expect(new DataTransformError('alert.filter_criteria').message).toBe(
      'Data transformation failed: alert.filter_criteria'
    );
    expect(new IntegrityError('savedTrials.insert', 'foreign_key').message).toBe(
      'Integrity constraint violated (foreign_key): savedTrials.insert'
    );
  });

  it('marks connection and query failures retryable, integrity failures not', () => {
    expect(new ConnectionError().retryable).toBe(true);
    expect(new QueryError('op').retryable).toBe(true);
    expect(new IntegrityError('op', 'unique').retryable).toBe(false);
  });

  it('logs structured metadata', () => {
    const error = new QueryError('trials.fetchPage', new Error('syntax error'));
    error.log({ route: '/api/trials' });

    expect(logger.sync.error).toHaveBeenCalledWith(
      'Database query failed: trials.fetchPage',
      expect.objectContaining({
        errorCode: 'QUERY_ERROR',
        errorName: 'QueryError',
        retryable: true,
        cause: 'syntax error',
        route: '/api/trials',
      })
    );
  });
});

describe('isIntegrityError', () => {
  it('matches any violation when none is named', () => {
    expect(isIntegrityError(new IntegrityError('op', 'check'))).toBe(true);
  });

  it('narrows to the named violation', () => {
    const error = new IntegrityError('op', 'unique');
    expect(isIntegrityError(error, 'unique')).toBe(true);
    expect(isIntegrityError(error, 'foreign_key')).toBe(false);
  });

  it('rejects other errors', () => {
    expect(isIntegrityError(new QueryError('op'))).toBe(false);
    expect(isIntegrityError(new Error('x'))).toBe(false);
  });
});

describe('wrapDatabaseError', () => {
  it('returns DataErrors unchanged', () => {
    const original = new ConnectionError();
    expect(wrapDatabaseError(original, 'op')).toBe(original);
  });

  it.each([
    ['23505', 'unique'],
    ['23503', 'foreign_key'],
    ['23502', 'not_null'],
    ['23514', 'check'],
  ])('classifies SQLSTATE %s as a %s violation', (code, violation) => {
    const cause = driverError('constraint failed', { code, constraint: 'some_constraint' });
    const wrapped = wrapDatabaseError(cause, 'savedTrials.insert');

    expect(wrapped).toBeInstanceOf(IntegrityError);
    expect(isIntegrityError(wrapped) && wrapped.violation).toBe(violation);
    expect(isIntegrityError(wrapped) && wrapped.constraint).toBe('some_constraint');
    expect(wrapped.cause).toBe(cause);
  });

  it.each(['08006', '57P01', 'ECONNREFUSED', 'ETIMEDOUT'])(
    'classifies code %s as a connection failure',
    (code) => {
      expect(wrapDatabaseError(driverError('failed', { code }), 'op')).toBeInstanceOf(
        ConnectionError
      );
    }
  );

  it('falls back to message heuristics without a code', () => {
    expect(wrapDatabaseError(new Error('Connection terminated unexpectedly'), 'op')).toBeInstanceOf(
      ConnectionError
    );
  });

  it('treats anything else as a query failure', () => {
    const wrapped = wrapDatabaseError(
      driverError('relation "clinical_trials" does not exist', { code: '42P01' }),
      'trials.count'
    );

    expect(wrapped).toBeInstanceOf(QueryError);
    expect(wrapped.message).toBe('Database query failed: trials.count');
  });

  it('wraps non-Error values', () => {
    const wrapped = wrapDatabaseError('boom', 'op');

    expect(isDataError(wrapped)).toBe(true);
    expect(wrapped.cause?.message).toBe('boom');
  });
});
