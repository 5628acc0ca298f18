import { describe, it, expect } from 'vitest';
import { classifyMysqlError } from '../mysqlClient.js';
import { ConfigurationError, DataIntegrityError, TransientIOError } from '../../shared/errors.js';

function driverError(code: string, message = `driver failure ${code}`): Error {
  return Object.assign(new Error(message), { code });
}

describe('classifyMysqlError', () => {
  it.each(['PROTOCOL_CONNECTION_LOST', 'ECONNRESET', 'ETIMEDOUT', 'ER_LOCK_WAIT_TIMEOUT'])(
    'treats %s as transient',
    (code) => {
      expect(classifyMysqlError(driverError(code))).toBeInstanceOf(TransientIOError);
    },
  );

  it('treats rejected credentials as configuration', () => {
    expect(classifyMysqlError(driverError('ER_ACCESS_DENIED_ERROR'))).toBeInstanceOf(ConfigurationError);
  });

  it.each(['ER_PARSE_ERROR', 'ER_NO_SUCH_TABLE', 'ER_BAD_FIELD_ERROR'])('treats %s as fatal', (code) => {
    expect(classifyMysqlError(driverError(code))).toBeInstanceOf(DataIntegrityError);
  });

  it('keeps the driver code in the details', () => {
    const err = classifyMysqlError(driverError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:3306'));
    expect(err.message).toBe('Database unavailable: connect ECONNREFUSED 127.0.0.1:3306');
    expect(err instanceof TransientIOError && err.details).toEqual({ code: 'ECONNREFUSED' });
  });
});
