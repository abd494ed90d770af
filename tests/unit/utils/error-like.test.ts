import { parseArgs } from 'node:util';
import { errorCode, errorMessage, toErrorLike } from '../../../src/utils/error-like.js';

describe('error-like helpers', () => {
  it('reads the code of a Node system error', () => {
    let thrown: unknown;
    try {
      parseArgs({ args: ['--bogus'], options: {} });
    } catch (error) {
      thrown = error;
    }

    expect(errorCode(thrown)).toBe('ERR_PARSE_ARGS_UNKNOWN_OPTION');
    expect(errorCode({ code: 404 })).toBeUndefined();
    expect(errorCode('ENOENT')).toBeUndefined();
  });

  it('accepts any object with a string message', () => {
    expect(toErrorLike({ message: 'gone', code: 'ENOENT', path: '/x' })).toEqual({
      name: 'Error',
      message: 'gone',
      code: 'ENOENT',
      path: '/x'
    });
    expect(toErrorLike({ name: 'Oops' })).toBeNull();
    expect(toErrorLike(null)).toBeNull();
  });

  it('keeps only well-formed validation issues', () => {
    const value = {
      name: 'ZodError',
      message: 'invalid',
      issues: [{ path: ['grpId'], message: 'Required', code: 'invalid_type' }, { path: 'grpId' }]
    };
    expect(toErrorLike(value)?.issues).toEqual([{ path: ['grpId'], message: 'Required', code: 'invalid_type' }]);
  });

  it('falls back to String for non-errors', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
