import { runInNewContext } from 'vm';
import { describeError, ImportError } from '../../src/errors';

describe('describeError', () => {
  it('should return the message of an Error', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
  });

  it('should return the message of an error from another realm', () => {
    const foreign: unknown = runInNewContext('new Error("ENOENT: no such file")');
    expect(foreign instanceof Error).toBe(false);
    expect(describeError(foreign)).toBe('ENOENT: no such file');
  });

  it('should stringify values without a message', () => {
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
    expect(describeError(null)).toBe('null');
  });
});

describe('ImportError', () => {
  it('should append the cause message', () => {
    const foreign: unknown = runInNewContext('new Error("disk gone")');
    const error = new ImportError('Failed to read import file a.csv', foreign);

    expect(error.message).toBe('Failed to read import file a.csv: disk gone');
    expect(error.statusCode).toBe(500);
    expect(error.cause).toBe(foreign);
  });
});
