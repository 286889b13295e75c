import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  UsageError,
  FileSystemError,
  IOError,
  errnoCode,
  toAppError,
  type AppErrorOptions,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { key: 'value' };
    const error = new AppError('IOError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });

  it('should accept string details', () => {
    const error = new AppError('UnknownError', 'Test', { details: 'string details' });
    expect(error.details).toBe('string details');
  });
});

describe('subclasses', () => {
  it('ConfigError carries its code and name', () => {
    const error = new ConfigError('Invalid config');
    expect(error).toBeInstanceOf(AppError);
    expect(error.code).toBe('ConfigError');
    expect(error.name).toBe('ConfigError');
  });

  it('UsageError carries its code', () => {
    expect(new UsageError('Invalid usage').code).toBe('UsageError');
  });

  it('FileSystemError carries its code and details', () => {
    const error = new FileSystemError('Rename target exists', {
      details: { source: 'Foo.h', target: 'foo.h' },
    });
    expect(error.code).toBe('FileSystemError');
    expect(error.name).toBe('FileSystemError');
    expect(error.details).toEqual({ source: 'Foo.h', target: 'foo.h' });
  });

  it('IOError carries its code', () => {
    const error = new IOError('Failed to write');
    expect(error.code).toBe('IOError');
    expect(error.message).toBe('Failed to write');
  });
});

describe('errnoCode', () => {
  it('reads the code of a Node system error', () => {
    const error = Object.assign(new Error('no such file'), { code: 'ENOENT' });
    expect(errnoCode(error)).toBe('ENOENT');
  });

  it('returns undefined for plain errors and non-errors', () => {
    expect(errnoCode(new Error('plain'))).toBeUndefined();
    expect(errnoCode('ENOENT')).toBeUndefined();
  });
});

describe('toAppError', () => {
  const wrap = (message: string, options: AppErrorOptions) =>
    new IOError(message, options);

  it('passes AppErrors through unchanged', () => {
    const original = new FileSystemError('collision');
    expect(toAppError(original, wrap, 'ignored')).toBe(original);
  });

  it('wraps foreign errors with context, cause and errno', () => {
    const cause = Object.assign(new Error('permission denied'), { code: 'EACCES' });
    const error = toAppError(cause, wrap, 'Failed to read Widget.h');

    expect(error).toBeInstanceOf(IOError);
    expect(error.message).toBe('Failed to read Widget.h: permission denied');
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual({ errno: 'EACCES' });
  });

  it('stringifies non-error values', () => {
    const error = toAppError('disk full', wrap, 'Failed to write');
    expect(error.message).toBe('Failed to write: disk full');
    expect(error.details).toBeUndefined();
  });
});
