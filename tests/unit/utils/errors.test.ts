import { describe, it, expect } from 'vitest';
import {
  ColSynthError,
  ConfigError,
  ValidationError,
  InferenceError,
  InvalidOperationError,
  FileIOError,
  ErrorCode
} from '../../../src/utils/errors.js';

describe('Errors', () => {
  it('should create ColSynthError with correct properties', () => {
    const error = new ColSynthError(ErrorCode.GENERAL_ERROR, 'test message', { detail: 'extra' });
    expect(error.message).toBe('test message');
    expect(error.code).toBe(ErrorCode.GENERAL_ERROR);
    expect(error.details).toEqual({ detail: 'extra' });
    expect(error.name).toBe('ColSynthError');
  });

  it('should create ConfigError with correct properties', () => {
    const error = new ConfigError('config error');
    expect(error.message).toBe('config error');
    expect(error.code).toBe(ErrorCode.CONFIG_ERROR);
    expect(error.name).toBe('ConfigError');
  });

  it('should create ValidationError with correct properties', () => {
    const error = new ValidationError('validation error');
    expect(error.code).toBe(ErrorCode.VALIDATION_ERROR);
    expect(error.name).toBe('ValidationError');
  });

  it('should create InferenceError with correct properties', () => {
    const error = new InferenceError('empty column');
    expect(error.code).toBe(ErrorCode.INFERENCE_ERROR);
    expect(error.name).toBe('InferenceError');
    expect(error).toBeInstanceOf(ColSynthError);
  });

  it('should create InvalidOperationError with correct properties', () => {
    const error = new InvalidOperationError('not supported');
    expect(error.code).toBe(ErrorCode.INVALID_OPERATION);
    expect(error.name).toBe('InvalidOperationError');
  });

  it('should create FileIOError with correct properties', () => {
    const error = new FileIOError('io error');
    expect(error.message).toBe('io error');
    expect(error.code).toBe(ErrorCode.FILE_IO_ERROR);
    expect(error.name).toBe('FileIOError');
  });

  it('should format error for CLI response', () => {
    const error = new ColSynthError(ErrorCode.GENERAL_ERROR, 'test message', { detail: 'extra' });
    const response = error.toResponse('learn');
    expect(response).toEqual({
      status: 'error',
      phase: 'learn',
      error: {
        code: ErrorCode.GENERAL_ERROR,
        message: 'test message',
        details: { detail: 'extra' }
      }
    });
  });

  it('should include the cause in the CLI response', () => {
    const error = new FileIOError('read failed', undefined, { cause: new Error('ENOENT') });
    expect(error.toResponse('synthesize').error).toEqual({
      code: ErrorCode.FILE_IO_ERROR,
      message: 'read failed',
      cause: 'Error: ENOENT'
    });
  });
});
