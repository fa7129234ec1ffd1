/**
 * Tests for error classes and codes.
 */
import { describe, it, expect } from 'vitest';
import {
  ModkitError,
  ConfigError,
  ModuleError,
  SystemError,
  ErrorCodes,
} from '../../../src/utils/errors.js';

describe('ModkitError', () => {
  it('should create error with code and message', () => {
    const error = new ModkitError('M001', 'Test error message');

    expect(error.code).toBe('M001');
    expect(error.message).toBe('Test error message');
    expect(error.name).toBe('ModkitError');
  });

  it('should include optional details', () => {
    const details = { title: '!!!' };
    const error = new ModkitError('M001', 'Test error', details);

    expect(error.details).toEqual(details);
  });

  it('should be instance of Error', () => {
    const error = new ModkitError('M001', 'Test');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ModkitError);
  });

  describe('toJSON', () => {
    it('should serialize name, code, message and details', () => {
      const error = new ModkitError('S001', 'Write failed', { path: 'out/con_a.adoc' });

      expect(error.toJSON()).toEqual({
        name: 'ModkitError',
        code: 'S001',
        message: 'Write failed',
        details: { path: 'out/con_a.adoc' },
      });
    });
  });
});

describe('error subclasses', () => {
  it.each([
    [ConfigError, 'ConfigError'],
    [ModuleError, 'ModuleError'],
    [SystemError, 'SystemError'],
  ] as const)('%o sets its name and extends ModkitError', (ErrorClass, name) => {
    const error = new ErrorClass('X001', 'message');

    expect(error.name).toBe(name);
    expect(error).toBeInstanceOf(ModkitError);
    expect(error.code).toBe('X001');
  });
});

describe('ErrorCodes', () => {
  it('should use distinct codes', () => {
    const codes = Object.values(ErrorCodes);

    expect(new Set(codes).size).toBe(codes.length);
  });

  it('should group name rules under N and content rules under D', () => {
    expect(ErrorCodes.NAME_PREFIX).toBe('N001');
    expect(ErrorCodes.NAME_EXTENSION).toBe('N005');
    expect(ErrorCodes.CONTENT_TYPE_MISSING).toBe('D001');
    expect(ErrorCodes.TITLE_MISSING).toBe('D005');
  });
});
