/**
 * Error hierarchy + ErrorHandler tests
 */

import { describe, it, expect } from 'vitest';
import {
  ReasonError,
  StorageError,
  ConfigurationError,
  AnalysisError,
  ErrorHandler,
} from './index.js';

describe('ReasonError hierarchy', () => {
  it('subclasses carry their code and name', () => {
    const cases: [ReasonError, string, string][] = [
      [new StorageError('disk'), 'STORAGE_ERROR', 'StorageError'],
      [new ConfigurationError('cfg'), 'CONFIG_ERROR', 'ConfigurationError'],
      [new AnalysisError('bad'), 'ANALYSIS_ERROR', 'AnalysisError'],
    ];
    for (const [err, code, name] of cases) {
      expect(err).toBeInstanceOf(ReasonError);
      expect(err).toBeInstanceOf(Error);
      expect(err.code).toBe(code);
      expect(err.name).toBe(name);
    }
  });

  it('keeps context', () => {
    expect(new StorageError('x', { path: '/tmp/a' }).context).toEqual({ path: '/tmp/a' });
  });
});

describe('ErrorHandler.toUserMessage', () => {
  it('points configuration errors at config validate', () => {
    expect(ErrorHandler.toUserMessage(new ConfigurationError('bad level'))).toBe(
      'Configuration problem: bad level. Run `reason config validate` for details.'
    );
  });

  it('includes the path of storage errors', () => {
    expect(ErrorHandler.toUserMessage(new StorageError('EACCES', { path: '/results' }))).toBe(
      'Storage failure (/results): EACCES'
    );
    expect(ErrorHandler.toUserMessage(new StorageError('EACCES'))).toBe('Storage failure: EACCES');
  });

  it('formats other REASON errors with their code', () => {
    expect(ErrorHandler.toUserMessage(new AnalysisError('empty name'))).toBe('empty name (ANALYSIS_ERROR)');
  });

  it('falls back for plain errors and non-errors', () => {
    expect(ErrorHandler.toUserMessage(new Error('boom'))).toBe('boom');
    expect(ErrorHandler.toUserMessage(42)).toBe('An unexpected error occurred.');
  });
});
