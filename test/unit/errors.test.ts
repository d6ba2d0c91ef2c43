import { describe, expect, it } from 'vitest';
import {
  ConfigValidationError,
  EmptyInputError,
  EngineError,
  InvalidBarError,
  MissingFieldError,
  SignalInconsistencyError,
  serializeError,
} from '../../src/errors.js';

describe('Engine errors', () => {
  describe('EngineError', () => {
    it('sets name, message and code', () => {
      const err = new EngineError('test error', 'TEST_CODE');
      expect(err.name).toBe('EngineError');
      expect(err.message).toBe('test error');
      expect(err.code).toBe('TEST_CODE');
    });

    it('is an instance of Error', () => {
      expect(new EngineError('test', 'CODE')).toBeInstanceOf(Error);
    });

    it('captures a stack trace', () => {
      const err = new EngineError('test', 'CODE');
      expect(err.stack).toContain('EngineError');
    });
  });

  describe('EmptyInputError', () => {
    it('names the stage', () => {
      const err = new EmptyInputError('backtest');
      expect(err.message).toBe('Input data is empty (backtest)');
      expect(err.code).toBe('EMPTY_INPUT');
      expect(err).toBeInstanceOf(EngineError);
    });
  });

  describe('MissingFieldError', () => {
    it('carries the field and bar index', () => {
      const err = new MissingFieldError('rsi', 7);
      expect(err.message).toBe('Missing required field "rsi" at bar 7');
      expect(err.field).toBe('rsi');
      expect(err.index).toBe(7);
      expect(err.code).toBe('MISSING_FIELD');
      expect(err.name).toBe('MissingFieldError');
    });
  });

  describe('SignalInconsistencyError', () => {
    it('has an optional bar index', () => {
      expect(new SignalInconsistencyError('bad', 3).index).toBe(3);
      expect(new SignalInconsistencyError('bad').index).toBeUndefined();
      expect(new SignalInconsistencyError('bad').code).toBe('SIGNAL_INCONSISTENCY');
    });
  });

  describe('InvalidBarError', () => {
    it('sets the INVALID_BAR code', () => {
      const err = new InvalidBarError('broken', 2);
      expect(err.code).toBe('INVALID_BAR');
      expect(err.name).toBe('InvalidBarError');
      expect(err.index).toBe(2);
    });
  });

  describe('ConfigValidationError', () => {
    it('defaults to no issues', () => {
      const err = new ConfigValidationError('bad config');
      expect(err.issues).toEqual([]);
      expect(err.code).toBe('INVALID_CONFIG');
    });
  });

  describe('serializeError', () => {
    it('includes the code of an engine error', () => {
      expect(serializeError(new EmptyInputError('data'))).toEqual({
        name: 'EmptyInputError',
        code: 'EMPTY_INPUT',
        message: 'Input data is empty (data)',
      });
    });

    it('handles plain errors', () => {
      expect(serializeError(new TypeError('boom'))).toEqual({
        name: 'TypeError',
        message: 'boom',
      });
    });

    it('stringifies non-error values', () => {
      expect(serializeError('oops')).toEqual({ name: 'Error', message: 'oops' });
      expect(serializeError(42)).toEqual({ name: 'Error', message: '42' });
    });
  });
});
