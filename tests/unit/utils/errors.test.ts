/**
 * Custom Errors Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ErrorCode,
  SupportFlowError,
  ValidationError,
  DialogueConfigError,
  ConfigLoadError,
  UnknownNodeError,
} from '../../../src/utils/errors.js';

describe('Custom Errors', () => {
  describe('SupportFlowError', () => {
    it('should create error with message and default code', () => {
      const error = new SupportFlowError('Test error');

      expect(error.message).toBe('Test error');
      expect(error.name).toBe('SupportFlowError');
      expect(error.code).toBe(ErrorCode.UNKNOWN_ERROR);
      expect(error).toBeInstanceOf(Error);
    });

    it('should keep context, suggestions and cause', () => {
      const cause = new Error('disk full');
      const error = new SupportFlowError('Failed', 'TEST_CODE', {
        context: { nodeId: 'root' },
        suggestions: ['Try again'],
        cause,
      });

      expect(error.code).toBe('TEST_CODE');
      expect(error.context).toEqual({ nodeId: 'root' });
      expect(error.suggestions).toEqual(['Try again']);
      expect(error.cause).toBe(cause);
    });

    it('should format a detailed message', () => {
      const error = new SupportFlowError('Failed', 'TEST_CODE', {
        context: { nodeId: 'root' },
        suggestions: ['Try again'],
      });

      expect(error.getDetailedMessage()).toBe(
        '[TEST_CODE] Failed\nContext: {\n  "nodeId": "root"\n}\nSuggestions:\n  - Try again'
      );
    });

    it('should serialize to JSON', () => {
      const json = new SupportFlowError('Failed', 'TEST_CODE').toJSON();

      expect(json).toMatchObject({
        name: 'SupportFlowError',
        code: 'TEST_CODE',
        message: 'Failed',
        suggestions: [],
      });
    });
  });

  describe('ValidationError', () => {
    it('should carry the individual validation errors', () => {
      const error = new ValidationError('Invalid engine config', ['dialogue: Required']);

      expect(error.name).toBe('ValidationError');
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.errors).toEqual(['dialogue: Required']);
      expect(error.context).toEqual({ validationErrors: ['dialogue: Required'] });
      expect(error).toBeInstanceOf(SupportFlowError);
    });
  });

  describe('DialogueConfigError', () => {
    it('should use the given code and context', () => {
      const error = new DialogueConfigError('Duplicate', ErrorCode.DUPLICATE_NODE, { nodeId: 'root' });

      expect(error.name).toBe('DialogueConfigError');
      expect(error.code).toBe('DUPLICATE_NODE');
      expect(error.context).toEqual({ nodeId: 'root' });
    });
  });

  describe('ConfigLoadError', () => {
    it('should include the cause in the message', () => {
      const error = new ConfigLoadError('/tmp/engine.json', new Error('Unexpected token'));

      expect(error.message).toBe('Failed to load engine config: /tmp/engine.json - Unexpected token');
      expect(error.code).toBe('CONFIG_LOAD_FAILED');
      expect(error.context).toEqual({ filePath: '/tmp/engine.json' });
    });

    it('should omit the cause when there is none', () => {
      expect(new ConfigLoadError('/tmp/engine.json').message).toBe(
        'Failed to load engine config: /tmp/engine.json'
      );
    });
  });

  describe('UnknownNodeError', () => {
    it('should name the node', () => {
      const error = new UnknownNodeError('ghost');

      expect(error.message).toBe('Dialogue node "ghost" not found');
      expect(error.name).toBe('UnknownNodeError');
      expect(error.code).toBe('UNKNOWN_NODE');
    });
  });
});
