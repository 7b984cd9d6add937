/**
 * Constants Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DEFAULT_SETTINGS, getEngineSettings } from '../../../src/utils/constants.js';
import { isolateEngineEnv } from '../../fixtures/engine-content.js';

describe('getEngineSettings', () => {
  let restoreEnv: () => void;

  beforeEach(() => {
    restoreEnv = isolateEngineEnv();
  });

  afterEach(() => {
    restoreEnv();
  });

  it('should return the defaults without overrides', () => {
    expect(getEngineSettings()).toEqual(DEFAULT_SETTINGS);
    expect(DEFAULT_SETTINGS).toEqual({
      minPrefixLength: 2,
      completionLimit: 8,
      historyMaxDepth: 10,
      suggestionTopK: 3,
    });
  });

  it('should apply overrides over defaults', () => {
    expect(getEngineSettings({ minPrefixLength: 3, historyMaxDepth: 4 })).toEqual({
      minPrefixLength: 3,
      completionLimit: 8,
      historyMaxDepth: 4,
      suggestionTopK: 3,
    });
  });

  it('should apply environment variables over overrides', () => {
    process.env.SUPPORTFLOW_HISTORY_DEPTH = '25';
    process.env.SUPPORTFLOW_TOP_K = '5';
    process.env.SUPPORTFLOW_COMPLETION_LIMIT = '12';

    expect(getEngineSettings({ historyMaxDepth: 4, suggestionTopK: 2 })).toEqual({
      minPrefixLength: 2,
      completionLimit: 12,
      historyMaxDepth: 25,
      suggestionTopK: 5,
    });
  });

  it('should ignore environment values that are not positive integers', () => {
    process.env.SUPPORTFLOW_HISTORY_DEPTH = '0';
    process.env.SUPPORTFLOW_TOP_K = 'three';
    process.env.SUPPORTFLOW_COMPLETION_LIMIT = '2.5';

    expect(getEngineSettings({ suggestionTopK: 2 })).toEqual({
      minPrefixLength: 2,
      completionLimit: 8,
      historyMaxDepth: 10,
      suggestionTopK: 2,
    });
  });
});
