import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';

describe('config', () => {
  it('defaults to stopping on errors', () => {
    expect(loadConfig({})).toEqual({ continueOnError: false, verbose: false });
  });

  it('reads boolean flags', () => {
    expect(loadConfig({ WORKOUT_CONTINUE_ON_ERROR: 'true', WORKOUT_VERBOSE: '1' })).toEqual({
      continueOnError: true,
      verbose: true
    });
    expect(loadConfig({ WORKOUT_CONTINUE_ON_ERROR: ' YES ', WORKOUT_VERBOSE: 'no' })).toEqual({
      continueOnError: true,
      verbose: false
    });
  });
});
