import { describe, it, expect } from 'vitest';

import { DEFAULT_CONFIG, loadConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  it('falls back to the defaults', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.hardLimitBytes).toBe(26_214_400);
    expect(DEFAULT_CONFIG.safetyBudgetBytes).toBe(25_165_824);
  });

  it('coerces numeric environment values', () => {
    const config = loadConfig({
      TRANSCRIBE_HARD_LIMIT_BYTES: '1000000',
      TRANSCRIBE_SAFETY_BUDGET_BYTES: '900000',
      AUDIO_BITRATE_KBPS: '128',
      CHUNK_SAFETY_MARGIN: '0.1',
      MIN_CHUNK_DURATION_MS: '2000',
      TRANSCRIBE_SCRATCH_DIR: '/var/tmp/chunks',
    });

    expect(config).toEqual({
      hardLimitBytes: 1_000_000,
      safetyBudgetBytes: 900_000,
      bitrateKbps: 128,
      safetyMargin: 0.1,
      minChunkDurationMs: 2000,
      scratchRoot: '/var/tmp/chunks',
    });
  });

  it('rejects a safety budget that is not below the hard limit', () => {
    expect(() =>
      loadConfig({
        TRANSCRIBE_HARD_LIMIT_BYTES: '1000',
        TRANSCRIBE_SAFETY_BUDGET_BYTES: '1000',
      })
    ).toThrow(
      'Invalid transcriber config (safetyBudgetBytes): safetyBudgetBytes must be strictly less than hardLimitBytes'
    );
  });

  it('names the field that failed to parse', () => {
    const attempt = () => loadConfig({ AUDIO_BITRATE_KBPS: 'fast' });

    expect(attempt).toThrow(ConfigError);
    expect(attempt).toThrow('Invalid transcriber config (bitrateKbps)');
  });

  it('rejects a safety margin of 100% or more', () => {
    expect(() => loadConfig({ CHUNK_SAFETY_MARGIN: '1' })).toThrow(ConfigError);
  });

  it('rejects a minimum chunk duration of zero', () => {
    expect(() => loadConfig({ MIN_CHUNK_DURATION_MS: '0' })).toThrow(
      'Invalid transcriber config (minChunkDurationMs)'
    );
  });
});
