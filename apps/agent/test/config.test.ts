import { describe, expect, it } from 'vitest';
import { loadConfig, validateConfig } from '../src/config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const cfg = loadConfig({});
    expect(cfg).toMatchObject({
      logLevel: 'info',
      remoteHost: '127.0.0.1',
      remotePort: 8986,
      useVirtualDisplay: true,
      screenWidth: 1080,
      screenHeight: 2400,
      normalizeCoordinates: true,
      adbPath: 'adb',
      maxSteps: 30,
      stepDelay: 500,
    });
    expect(cfg.aiApiKey).toBeUndefined();
    expect(cfg.adbSerial).toBeUndefined();
  });

  it('reads overrides', () => {
    const cfg = loadConfig({
      LOG_LEVEL: 'DEBUG',
      REMOTE_PORT: '9100',
      USE_VIRTUAL_DISPLAY: 'off',
      ADB_SERIAL: 'emulator-5554',
      AI_API_KEY: 'test-secret',
    });
    expect(cfg.logLevel).toBe('debug');
    expect(cfg.remotePort).toBe(9100);
    expect(cfg.useVirtualDisplay).toBe(false);
    expect(cfg.adbSerial).toBe('emulator-5554');
    expect(cfg.aiApiKey).toBe('test-secret');
  });

  it('rejects malformed values', () => {
    expect(() => loadConfig({ REMOTE_PORT: 'abc' })).toThrow('Environment variable REMOTE_PORT must be a number');
    expect(() => loadConfig({ USE_VIRTUAL_DISPLAY: 'maybe' })).toThrow(
      'Environment variable USE_VIRTUAL_DISPLAY must be a boolean',
    );
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow('LOG_LEVEL must be one of: debug, info, warn, error');
  });
});

describe('validateConfig', () => {
  it('requires an API key', () => {
    expect(() => validateConfig(loadConfig({}))).toThrow('AI_API_KEY is required');
  });

  it('requires a positive step limit', () => {
    expect(() => validateConfig(loadConfig({ AI_API_KEY: 'test-secret', MAX_STEPS: '0' }))).toThrow(
      'MAX_STEPS must be positive',
    );
  });

  it('accepts a complete configuration', () => {
    expect(() => validateConfig(loadConfig({ AI_API_KEY: 'test-secret' }))).not.toThrow();
  });
});
