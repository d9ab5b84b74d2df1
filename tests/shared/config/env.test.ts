/**
 * Environment Configuration Tests
 * Each case re-imports the module so it reads the stubbed variables
 */

import { describe, it, expect, vi, afterEach } from 'vitest';

async function loadEnv() {
  vi.resetModules();
  return import('@/shared/config/env');
}

describe('env', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should parse numeric settings', async () => {
    vi.stubEnv('HEARTBEAT_INTERVAL_MS', '15000');
    vi.stubEnv('PORT', 'not-a-port');

    const { env } = await loadEnv();

    expect(env.HEARTBEAT_INTERVAL_MS).toBe(15000);
    expect(env.PORT).toBe(8554);
  });

  it('should only select the forwarding pipeline by name', async () => {
    vi.stubEnv('PIPELINE_MODE', 'something-else');

    const { env } = await loadEnv();

    expect(env.PIPELINE_MODE).toBe('echo');
  });

  it('should require a forward URL in forward mode', async () => {
    vi.stubEnv('PIPELINE_MODE', 'forward');
    vi.stubEnv('PIPELINE_FORWARD_URL', '');

    const { validateEnv } = await loadEnv();

    expect(() => validateEnv()).toThrow('PIPELINE_FORWARD_URL is required when PIPELINE_MODE=forward');
  });

  it('should reject a WebSocket path without a leading slash', async () => {
    vi.stubEnv('WEBSOCKET_PATH', 'voice');

    const { validateEnv } = await loadEnv();

    expect(() => validateEnv()).toThrow('WEBSOCKET_PATH must start with "/", got voice');
  });

  it('should reject a port out of range', async () => {
    vi.stubEnv('PORT', '70000');

    const { validateEnv } = await loadEnv();

    expect(() => validateEnv()).toThrow('PORT must be between 0 and 65535, got 70000');
  });

  it('should read the forward request timeout on its own', async () => {
    vi.stubEnv('PIPELINE_TIMEOUT_MS', '40000');
    vi.stubEnv('PIPELINE_FORWARD_TIMEOUT_MS', '25000');

    const { env } = await loadEnv();

    expect(env.PIPELINE_TIMEOUT_MS).toBe(40000);
    expect(env.PIPELINE_FORWARD_TIMEOUT_MS).toBe(25000);
  });

  it('should reject a forward request timeout above the exchange timeout', async () => {
    vi.stubEnv('PIPELINE_TIMEOUT_MS', '10000');
    vi.stubEnv('PIPELINE_FORWARD_TIMEOUT_MS', '12000');

    const { validateEnv } = await loadEnv();

    expect(() => validateEnv()).toThrow('PIPELINE_FORWARD_TIMEOUT_MS must not exceed PIPELINE_TIMEOUT_MS');
  });

  it('should accept the defaults', async () => {
    vi.stubEnv('PIPELINE_MODE', 'echo');

    const { validateEnv } = await loadEnv();

    expect(() => validateEnv()).not.toThrow();
  });
});
