/**
 * Environment Configuration
 * Typed view over process.env
 */

import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? fallback : value;
}

export type PipelineMode = 'echo' | 'forward';

function readPipelineMode(): PipelineMode {
  return process.env.PIPELINE_MODE === 'forward' ? 'forward' : 'echo';
}

/**
 * Environment variables
 */
export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  PORT: readInt('PORT', 8554),
  WEBSOCKET_PATH: process.env.WEBSOCKET_PATH || '/voice',

  // Base URL devices use to reach this server (device config document)
  PUBLIC_URL: process.env.PUBLIC_URL || 'http://localhost',

  // Liveness
  HEARTBEAT_INTERVAL_MS: readInt('HEARTBEAT_INTERVAL_MS', 30000),
  HEARTBEAT_TIMEOUT_MULTIPLE: readInt('HEARTBEAT_TIMEOUT_MULTIPLE', 2),
  DEVICE_RECONNECT_INTERVAL_MS: readInt('DEVICE_RECONNECT_INTERVAL_MS', 5000),

  // Conversational pipeline
  PIPELINE_MODE: readPipelineMode(),
  PIPELINE_FORWARD_URL: process.env.PIPELINE_FORWARD_URL || '',
  PIPELINE_TIMEOUT_MS: readInt('PIPELINE_TIMEOUT_MS', 30000),
  PIPELINE_FORWARD_TIMEOUT_MS: readInt('PIPELINE_FORWARD_TIMEOUT_MS', 15000),
  ECHO_TRANSCRIPT: process.env.ECHO_TRANSCRIPT || 'echo',

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
} as const;

/**
 * Validate required environment variables
 */
export function validateEnv(): void {
  const required: (keyof typeof env)[] = ['WEBSOCKET_PATH', 'PUBLIC_URL'];

  const missing = required.filter((key) => !env[key]);

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }

  // 0 binds an ephemeral port
  if (env.PORT < 0 || env.PORT > 65535) {
    throw new Error(`PORT must be between 0 and 65535, got ${env.PORT}`);
  }

  if (!env.WEBSOCKET_PATH.startsWith('/')) {
    throw new Error(`WEBSOCKET_PATH must start with "/", got ${env.WEBSOCKET_PATH}`);
  }

  if (env.PIPELINE_MODE === 'forward' && !env.PIPELINE_FORWARD_URL) {
    throw new Error('PIPELINE_FORWARD_URL is required when PIPELINE_MODE=forward');
  }

  if (env.PIPELINE_FORWARD_TIMEOUT_MS > env.PIPELINE_TIMEOUT_MS) {
    throw new Error('PIPELINE_FORWARD_TIMEOUT_MS must not exceed PIPELINE_TIMEOUT_MS');
  }

  if (env.HEARTBEAT_TIMEOUT_MULTIPLE < 1) {
    throw new Error('HEARTBEAT_TIMEOUT_MULTIPLE must be at least 1');
  }
}
