/**
 * Shared Configuration
 * Centralized exports for all configuration
 */

export * from './env';
export * from './socket';
