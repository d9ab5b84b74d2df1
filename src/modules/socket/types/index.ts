/**
 * Socket Module Types
 * Centralized exports for all socket-related types
 */

export * from './protocol';
export * from './session';
export * from './socket';
