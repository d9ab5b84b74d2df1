/**
 * UUID Utility
 * Centralized UUID generation using uuidv7
 */

import { v7 as uuidv7 } from 'uuid';

/**
 * Generate a UUID v7 (time-ordered, sortable)
 * Used for all IDs (connections, sessions, exchanges)
 */
export function generateId(): string {
  return uuidv7();
}
