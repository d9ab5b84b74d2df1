/**
 * Session Registry
 * Process-wide map from device identity to its single live session
 */

import { logger } from '@/shared/utils';
import type { DeviceIdentity, SessionInfo } from '../types';

export type AnnounceResult = 'queued' | 'queue_full' | 'not_ready';

/**
 * What the registry knows about a live session. Non-owning: the session
 * itself is owned by its connection handler.
 */
export interface RegisteredSession {
  readonly sessionId: string;
  readonly identity: DeviceIdentity;
  /** Force-close because another connection claimed the same device id */
  supersede(bySessionId: string): void;
  /** Queue a server-initiated speech cycle */
  announce(text: string): AnnounceResult;
  getInfo(): SessionInfo;
}

/**
 * Session Registry Class
 * All mutations are synchronous, so each one runs to completion on the event
 * loop before any other handshake can observe the map.
 */
export class SessionRegistry {
  private sessions: Map<string, RegisteredSession> = new Map();

  /**
   * Insert a session under its device id, superseding any prior one.
   * Last writer wins; the prior session is closed before this returns.
   */
  claim(session: RegisteredSession): void {
    const { deviceId } = session.identity;
    const existing = this.sessions.get(deviceId);

    this.sessions.set(deviceId, session);

    if (existing && existing.sessionId !== session.sessionId) {
      logger.warn('Device identity claimed by new connection, superseding', {
        deviceId,
        previousSessionId: existing.sessionId,
        sessionId: session.sessionId,
      });
      existing.supersede(session.sessionId);
    }

    logger.debug('Session registered', { deviceId, sessionId: session.sessionId });
  }

  /**
   * Remove the entry only if it still belongs to `sessionId`
   */
  release(deviceId: string, sessionId: string): boolean {
    const current = this.sessions.get(deviceId);
    if (!current || current.sessionId !== sessionId) {
      return false;
    }
    this.sessions.delete(deviceId);
    logger.debug('Session released', { deviceId, sessionId });
    return true;
  }

  lookup(deviceId: string): RegisteredSession | undefined {
    return this.sessions.get(deviceId);
  }

  has(deviceId: string): boolean {
    return this.sessions.has(deviceId);
  }

  size(): number {
    return this.sessions.size;
  }

  list(): SessionInfo[] {
    return Array.from(this.sessions.values()).map((session) => session.getInfo());
  }

  /**
   * Drop all entries (graceful shutdown / tests)
   */
  clear(): void {
    logger.info('Session registry cleared', { count: this.sessions.size });
    this.sessions.clear();
  }
}

