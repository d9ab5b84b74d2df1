/**
 * Session Registry Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { SessionRegistry, type RegisteredSession } from '@/modules/socket/services';
import { SessionState, type SessionInfo } from '@/modules/socket/types';

function fakeSession(sessionId: string, deviceId: string): RegisteredSession {
  const info: SessionInfo = {
    sessionId,
    connectionId: `conn-${sessionId}`,
    identity: { deviceId, clientId: 'client' },
    state: SessionState.IDLE,
    createdAt: 0,
    lastActivity: 0,
    audioFormat: { format: 'opus', sampleRate: 16000, bitDepth: 16, channels: 1, frameDurationMs: 60 },
    pendingAnnouncements: 0,
  };
  return {
    sessionId,
    identity: { deviceId, clientId: 'client' },
    supersede: vi.fn(),
    announce: vi.fn(() => 'queued' as const),
    getInfo: () => info,
  };
}

describe('SessionRegistry', () => {
  it('should register and look up a session by device id', () => {
    const registry = new SessionRegistry();
    const session = fakeSession('s1', 'dev1');

    registry.claim(session);

    expect(registry.lookup('dev1')).toBe(session);
    expect(registry.has('dev1')).toBe(true);
    expect(registry.size()).toBe(1);
  });

  it('should supersede the previous holder of a device id', () => {
    const registry = new SessionRegistry();
    const first = fakeSession('s1', 'dev1');
    const second = fakeSession('s2', 'dev1');

    registry.claim(first);
    registry.claim(second);

    expect(first.supersede).toHaveBeenCalledWith('s2');
    expect(second.supersede).not.toHaveBeenCalled();
    expect(registry.lookup('dev1')).toBe(second);
    expect(registry.size()).toBe(1);
  });

  it('should already point at the new session while superseding', () => {
    const registry = new SessionRegistry();
    const first = fakeSession('s1', 'dev1');
    const second = fakeSession('s2', 'dev1');
    vi.mocked(first.supersede).mockImplementation(() => {
      // The old session releasing itself must not remove the new entry
      expect(registry.release('dev1', 's1')).toBe(false);
    });

    registry.claim(first);
    registry.claim(second);

    expect(registry.lookup('dev1')?.sessionId).toBe('s2');
  });

  it('should leave exactly one survivor after a burst of claims', () => {
    const registry = new SessionRegistry();
    const sessions = ['a', 'b', 'c', 'd'].map((id) => fakeSession(id, 'dev1'));

    sessions.forEach((session) => registry.claim(session));

    expect(registry.size()).toBe(1);
    expect(registry.lookup('dev1')?.sessionId).toBe('d');
    expect(sessions.filter((session) => vi.mocked(session.supersede).mock.calls.length > 0)).toHaveLength(3);
  });

  it('should only release the matching session', () => {
    const registry = new SessionRegistry();
    registry.claim(fakeSession('s1', 'dev1'));

    expect(registry.release('dev1', 'other')).toBe(false);
    expect(registry.release('dev1', 's1')).toBe(true);
    expect(registry.has('dev1')).toBe(false);
  });

  it('should keep devices independent', () => {
    const registry = new SessionRegistry();
    registry.claim(fakeSession('s1', 'dev1'));
    registry.claim(fakeSession('s2', 'dev2'));

    expect(registry.list().map((info) => info.sessionId)).toEqual(['s1', 's2']);
    registry.clear();
    expect(registry.size()).toBe(0);
  });
});
