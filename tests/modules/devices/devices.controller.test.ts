/**
 * Devices Controller Tests
 */

import { describe, it, expect } from 'vitest';
import { DevicesController } from '@/modules/devices';
import { ConnectivityService } from '@/modules/socket/services';
import { createHarness } from '../../helpers/session-harness';

function createController(publicUrl = 'http://localhost') {
  const connectivity = new ConnectivityService();
  const harness = createHarness({ connectivity, protocol: { maxPendingAnnouncements: 1 } });
  const controller = new DevicesController(harness.registry, connectivity, {
    publicUrl,
    port: 8554,
    path: '/voice',
    reconnectIntervalMs: 5000,
    heartbeatIntervalMs: 30000,
  });
  return { controller, ...harness };
}

describe('DevicesController', () => {
  describe('speak', () => {
    it('should queue text for a connected device', async () => {
      const { controller, hello } = createController();
      await hello();

      expect(controller.speak('dev1', 'Dinner is ready')).toBe('queued');
    });

    it('should report devices without a session', () => {
      const { controller } = createController();

      expect(controller.speak('ghost', 'hello?')).toBe('not_connected');
    });

    it('should report a full announcement queue', async () => {
      const { controller, hello, sendJson } = createController();
      await hello();
      await sendJson({ type: 'start_listen', timestamp: 1 });

      expect(controller.speak('dev1', 'first')).toBe('queued');
      expect(controller.speak('dev1', 'second')).toBe('queue_full');
    });
  });

  describe('listDevices', () => {
    it('should list connected devices', async () => {
      const { controller, session, hello } = createController();
      await hello();

      expect(controller.listDevices()).toEqual([
        {
          device_id: 'dev1',
          session_id: session.sessionId,
          state: 'idle',
          connected: true,
          last_change: expect.any(Number),
          reason: 'handshake complete',
        },
      ]);
    });

    it('should be empty before any device identifies', () => {
      const { controller } = createController();

      expect(controller.listDevices()).toEqual([]);
    });
  });

  describe('getDeviceConfig', () => {
    it('should point plain-http deployments at the server port', () => {
      const { controller } = createController('http://localhost');

      expect(controller.getDeviceConfig('kitchen-1')).toEqual({
        device_id: 'kitchen-1',
        websocket_url: 'ws://localhost:8554/voice',
        reconnect_interval: 5000,
        ping_interval: 30000,
        audio_params: { format: 'opus', sample_rate: 16000, channels: 1, frame_duration: 60 },
      });
    });

    it('should keep an explicit port', () => {
      const { controller } = createController('http://gateway.local:9000/ignored?x=1');

      expect(controller.getDeviceConfig('kitchen-1').websocket_url).toBe('ws://gateway.local:9000/voice');
    });

    it('should use wss without a port for https deployments', () => {
      const { controller } = createController('https://voice.example.com');

      expect(controller.getDeviceConfig('kitchen-1').websocket_url).toBe('wss://voice.example.com/voice');
    });
  });
});
