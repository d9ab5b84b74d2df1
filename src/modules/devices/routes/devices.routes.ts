/**
 * Device HTTP Routes
 * Mounted under /api/devices
 */

import { Router } from 'express';
import { z } from 'zod';
import { DEVICE_IDENTIFIER_PATTERN } from '@/modules/socket';
import type { DevicesController } from '../controllers/devices.controller';

const SpeakRequestSchema = z.object({
  message: z.string().trim().min(1).max(2000),
});

export function createDevicesRouter(controller: DevicesController): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ devices: controller.listDevices() });
  });

  router.get('/:deviceId/config', (req, res) => {
    const { deviceId } = req.params;
    if (!DEVICE_IDENTIFIER_PATTERN.test(deviceId)) {
      res.status(400).json({ error: 'invalid_device_id' });
      return;
    }
    res.json(controller.getDeviceConfig(deviceId));
  });

  router.post('/:deviceId/speak', (req, res) => {
    const { deviceId } = req.params;
    const parsed = SpeakRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'invalid_body',
        message: parsed.error.issues[0]?.message ?? 'Invalid request body',
      });
      return;
    }

    const outcome = controller.speak(deviceId, parsed.data.message);
    switch (outcome) {
      case 'queued':
        res.status(202).json({ status: 'queued', device_id: deviceId });
        return;
      case 'not_connected':
        res.status(404).json({ error: 'device_not_connected', device_id: deviceId });
        return;
      case 'queue_full':
        res.status(409).json({ error: 'queue_full', device_id: deviceId });
        return;
    }
  });

  return router;
}
