/**
 * Devices Module Exports
 */

export { DevicesController } from './controllers/devices.controller';
export { createDevicesRouter } from './routes/devices.routes';
export type {
  DeviceConfigDocument,
  DeviceEndpointSettings,
  DeviceStatusView,
  SpeakOutcome,
} from './types';
