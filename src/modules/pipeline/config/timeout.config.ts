/**
 * Pipeline Timeout Configuration
 */

import { env } from '@/shared/config';

export const PIPELINE_TIMEOUT_CONFIG = {
  // Time spent waiting on the pipeline per exchange; delivery to the device is not counted
  EXCHANGE_TIMEOUT_MS: env.PIPELINE_TIMEOUT_MS,

  // One HTTP round trip of the forwarding pipeline
  FORWARD_REQUEST_TIMEOUT_MS: env.PIPELINE_FORWARD_TIMEOUT_MS,
} as const;
