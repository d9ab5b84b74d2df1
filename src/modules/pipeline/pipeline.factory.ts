/**
 * Pipeline Factory
 * Selects the conversation pipeline from configuration
 */

import { env } from '@/shared/config';
import { logger } from '@/shared/utils';
import { EchoPipeline, ForwardingPipeline } from './adapters';
import type { ConversationPipeline } from './types';

export function createPipeline(config: Pick<typeof env, 'PIPELINE_MODE' | 'PIPELINE_FORWARD_URL' | 'ECHO_TRANSCRIPT'> = env): ConversationPipeline {
  if (config.PIPELINE_MODE === 'forward') {
    logger.info('Using forwarding pipeline', { url: config.PIPELINE_FORWARD_URL });
    return new ForwardingPipeline({ baseUrl: config.PIPELINE_FORWARD_URL });
  }

  logger.info('Using echo pipeline');
  return new EchoPipeline({ transcript: config.ECHO_TRANSCRIPT });
}
