/**
 * Pipeline Error Classifier
 * Maps whatever a pipeline throws onto a session-level PipelineFailure
 */

import { ErrorCode, PipelineFailureError } from '@/shared/errors';
import { errorMessage } from '@/shared/utils';

/**
 * Classify a pipeline error for reporting to the device
 */
export function classifyPipelineError(error: unknown): PipelineFailureError {
  if (error instanceof PipelineFailureError) {
    return error;
  }

  const message = errorMessage(error);
  const name = error instanceof Error ? error.name : '';
  const lowerMessage = message.toLowerCase();

  if (
    name === 'TimeoutError' ||
    lowerMessage.includes('timeout') ||
    lowerMessage.includes('timed out')
  ) {
    return new PipelineFailureError(ErrorCode.PIPELINE_TIMEOUT, 'Pipeline timed out');
  }

  if (
    lowerMessage.includes('econnrefused') ||
    lowerMessage.includes('enotfound') ||
    lowerMessage.includes('fetch failed') ||
    lowerMessage.includes('network')
  ) {
    return new PipelineFailureError(ErrorCode.PIPELINE_ERROR, 'Pipeline unreachable');
  }

  return new PipelineFailureError(ErrorCode.PIPELINE_ERROR, `Pipeline error: ${message}`);
}
