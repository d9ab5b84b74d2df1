/**
 * Device Protocol Types
 * JSON control messages exchanged with voice-terminal devices
 */

import { z } from 'zod';

export const CONTROL_MESSAGE_TYPES = {
  HELLO: 'hello',
  HELLO_ACK: 'hello_ack',
  WAKEWORD_DETECTED: 'wakeword_detected',
  START_LISTEN: 'start_listen',
  STOP_LISTEN: 'stop_listen',
  ABORT: 'abort',
  TEXT: 'text',
  INTENT: 'intent',
  RECOGNITION_RESULT: 'recognition_result',
  TTS_START: 'tts_start',
  TTS_END: 'tts_end',
  ERROR: 'error',
  PING: 'ping',
  PONG: 'pong',
} as const;

export type ControlMessageType = (typeof CONTROL_MESSAGE_TYPES)[keyof typeof CONTROL_MESSAGE_TYPES];

// ============================================================================
// Schemas
// ============================================================================

const timestamp = z.number().int().nonnegative();

export const AudioParamsSchema = z.object({
  format: z.string().min(1).optional(),
  sample_rate: z.number().int().positive().optional(),
  channels: z.number().int().positive().optional(),
  frame_duration: z.number().int().positive().optional(),
});

export const NegotiatedAudioParamsSchema = z.object({
  format: z.string(),
  sample_rate: z.number().int(),
  channels: z.number().int(),
  frame_duration: z.number().int(),
});

export const HelloMessageSchema = z.object({
  type: z.literal(CONTROL_MESSAGE_TYPES.HELLO),
  version: z.number().int(),
  device_id: z.string(),
  client_id: z.string(),
  audio_params: AudioParamsSchema.optional(),
  timestamp: timestamp.optional(),
});

export const HelloAckMessageSchema = z.object({
  type: z.literal(CONTROL_MESSAGE_TYPES.HELLO_ACK),
  version: z.number().int(),
  session_id: z.string(),
  audio_params: NegotiatedAudioParamsSchema,
  heartbeat_interval_ms: z.number().int(),
  timestamp: timestamp.optional(),
});

export const WakewordDetectedMessageSchema = z.object({
  type: z.literal(CONTROL_MESSAGE_TYPES.WAKEWORD_DETECTED),
  timestamp,
  wake_word: z.string().optional(),
});

export const StartListenMessageSchema = z.object({
  type: z.literal(CONTROL_MESSAGE_TYPES.START_LISTEN),
  timestamp,
});

export const StopListenMessageSchema = z.object({
  type: z.literal(CONTROL_MESSAGE_TYPES.STOP_LISTEN),
  timestamp,
});

export const AbortMessageSchema = z.object({
  type: z.literal(CONTROL_MESSAGE_TYPES.ABORT),
  timestamp,
  reason: z.string().optional(),
});

// Typed request in place of speech
export const TextMessageSchema = z.object({
  type: z.literal(CONTROL_MESSAGE_TYPES.TEXT),
  text: z.string().trim().min(1).max(2000),
  timestamp: timestamp.optional(),
});

// Assistant reply text, sent ahead of its speech
export const IntentMessageSchema = z.object({
  type: z.literal(CONTROL_MESSAGE_TYPES.INTENT),
  text: z.string(),
  timestamp: timestamp.optional(),
});

export const RecognitionResultMessageSchema = z.object({
  type: z.literal(CONTROL_MESSAGE_TYPES.RECOGNITION_RESULT),
  text: z.string(),
  timestamp: timestamp.optional(),
});

export const TtsStartMessageSchema = z.object({
  type: z.literal(CONTROL_MESSAGE_TYPES.TTS_START),
  text: z.string().optional(),
  timestamp: timestamp.optional(),
});

export const TtsEndMessageSchema = z.object({
  type: z.literal(CONTROL_MESSAGE_TYPES.TTS_END),
  timestamp: timestamp.optional(),
});

export const ErrorMessageSchema = z.object({
  type: z.literal(CONTROL_MESSAGE_TYPES.ERROR),
  code: z.string(),
  message: z.string(),
  timestamp: timestamp.optional(),
});

export const PingMessageSchema = z.object({
  type: z.literal(CONTROL_MESSAGE_TYPES.PING),
  timestamp,
});

export const PongMessageSchema = z.object({
  type: z.literal(CONTROL_MESSAGE_TYPES.PONG),
  timestamp,
});

export const ControlMessageSchema = z.discriminatedUnion('type', [
  HelloMessageSchema,
  HelloAckMessageSchema,
  WakewordDetectedMessageSchema,
  StartListenMessageSchema,
  StopListenMessageSchema,
  AbortMessageSchema,
  TextMessageSchema,
  IntentMessageSchema,
  RecognitionResultMessageSchema,
  TtsStartMessageSchema,
  TtsEndMessageSchema,
  ErrorMessageSchema,
  PingMessageSchema,
  PongMessageSchema,
]);

// ============================================================================
// Message Types
// ============================================================================

export type AudioParams = z.infer<typeof AudioParamsSchema>;
export type NegotiatedAudioParams = z.infer<typeof NegotiatedAudioParamsSchema>;

export type HelloMessage = z.infer<typeof HelloMessageSchema>;
export type HelloAckMessage = z.infer<typeof HelloAckMessageSchema>;
export type WakewordDetectedMessage = z.infer<typeof WakewordDetectedMessageSchema>;
export type StartListenMessage = z.infer<typeof StartListenMessageSchema>;
export type StopListenMessage = z.infer<typeof StopListenMessageSchema>;
export type AbortMessage = z.infer<typeof AbortMessageSchema>;
export type TextMessage = z.infer<typeof TextMessageSchema>;
export type IntentMessage = z.infer<typeof IntentMessageSchema>;
export type RecognitionResultMessage = z.infer<typeof RecognitionResultMessageSchema>;
export type TtsStartMessage = z.infer<typeof TtsStartMessageSchema>;
export type TtsEndMessage = z.infer<typeof TtsEndMessageSchema>;
export type ErrorMessage = z.infer<typeof ErrorMessageSchema>;
export type PingMessage = z.infer<typeof PingMessageSchema>;
export type PongMessage = z.infer<typeof PongMessageSchema>;

export type ControlMessage = z.infer<typeof ControlMessageSchema>;

/**
 * Messages the server sends to a device
 */
export type ServerMessage =
  | HelloAckMessage
  | RecognitionResultMessage
  | IntentMessage
  | TtsStartMessage
  | TtsEndMessage
  | ErrorMessage
  | PingMessage
  | PongMessage;

/**
 * A decoded inbound WebSocket frame
 */
export type InboundFrame =
  | { kind: 'control'; message: ControlMessage }
  | { kind: 'audio'; data: Uint8Array };
