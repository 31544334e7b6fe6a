/**
 * Wire Protocol
 *
 * Envelope types and codecs for both sides of a relay session:
 * - Upstream: JSON events exchanged with the Voice Live realtime API
 * - Downstream: frames exchanged with web and telephony clients
 */

import type { FunctionDefinition, ToolResult } from './tools/types.js';

export type ConnectionType = 'web' | 'telephony';

export interface TranscriptEntry {
  role: 'user' | 'assistant';
  content: string;
}

// ===== Upstream: outbound messages =====

export interface TurnDetectionOptions {
  type: string;
  threshold: number;
  prefix_padding_ms: number;
  silence_duration_ms: number;
  remove_filler_words: boolean;
  end_of_utterance_detection: {
    model: string;
    threshold: number;
    timeout: number;
  };
}

export interface VoiceOptions {
  name: string;
  type: string;
  temperature: number;
}

export interface SessionUpdateMessage {
  type: 'session.update';
  session: {
    instructions: string;
    turn_detection: TurnDetectionOptions;
    input_audio_noise_reduction: { type: string };
    input_audio_echo_cancellation: { type: string };
    voice: VoiceOptions;
    tools: FunctionDefinition[];
    tool_choice: 'auto' | 'none' | 'required';
  };
}

export interface InputAudioAppendMessage {
  type: 'input_audio_buffer.append';
  audio: string;
}

export interface ResponseCreateMessage {
  type: 'response.create';
}

export interface FunctionCallOutputMessage {
  type: 'conversation.item.create';
  item: {
    type: 'function_call_output';
    call_id: string;
    output: string;
  };
}

export type UpstreamOutboundMessage =
  | SessionUpdateMessage
  | InputAudioAppendMessage
  | ResponseCreateMessage
  | FunctionCallOutputMessage;

export function inputAudioAppend(audio: string): InputAudioAppendMessage {
  return { type: 'input_audio_buffer.append', audio };
}

export function responseCreate(): ResponseCreateMessage {
  return { type: 'response.create' };
}

export function functionCallOutput(callId: string, result: ToolResult): FunctionCallOutputMessage {
  return {
    type: 'conversation.item.create',
    item: {
      type: 'function_call_output',
      call_id: callId,
      output: JSON.stringify(result),
    },
  };
}

// ===== Upstream: inbound events =====

export type UpstreamEvent =
  | { type: 'session.created'; sessionId: string | undefined }
  | { type: 'input_audio_buffer.cleared' }
  | { type: 'input_audio_buffer.speech_started'; audioStartMs: number | undefined }
  | { type: 'input_audio_buffer.speech_stopped' }
  | { type: 'conversation.item.input_audio_transcription.completed'; transcript: string }
  | { type: 'conversation.item.input_audio_transcription.failed'; error: unknown }
  | FunctionCallArgumentsDoneEvent
  | { type: 'response.done'; responseId: string | undefined; statusDetails: unknown }
  | { type: 'response.audio_transcript.done'; transcript: string }
  | { type: 'response.audio.delta'; delta: string }
  | { type: 'error'; error: unknown };

export interface FunctionCallArgumentsDoneEvent {
  type: 'response.function_call_arguments.done';
  callId: string | undefined;
  name: string;
  /** Either a structured value or a JSON-encoded string */
  arguments: unknown;
}

export type ParsedUpstreamMessage =
  | { kind: 'event'; event: UpstreamEvent }
  | { kind: 'unrecognized'; type: string };

export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function getNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Decode one upstream text message.
 * @throws ProtocolError when the message is not a JSON object with a string `type`
 */
export function parseUpstreamMessage(raw: string): ParsedUpstreamMessage {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new ProtocolError('Upstream message is not valid JSON');
  }

  if (!isRecord(data)) {
    throw new ProtocolError('Upstream message is not a JSON object');
  }

  const type = getString(data.type);
  if (!type) {
    throw new ProtocolError('Upstream message has no event type');
  }

  switch (type) {
    case 'session.created': {
      const session = isRecord(data.session) ? data.session : {};
      return { kind: 'event', event: { type, sessionId: getString(session.id) } };
    }
    case 'input_audio_buffer.cleared':
    case 'input_audio_buffer.speech_stopped':
      return { kind: 'event', event: { type } };
    case 'input_audio_buffer.speech_started':
      return { kind: 'event', event: { type, audioStartMs: getNumber(data.audio_start_ms) } };
    case 'conversation.item.input_audio_transcription.completed':
    case 'response.audio_transcript.done':
      return { kind: 'event', event: { type, transcript: getString(data.transcript) ?? '' } };
    case 'conversation.item.input_audio_transcription.failed':
    case 'error':
      return { kind: 'event', event: { type, error: data.error } };
    case 'response.function_call_arguments.done':
      return {
        kind: 'event',
        event: {
          type,
          callId: getString(data.call_id),
          name: getString(data.name) ?? '',
          arguments: data.arguments,
        },
      };
    case 'response.done': {
      const response = isRecord(data.response) ? data.response : {};
      return {
        kind: 'event',
        event: { type, responseId: getString(response.id), statusDetails: response.status_details },
      };
    }
    case 'response.audio.delta': {
      const delta = getString(data.delta);
      if (delta === undefined) {
        throw new ProtocolError('Audio delta event has no payload');
      }
      return { kind: 'event', event: { type, delta } };
    }
    default:
      return { kind: 'unrecognized', type };
  }
}

// ===== Downstream: outbound frames =====

export interface AudioDataEnvelope {
  Kind: 'AudioData';
  AudioData: { Data: string };
  StopAudio: null;
}

export interface StopAudioEnvelope {
  Kind: 'StopAudio';
  AudioData: null;
  StopAudio: Record<string, never>;
}

export interface TranscriptionEnvelope {
  Kind: 'Transcription';
  Text: string;
}

export type DownstreamEnvelope = AudioDataEnvelope | StopAudioEnvelope | TranscriptionEnvelope;

export function audioDataEnvelope(base64Data: string): AudioDataEnvelope {
  return { Kind: 'AudioData', AudioData: { Data: base64Data }, StopAudio: null };
}

export function stopAudioEnvelope(): StopAudioEnvelope {
  return { Kind: 'StopAudio', AudioData: null, StopAudio: {} };
}

export function transcriptionEnvelope(text: string): TranscriptionEnvelope {
  return { Kind: 'Transcription', Text: text };
}

// ===== Downstream: inbound telephony frames =====

/**
 * Extract the base64 audio payload from a telephony media frame.
 *
 * Returns null for frames that carry nothing to forward: other kinds, and
 * audio flagged as silent (a frame without the flag counts as silent).
 * @throws ProtocolError when the frame is not a JSON object
 */
export function parseTelephonyAudio(frame: string): string | null {
  let data: unknown;
  try {
    data = JSON.parse(frame);
  } catch {
    throw new ProtocolError('Telephony frame is not valid JSON');
  }

  if (!isRecord(data)) {
    throw new ProtocolError('Telephony frame is not a JSON object');
  }

  if (data.kind !== 'AudioData') {
    return null;
  }

  const audioData = isRecord(data.audioData) ? data.audioData : {};
  if (audioData.silent !== false) {
    return null;
  }

  return getString(audioData.data) ?? null;
}
