/**
 * Tests for upstream and downstream wire formats
 */

import { describe, test, expect } from 'vitest';
import {
  ProtocolError,
  audioDataEnvelope,
  functionCallOutput,
  inputAudioAppend,
  parseTelephonyAudio,
  parseUpstreamMessage,
  responseCreate,
  stopAudioEnvelope,
  transcriptionEnvelope,
} from './protocol.js';

describe('upstream messages', () => {
  test('builds an audio append event', () => {
    expect(inputAudioAppend('AAEC')).toEqual({ type: 'input_audio_buffer.append', audio: 'AAEC' });
  });

  test('builds a response trigger', () => {
    expect(JSON.stringify(responseCreate())).toBe('{"type":"response.create"}');
  });

  test('encodes a function call result as JSON text', () => {
    const message = functionCallOutput('call-1', { success: false, message: 'Tool not found: x' });

    expect(message).toEqual({
      type: 'conversation.item.create',
      item: {
        type: 'function_call_output',
        call_id: 'call-1',
        output: '{"success":false,"message":"Tool not found: x"}',
      },
    });
  });
});

describe('parseUpstreamMessage', () => {
  test('reads the session id from session.created', () => {
    const parsed = parseUpstreamMessage(JSON.stringify({ type: 'session.created', session: { id: 'sess-1' } }));
    expect(parsed).toEqual({ kind: 'event', event: { type: 'session.created', sessionId: 'sess-1' } });
  });

  test('normalizes function call arguments', () => {
    const parsed = parseUpstreamMessage(
      JSON.stringify({
        type: 'response.function_call_arguments.done',
        call_id: 'call-9',
        name: 'lookup_information',
        arguments: '{"topic":"shipping"}',
      })
    );

    expect(parsed).toEqual({
      kind: 'event',
      event: {
        type: 'response.function_call_arguments.done',
        callId: 'call-9',
        name: 'lookup_information',
        arguments: '{"topic":"shipping"}',
      },
    });
  });

  test('defaults a missing transcript to an empty string', () => {
    const parsed = parseUpstreamMessage('{"type":"response.audio_transcript.done"}');
    expect(parsed).toEqual({ kind: 'event', event: { type: 'response.audio_transcript.done', transcript: '' } });
  });

  test('reads response id and status details from response.done', () => {
    const parsed = parseUpstreamMessage(
      JSON.stringify({ type: 'response.done', response: { id: 'resp-1', status_details: { reason: 'cancelled' } } })
    );
    expect(parsed).toEqual({
      kind: 'event',
      event: { type: 'response.done', responseId: 'resp-1', statusDetails: { reason: 'cancelled' } },
    });
  });

  test('reports unknown event types as unrecognized', () => {
    expect(parseUpstreamMessage('{"type":"rate_limits.updated"}')).toEqual({
      kind: 'unrecognized',
      type: 'rate_limits.updated',
    });
  });

  test('rejects invalid JSON', () => {
    expect(() => parseUpstreamMessage('not json')).toThrow(ProtocolError);
  });

  test('rejects messages without a type', () => {
    expect(() => parseUpstreamMessage('{"delta":"AAEC"}')).toThrow('Upstream message has no event type');
  });

  test('rejects audio deltas without a payload', () => {
    expect(() => parseUpstreamMessage('{"type":"response.audio.delta"}')).toThrow('Audio delta event has no payload');
  });
});

describe('downstream envelopes', () => {
  test('audio data envelope', () => {
    expect(JSON.stringify(audioDataEnvelope('AAEC'))).toBe(
      '{"Kind":"AudioData","AudioData":{"Data":"AAEC"},"StopAudio":null}'
    );
  });

  test('stop audio envelope', () => {
    expect(JSON.stringify(stopAudioEnvelope())).toBe('{"Kind":"StopAudio","AudioData":null,"StopAudio":{}}');
  });

  test('transcription envelope', () => {
    expect(transcriptionEnvelope('Hello')).toEqual({ Kind: 'Transcription', Text: 'Hello' });
  });
});

describe('parseTelephonyAudio', () => {
  test('returns the payload of a non-silent audio frame', () => {
    const frame = JSON.stringify({ kind: 'AudioData', audioData: { data: 'AAEC', silent: false } });
    expect(parseTelephonyAudio(frame)).toBe('AAEC');
  });

  test('drops silent frames', () => {
    const frame = JSON.stringify({ kind: 'AudioData', audioData: { data: 'AAEC', silent: true } });
    expect(parseTelephonyAudio(frame)).toBeNull();
  });

  test('treats a frame without the silent flag as silent', () => {
    const frame = JSON.stringify({ kind: 'AudioData', audioData: { data: 'AAEC' } });
    expect(parseTelephonyAudio(frame)).toBeNull();
  });

  test('ignores other frame kinds', () => {
    expect(parseTelephonyAudio('{"kind":"AudioMetadata","audioMetadata":{}}')).toBeNull();
  });

  test('rejects frames that are not JSON objects', () => {
    expect(() => parseTelephonyAudio('[1,2]')).toThrow('Telephony frame is not a JSON object');
    expect(() => parseTelephonyAudio('{')).toThrow(ProtocolError);
  });
});
