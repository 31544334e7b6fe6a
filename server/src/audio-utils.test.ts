/**
 * Tests for audio encoding utilities
 */

import { describe, test, expect } from 'vitest';
import { encodeAudio, decodeAudio, toBase64Audio } from './audio-utils.js';

describe('encodeAudio', () => {
  test('encodes PCM bytes as base64', () => {
    expect(encodeAudio(Buffer.from([0x00, 0x01, 0x02, 0x03]))).toBe('AAECAw==');
  });

  test('handles empty input', () => {
    expect(encodeAudio(Buffer.alloc(0))).toBe('');
  });
});

describe('decodeAudio', () => {
  test('decodes base64 back to the original bytes', () => {
    const pcm = Buffer.alloc(8);
    for (let i = 0; i < 4; i++) {
      pcm.writeInt16LE(i * 1000 - 1500, i * 2);
    }

    const decoded = decodeAudio(encodeAudio(pcm));

    expect(decoded.equals(pcm)).toBe(true);
    expect(decoded.readInt16LE(0)).toBe(-1500);
    expect(decoded.readInt16LE(6)).toBe(1500);
  });
});

describe('toBase64Audio', () => {
  test('encodes buffers', () => {
    expect(toBase64Audio(Buffer.from('hi'))).toBe('aGk=');
  });

  test('passes strings through unchanged', () => {
    expect(toBase64Audio('AAECAw==')).toBe('AAECAw==');
  });
});
