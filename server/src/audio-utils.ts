/**
 * Audio Encoding Utilities
 *
 * The upstream service carries audio as base64 text inside JSON events, while
 * web clients exchange raw 16-bit PCM frames. These helpers convert between the two.
 */

/**
 * Encode raw PCM bytes for an upstream `input_audio_buffer.append` event
 */
export function encodeAudio(pcmData: Buffer): string {
  return pcmData.toString('base64');
}

/**
 * Decode a base64 audio payload back to raw PCM bytes
 */
export function decodeAudio(base64Data: string): Buffer {
  return Buffer.from(base64Data, 'base64');
}

/**
 * Accept either raw bytes or an already-encoded payload and return base64 text
 */
export function toBase64Audio(audio: Buffer | string): string {
  return typeof audio === 'string' ? audio : encodeAudio(audio);
}
