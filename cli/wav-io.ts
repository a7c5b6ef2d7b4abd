/**
 * WAV file I/O for the CLI
 *
 * The link carries PCM bytes untouched, so parsing stops at locating the
 * data chunk; no sample conversion happens here.
 */

import { readFileSync, writeFileSync } from 'fs';

export interface WavData {
  /** Raw bytes of the data chunk */
  pcm: Uint8Array;
  sampleRate: number;
  numChannels: number;
  bitsPerSample: number;
  durationMs: number;
}

export function isWav(buffer: Uint8Array): boolean {
  return (
    buffer.length >= 12 &&
    String.fromCharCode(buffer[0], buffer[1], buffer[2], buffer[3]) === 'RIFF' &&
    String.fromCharCode(buffer[8], buffer[9], buffer[10], buffer[11]) === 'WAVE'
  );
}

/**
 * Parse a WAV file and return its PCM data chunk
 */
export function parseWavFile(filePath: string): WavData {
  return parseWavBuffer(new Uint8Array(readFileSync(filePath)));
}

/**
 * Parse WAV data from a buffer
 */
export function parseWavBuffer(buffer: Uint8Array): WavData {
  if (!isWav(buffer)) {
    throw new Error('Not a valid WAV file: missing RIFF/WAVE header');
  }

  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);

  // Find fmt chunk
  let offset = 12;
  let fmtFound = false;
  let numChannels = 0;
  let sampleRate = 0;
  let bitsPerSample = 0;
  let audioFormat = 0;

  while (offset <= buffer.length - 8) {
    const chunkId = String.fromCharCode(buffer[offset], buffer[offset + 1], buffer[offset + 2], buffer[offset + 3]);
    const chunkSize = view.getUint32(offset + 4, true);

    if (chunkId === 'fmt ') {
      if (chunkSize < 16 || offset + 24 > buffer.length) {
        throw new Error('Not a valid WAV file: truncated fmt chunk');
      }
      audioFormat = view.getUint16(offset + 8, true);
      numChannels = view.getUint16(offset + 10, true);
      sampleRate = view.getUint32(offset + 12, true);
      bitsPerSample = view.getUint16(offset + 22, true);
      fmtFound = true;
    }

    if (chunkId === 'data') {
      if (!fmtFound) {
        throw new Error('WAV file missing fmt chunk before data');
      }

      // Only integer PCM travels as RawPcm
      if (audioFormat !== 1) {
        throw new Error(`Unsupported WAV format: ${audioFormat} (only PCM supported)`);
      }

      const dataOffset = offset + 8;
      const dataEnd = Math.min(dataOffset + chunkSize, buffer.length);
      const pcm = buffer.slice(dataOffset, dataEnd);
      const bytesPerFrame = (bitsPerSample / 8) * numChannels;
      const frames = bytesPerFrame > 0 ? Math.floor(pcm.length / bytesPerFrame) : 0;

      return {
        pcm,
        sampleRate,
        numChannels,
        bitsPerSample,
        durationMs: sampleRate > 0 ? Math.round((frames / sampleRate) * 1000) : 0,
      };
    }

    offset += 8 + chunkSize;
    // Chunks are word-aligned
    if (chunkSize % 2 !== 0) offset++;
  }

  throw new Error('WAV file missing data chunk');
}

/**
 * Write PCM bytes to a WAV file
 */
export function writeWavFile(
  filePath: string,
  pcm: Uint8Array,
  sampleRate: number,
  numChannels = 1,
  bitsPerSample = 16
): void {
  writeFileSync(filePath, createWavBuffer(pcm, sampleRate, numChannels, bitsPerSample));
}

/**
 * Wrap PCM bytes in a 44-byte RIFF/WAVE header
 */
export function createWavBuffer(
  pcm: Uint8Array,
  sampleRate: number,
  numChannels = 1,
  bitsPerSample = 16
): Buffer {
  const bytesPerSample = bitsPerSample / 8;
  const blockAlign = numChannels * bytesPerSample;
  const byteRate = sampleRate * blockAlign;
  const dataSize = pcm.length;
  const fileSize = 44 + dataSize;

  const buffer = Buffer.alloc(fileSize);
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);

  // RIFF header
  buffer.write('RIFF', 0);
  view.setUint32(4, fileSize - 8, true);
  buffer.write('WAVE', 8);

  // fmt chunk
  buffer.write('fmt ', 12);
  view.setUint32(16, 16, true);
  view.setUint16(20, 1, true);  // PCM
  view.setUint16(22, numChannels, true);
  view.setUint32(24, sampleRate, true);
  view.setUint32(28, byteRate, true);
  view.setUint16(32, blockAlign, true);
  view.setUint16(34, bitsPerSample, true);

  // data chunk
  buffer.write('data', 36);
  view.setUint32(40, dataSize, true);
  buffer.set(pcm, 44);

  return buffer;
}
