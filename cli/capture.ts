/**
 * Packet capture files: one packet per line as hex, '#' comments allowed
 */

import { readFileSync, writeFileSync } from 'fs';
import { bytesToHex, hexToBytes } from '../src/utils/helpers.js';

export function formatCapture(packets: Uint8Array[], comment?: string): string {
  const lines = packets.map(p => bytesToHex(p));
  if (comment) lines.unshift(`# ${comment}`);
  return lines.join('\n') + '\n';
}

export function parseCapture(text: string): { packets: Uint8Array[]; invalid: number } {
  const packets: Uint8Array[] = [];
  let invalid = 0;

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;

    const bytes = hexToBytes(line);
    if (bytes) {
      packets.push(bytes);
    } else {
      invalid++;
    }
  }

  return { packets, invalid };
}

export function writeCaptureFile(filePath: string, packets: Uint8Array[], comment?: string): void {
  writeFileSync(filePath, formatCapture(packets, comment));
}

export function readCaptureFile(filePath: string): { packets: Uint8Array[]; invalid: number } {
  return parseCapture(readFileSync(filePath, 'utf-8'));
}
