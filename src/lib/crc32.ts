/**
 * CRC-32/ISO-HDLC (reflected polynomial 0xEDB88320, zlib-compatible)
 *
 * Authoritative integrity check over a fully reassembled audio buffer,
 * carried in the AUDIO_END payload.
 */
import { writeUint32LE } from '../utils/helpers';

const POLYNOMIAL = 0xEDB88320;

function buildTable(): Uint32Array {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? (c >>> 1) ^ POLYNOMIAL : c >>> 1;
    }
    table[n] = c;
  }
  return table;
}

const TABLE = buildTable();

/**
 * Continue a checksum over more bytes. `previous` is the finished CRC of
 * everything before `data` (0 for nothing), as in zlib's crc32().
 */
export function crc32Update(previous: number, data: Uint8Array): number {
  let c = (previous ^ 0xFFFFFFFF) >>> 0;
  for (const byte of data) {
    c = TABLE[(c ^ byte) & 0xFF] ^ (c >>> 8);
  }
  return (c ^ 0xFFFFFFFF) >>> 0;
}

export function crc32(data: Uint8Array): number {
  return crc32Update(0, data);
}

/**
 * CRC32 in wire order (little-endian)
 */
export function crc32Bytes(data: Uint8Array): Uint8Array {
  const bytes = new Uint8Array(4);
  writeUint32LE(bytes, 0, crc32(data));
  return bytes;
}

export function verifyCRC32(data: Uint8Array, expectedCRC: number): boolean {
  return crc32(data) === expectedCRC >>> 0;
}
