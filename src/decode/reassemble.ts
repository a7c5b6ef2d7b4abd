/**
 * Reassembly of DATA fragments into the original buffer
 */
import type { Packet } from '../encode/frame';
import { crc32 } from '../lib/crc32';

export interface ReassemblyExpectation {
  /** Buffer length declared in AUDIO_START */
  totalSize: number;
  /** Fragment count declared in AUDIO_END (or AUDIO_START if END was lost) */
  fragCount: number;
  /** CRC32 from AUDIO_END; no integrity check when absent */
  crc32?: number;
}

export type ReassemblyResult =
  | { status: 'complete'; data: Uint8Array; crc32: number }
  | { status: 'incomplete'; missing: number[] }
  | {
      status: 'integrity-failure';
      reason: 'crc-mismatch' | 'size-mismatch';
      data: Uint8Array;
      expectedCrc32: number | null;
      actualCrc32: number;
    };

/**
 * Rebuild a buffer from the DATA packets of one session.
 *
 * Packets are ordered by seq_num; the first arrival of a duplicate wins and
 * non-DATA packets are ignored. Any gap in 0..fragCount-1 makes the result
 * `incomplete` instead of a shorter buffer.
 */
export function reassemble(
  dataPackets: readonly Packet[],
  expected: ReassemblyExpectation
): ReassemblyResult {
  const bySeq = new Map<number, Uint8Array>();
  const ordered = dataPackets
    .filter(p => p.header.type.tag === 'AudioData')
    .sort((a, b) => a.header.seqNum - b.header.seqNum);

  for (const packet of ordered) {
    if (!bySeq.has(packet.header.seqNum)) {
      bySeq.set(packet.header.seqNum, packet.payload);
    }
  }

  return reassembleFragments(bySeq, expected);
}

/**
 * Same as `reassemble`, for fragments already keyed by seq_num
 */
export function reassembleFragments(
  fragments: ReadonlyMap<number, Uint8Array>,
  expected: ReassemblyExpectation
): ReassemblyResult {
  const parts: Uint8Array[] = [];
  const missing: number[] = [];
  let joinedLength = 0;
  for (let seq = 0; seq < expected.fragCount; seq++) {
    const part = fragments.get(seq);
    if (part === undefined) {
      missing.push(seq);
    } else {
      parts.push(part);
      joinedLength += part.length;
    }
  }

  if (missing.length > 0) {
    return { status: 'incomplete', missing };
  }

  // Truncate to the declared size (drops any trailing padding)
  const data = new Uint8Array(Math.min(joinedLength, expected.totalSize));
  let offset = 0;
  for (const part of parts) {
    const toCopy = Math.min(part.length, data.length - offset);
    if (toCopy <= 0) break;
    data.set(part.subarray(0, toCopy), offset);
    offset += toCopy;
  }

  const actual = crc32(data);
  const expectedCrc = expected.crc32 === undefined ? null : expected.crc32 >>> 0;

  if (data.length !== expected.totalSize) {
    return {
      status: 'integrity-failure',
      reason: 'size-mismatch',
      data,
      expectedCrc32: expectedCrc,
      actualCrc32: actual,
    };
  }

  if (expectedCrc !== null && expectedCrc !== actual) {
    return {
      status: 'integrity-failure',
      reason: 'crc-mismatch',
      data,
      expectedCrc32: expectedCrc,
      actualCrc32: actual,
    };
  }

  return { status: 'complete', data, crc32: actual };
}
