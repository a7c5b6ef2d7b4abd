/**
 * Packet parsing - LoRa audio transfer format
 *
 * Inverse of encode/frame.ts. Multi-byte fields are little-endian; the
 * version and type share byte 0, spreading factor and coding rate share
 * byte 9.
 */
import { PROTOCOL } from '../utils/constants';
import {
  packetTypeFromCode,
  codecFromCode,
  ackStatusFromCode,
  formatPacketType,
  AckStatuses,
  type AckStatus,
} from '../utils/codes';
import { ProtocolError } from '../utils/errors';
import { readUint16LE, readUint32LE } from '../utils/helpers';
import type {
  PacketHeader,
  AudioStartPayload,
  AudioEndPayload,
  AckPayload,
} from '../encode/frame';
import { reassembleFragments, type ReassemblyResult } from './reassemble';

export type DecodedPacket =
  | { kind: 'start'; header: PacketHeader; payload: Uint8Array; start: AudioStartPayload }
  | { kind: 'data'; header: PacketHeader; payload: Uint8Array }
  | { kind: 'end'; header: PacketHeader; payload: Uint8Array; end: AudioEndPayload }
  | { kind: 'ack'; header: PacketHeader; payload: Uint8Array; ack: AckPayload }
  | { kind: 'unrecognized'; header: PacketHeader; payload: Uint8Array };

export function getVersion(verType: number): number {
  return (verType >> 4) & 0x0F;
}

export function getType(verType: number): number {
  return verType & 0x0F;
}

export function getSF(sfCr: number): number {
  return (sfCr >> 4) & 0x0F;
}

export function getCodingRate(sfCr: number): number {
  return sfCr & 0x0F;
}

/**
 * Parse the 10-byte header at the start of a packet
 */
export function decodeHeader(bytes: Uint8Array): PacketHeader {
  if (bytes.length < PROTOCOL.HEADER_SIZE) {
    throw new ProtocolError(
      `Header too short: ${bytes.length} bytes (need ${PROTOCOL.HEADER_SIZE})`,
      'TRUNCATED_HEADER'
    );
  }

  const version = getVersion(bytes[0]);
  if (version !== PROTOCOL.VERSION) {
    throw new ProtocolError(
      `Unsupported protocol version ${version} (expected ${PROTOCOL.VERSION})`,
      'UNSUPPORTED_VERSION'
    );
  }

  return {
    version,
    type: packetTypeFromCode(getType(bytes[0])),
    srcId: bytes[1],
    dstId: bytes[2],
    expId: bytes[3],
    sessionId: readUint16LE(bytes, 4),
    seqNum: readUint16LE(bytes, 6),
    txPow: bytes[8],
    sf: getSF(bytes[9]),
    cr: getCodingRate(bytes[9]),
  };
}

function requirePayload(bytes: Uint8Array, size: number, what: string): void {
  if (bytes.length < size) {
    throw new ProtocolError(
      `${what} payload too short: ${bytes.length} bytes (need ${size})`,
      'TRUNCATED_PAYLOAD'
    );
  }
}

export function decodeStartPayload(bytes: Uint8Array): AudioStartPayload {
  requirePayload(bytes, PROTOCOL.START_PAYLOAD_SIZE, 'AUDIO_START');

  return {
    totalFrags: readUint16LE(bytes, 0),
    codec: codecFromCode(bytes[2]),
    sampleHz: readUint16LE(bytes, 3),
    durationMs: readUint16LE(bytes, 5),
    totalSize: readUint32LE(bytes, 7),
    crc16: readUint16LE(bytes, 11),
  };
}

export function decodeEndPayload(bytes: Uint8Array): AudioEndPayload {
  requirePayload(bytes, PROTOCOL.END_PAYLOAD_SIZE, 'AUDIO_END');

  return {
    fragCount: readUint16LE(bytes, 0),
    crc32: readUint32LE(bytes, 2),
    reserved: bytes[6],
  };
}

export function decodeAckPayload(bytes: Uint8Array): AckPayload {
  requirePayload(bytes, PROTOCOL.ACK_PAYLOAD_SIZE, 'ACK');

  return {
    ackSeq: readUint16LE(bytes, 0),
    status: ackStatusFromCode(bytes[2]),
  };
}

/**
 * Parse a full over-the-air packet, dispatching on the header type
 */
export function decodePacket(bytes: Uint8Array): DecodedPacket {
  const header = decodeHeader(bytes);
  const payload = bytes.subarray(PROTOCOL.HEADER_SIZE);

  switch (header.type.tag) {
    case 'AudioStart':
      return { kind: 'start', header, payload, start: decodeStartPayload(payload) };
    case 'AudioData':
      return { kind: 'data', header, payload };
    case 'AudioEnd':
      return { kind: 'end', header, payload, end: decodeEndPayload(payload) };
    case 'Ack':
      return { kind: 'ack', header, payload, ack: decodeAckPayload(payload) };
    case 'Unrecognized':
      return { kind: 'unrecognized', header, payload };
  }
}

/**
 * One-line summary of a header, for debug output
 */
export function formatHeader(header: PacketHeader): string {
  const hex2 = (n: number) => `0x${n.toString(16).toUpperCase().padStart(2, '0')}`;
  return [
    `v${header.version}`,
    formatPacketType(header.type),
    `src=${hex2(header.srcId)}`,
    `dst=${header.dstId === PROTOCOL.BROADCAST_ID ? 'all' : hex2(header.dstId)}`,
    `exp=${header.expId}`,
    `session=0x${header.sessionId.toString(16).toUpperCase().padStart(4, '0')}`,
    `seq=${header.seqNum}`,
    `tx=${header.txPow}dBm`,
    `SF${header.sf}`,
    `CR4/${header.cr}`,
  ].join(' ');
}

/**
 * Fragment collector - accumulates the packets of one session
 */
export class FragmentCollector {
  private start: AudioStartPayload | null = null;
  private end: AudioEndPayload | null = null;
  private fragments: Map<number, Uint8Array> = new Map();

  constructor(public readonly sessionId: number) {}

  reset(): void {
    this.start = null;
    this.end = null;
    this.fragments.clear();
  }

  setStart(start: AudioStartPayload): void {
    this.start = start;
  }

  setEnd(end: AudioEndPayload): void {
    this.end = end;
  }

  getStart(): AudioStartPayload | null {
    return this.start;
  }

  getEnd(): AudioEndPayload | null {
    return this.end;
  }

  /**
   * Add a received DATA fragment.
   * Returns true if the fragment belongs to this session.
   */
  addFragment(seqNum: number, payload: Uint8Array, sessionId: number): boolean {
    if (sessionId !== this.sessionId) {
      console.warn('[Collector] Fragment for session', sessionId, 'offered to session', this.sessionId);
      return false;
    }

    // Don't overwrite if we already have this fragment
    if (this.fragments.has(seqNum)) {
      console.warn('[Collector] Duplicate fragment', seqNum, 'in session', this.sessionId);
      return true;
    }

    this.fragments.set(seqNum, new Uint8Array(payload));
    return true;
  }

  /**
   * Fragment count from END when present, otherwise as announced by START
   */
  getExpectedCount(): number {
    return this.end?.fragCount ?? this.start?.totalFrags ?? 0;
  }

  getReceivedCount(): number {
    return this.fragments.size;
  }

  isComplete(): boolean {
    return this.start !== null && this.getMissingFragments().length === 0;
  }

  getMissingFragments(): number[] {
    const missing: number[] = [];
    const expected = this.getExpectedCount();
    for (let i = 0; i < expected; i++) {
      if (!this.fragments.has(i)) {
        missing.push(i);
      }
    }
    return missing;
  }

  /**
   * Get progress (0-1)
   */
  getProgress(): number {
    const expected = this.getExpectedCount();
    if (expected === 0) return this.start ? 1 : 0;
    return Math.min(this.fragments.size / expected, 1);
  }

  /**
   * Reassemble the session buffer.
   * Returns null until AUDIO_START has been seen (the total size is unknown).
   */
  reassemble(): ReassemblyResult | null {
    if (!this.start) {
      return null;
    }

    return reassembleFragments(this.fragments, {
      totalSize: this.start.totalSize,
      fragCount: this.getExpectedCount(),
      crc32: this.end?.crc32,
    });
  }

  /**
   * Status a receiver would acknowledge the END packet with
   */
  ackStatus(): AckStatus {
    const result = this.reassemble();
    if (!result || result.status === 'incomplete') {
      return AckStatuses.Missing;
    }
    if (result.status === 'integrity-failure') {
      return AckStatuses.CrcError;
    }
    return AckStatuses.Ok;
  }
}
