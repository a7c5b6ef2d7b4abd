/**
 * Packet serialization - LoRa audio transfer format
 *
 * Header (10 bytes):
 *   [0]    Version (high 4 bits) + Type (low 4 bits)
 *   [1]    Source node ID
 *   [2]    Destination node ID (0xFF = broadcast)
 *   [3]    Experiment ID
 *   [4-5]  Session ID (u16 LE)
 *   [6-7]  Sequence number (u16 LE)
 *   [8]    TX power (dBm)
 *   [9]    Spreading factor (high 4 bits) + Coding rate (low 4 bits)
 *
 * AUDIO_START payload (13 bytes):
 *   [0-1]  Total fragments   [2] Codec   [3-4] Sample rate (Hz)
 *   [5-6]  Duration (ms)     [7-10] Total size (bytes)   [11-12] CRC16
 *
 * AUDIO_DATA payload: raw audio bytes, up to 245, no padding
 *
 * AUDIO_END payload (7 bytes):
 *   [0-1]  Fragment count    [2-5] CRC32    [6] Reserved (0)
 *
 * ACK payload (3 bytes):
 *   [0-1]  Acknowledged sequence   [2] Status
 */
import { PROTOCOL } from '../utils/constants';
import type { PacketType, Codec, AckStatus } from '../utils/codes';
import { ProtocolError } from '../utils/errors';
import { writeUint16LE, writeUint32LE, concatBytes } from '../utils/helpers';

/** Header fields chosen by the sender; the version nibble is always PROTOCOL.VERSION */
export interface HeaderFields {
  type: PacketType;
  srcId: number;
  dstId: number;
  expId: number;
  sessionId: number;
  seqNum: number;
  txPow: number;
  sf: number;
  cr: number;
}

export interface PacketHeader extends HeaderFields {
  version: number;
}

export interface AudioStartPayload {
  totalFrags: number;
  codec: Codec;
  sampleHz: number;
  durationMs: number;
  totalSize: number;
  crc16: number;
}

export interface AudioEndPayload {
  fragCount: number;
  crc32: number;
  /** Always 0 on encode; whatever arrived on decode */
  reserved: number;
}

export interface AckPayload {
  ackSeq: number;
  status: AckStatus;
}

/** A header plus its already-serialized payload */
export interface Packet {
  header: HeaderFields;
  payload: Uint8Array;
}

export function makeVerType(version: number, typeCode: number): number {
  return ((version & 0x0F) << 4) | (typeCode & 0x0F);
}

export function makeSfCr(sf: number, cr: number): number {
  return ((sf & 0x0F) << 4) | (cr & 0x0F);
}

/**
 * Serialize a header to exactly 10 bytes
 */
export function encodeHeader(header: HeaderFields): Uint8Array {
  const buf = new Uint8Array(PROTOCOL.HEADER_SIZE);

  buf[0] = makeVerType(PROTOCOL.VERSION, header.type.code);
  buf[1] = header.srcId & 0xFF;
  buf[2] = header.dstId & 0xFF;
  buf[3] = header.expId & 0xFF;
  writeUint16LE(buf, 4, header.sessionId);
  writeUint16LE(buf, 6, header.seqNum);
  buf[8] = header.txPow & 0xFF;
  buf[9] = makeSfCr(header.sf, header.cr);

  return buf;
}

export function encodeStartPayload(payload: AudioStartPayload): Uint8Array {
  const buf = new Uint8Array(PROTOCOL.START_PAYLOAD_SIZE);

  writeUint16LE(buf, 0, payload.totalFrags);
  buf[2] = payload.codec.code & 0xFF;
  writeUint16LE(buf, 3, payload.sampleHz);
  writeUint16LE(buf, 5, payload.durationMs);
  writeUint32LE(buf, 7, payload.totalSize);
  writeUint16LE(buf, 11, payload.crc16);

  return buf;
}

/**
 * Serialize the END trailer. `reserved` is never taken from the caller.
 */
export function encodeEndPayload(payload: Pick<AudioEndPayload, 'fragCount' | 'crc32'>): Uint8Array {
  const buf = new Uint8Array(PROTOCOL.END_PAYLOAD_SIZE);

  writeUint16LE(buf, 0, payload.fragCount);
  writeUint32LE(buf, 2, payload.crc32);
  buf[6] = 0x00;

  return buf;
}

export function encodeAckPayload(payload: AckPayload): Uint8Array {
  const buf = new Uint8Array(PROTOCOL.ACK_PAYLOAD_SIZE);

  writeUint16LE(buf, 0, payload.ackSeq);
  buf[2] = payload.status.code & 0xFF;

  return buf;
}

/**
 * Serialize header + payload into one over-the-air packet
 */
export function encodePacket(packet: Packet): Uint8Array {
  const total = PROTOCOL.HEADER_SIZE + packet.payload.length;
  if (total > PROTOCOL.MAX_PACKET_SIZE) {
    throw new ProtocolError(
      `Packet too large: ${total} > ${PROTOCOL.MAX_PACKET_SIZE} bytes`,
      'PACKET_TOO_LARGE'
    );
  }
  return concatBytes(encodeHeader(packet.header), packet.payload);
}
