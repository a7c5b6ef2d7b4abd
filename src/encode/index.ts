/**
 * Sender pipeline
 *
 * Flow: Audio buffer → (optional DEFLATE) → CRC16/CRC32 → START + DATA×N + END
 */
import pako from 'pako';
import { PROTOCOL, RADIO_DEFAULTS, LINK_DEFAULTS } from '../utils/constants';
import { PacketTypes, Codecs, type Codec, type PacketType } from '../utils/codes';
import { ProtocolError } from '../utils/errors';
import { crc16 } from '../lib/crc16';
import { crc32 } from '../lib/crc32';
import {
  encodeStartPayload,
  encodeEndPayload,
  encodePacket,
  type HeaderFields,
  type Packet,
} from './frame';

export interface TransferOptions {
  codec?: Codec;
  sampleHz?: number;
  durationMs?: number;
  srcId?: number;
  dstId?: number;
  expId?: number;
  sessionId: number;
  txPow?: number;
  sf?: number;
  cr?: number;
}

export interface AudioTransfer {
  sessionId: number;
  totalFrags: number;
  totalSize: number;
  crc16: number;
  crc32: number;
  start: Packet;
  data: Packet[];
  end: Packet;
}

/**
 * Number of DATA fragments needed for a buffer of the given size
 */
export function fragmentCount(totalSize: number): number {
  return Math.ceil(totalSize / PROTOCOL.MAX_DATA_PAYLOAD);
}

/**
 * Split an audio buffer into the ordered START, DATA and END packets of
 * one session. An empty buffer yields START + END with zero fragments.
 */
export function buildTransfer(audio: Uint8Array, options: TransferOptions): AudioTransfer {
  const totalSize = audio.length;
  const totalFrags = fragmentCount(totalSize);

  if (totalFrags > PROTOCOL.MAX_FRAGMENTS || totalSize > PROTOCOL.MAX_TOTAL_SIZE) {
    throw new ProtocolError(
      `Audio buffer of ${totalSize} bytes needs ${totalFrags} fragments (max ${PROTOCOL.MAX_FRAGMENTS})`,
      'TRANSFER_TOO_LARGE'
    );
  }

  const c16 = crc16(audio);
  const c32 = crc32(audio);

  const header = (type: PacketType, seqNum: number): HeaderFields => ({
    type,
    srcId: options.srcId ?? LINK_DEFAULTS.SRC_ID,
    dstId: options.dstId ?? LINK_DEFAULTS.DST_ID,
    expId: options.expId ?? LINK_DEFAULTS.EXP_ID,
    sessionId: options.sessionId & 0xFFFF,
    seqNum,
    txPow: options.txPow ?? RADIO_DEFAULTS.TX_POWER_DBM,
    sf: options.sf ?? RADIO_DEFAULTS.SPREADING_FACTOR,
    cr: options.cr ?? RADIO_DEFAULTS.CODING_RATE,
  });

  const start: Packet = {
    header: header(PacketTypes.AudioStart, 0),
    payload: encodeStartPayload({
      totalFrags,
      codec: options.codec ?? Codecs.RawPcm,
      sampleHz: options.sampleHz ?? LINK_DEFAULTS.SAMPLE_HZ,
      durationMs: options.durationMs ?? LINK_DEFAULTS.DURATION_MS,
      totalSize,
      crc16: c16,
    }),
  };

  const data: Packet[] = [];
  for (let i = 0; i < totalFrags; i++) {
    const offset = i * PROTOCOL.MAX_DATA_PAYLOAD;
    const end = Math.min(offset + PROTOCOL.MAX_DATA_PAYLOAD, totalSize);
    data.push({
      header: header(PacketTypes.AudioData, i),
      payload: audio.slice(offset, end),
    });
  }

  const end: Packet = {
    header: header(PacketTypes.AudioEnd, totalFrags),
    payload: encodeEndPayload({ fragCount: totalFrags, crc32: c32 }),
  };

  return {
    sessionId: options.sessionId & 0xFFFF,
    totalFrags,
    totalSize,
    crc16: c16,
    crc32: c32,
    start,
    data,
    end,
  };
}

/**
 * Encoded packets in transmission order
 */
export function transferToWire(transfer: AudioTransfer): Uint8Array[] {
  return [transfer.start, ...transfer.data, transfer.end].map(encodePacket);
}

/**
 * Total bytes over the air for a transfer, headers included
 */
export function transferWireBytes(transfer: AudioTransfer): number {
  const packets = [transfer.start, ...transfer.data, transfer.end];
  return packets.reduce((sum, p) => sum + PROTOCOL.HEADER_SIZE + p.payload.length, 0);
}

/**
 * Pick the payload and codec for an audio buffer. With `deflate` the
 * buffer is compressed (level 9) and sent as codec Compressed, unless the
 * DEFLATE stream would be no smaller than the PCM.
 */
export function prepareAudio(audio: Uint8Array, deflate: boolean): { data: Uint8Array; codec: Codec } {
  if (deflate) {
    const compressed = pako.deflate(audio, { level: 9 });
    if (compressed.length < audio.length) {
      return { data: compressed, codec: Codecs.Compressed };
    }
  }
  return { data: audio, codec: Codecs.RawPcm };
}
