/**
 * Wire enumerations as tagged variants.
 *
 * Each decoder maps a raw code to a known variant or to `Unrecognized`
 * carrying the raw value, so corrupted or newer streams still decode.
 */
import { PACKET_CODES, CODEC_CODES, ACK_CODES } from './constants';

export type PacketType =
  | { tag: 'AudioStart'; code: typeof PACKET_CODES.AUDIO_START }
  | { tag: 'AudioData'; code: typeof PACKET_CODES.AUDIO_DATA }
  | { tag: 'AudioEnd'; code: typeof PACKET_CODES.AUDIO_END }
  | { tag: 'Ack'; code: typeof PACKET_CODES.ACK }
  | { tag: 'Unrecognized'; code: number };

export type Codec =
  | { tag: 'RawPcm'; code: typeof CODEC_CODES.RAW_PCM }
  | { tag: 'Compressed'; code: typeof CODEC_CODES.COMPRESSED }
  | { tag: 'Unrecognized'; code: number };

export type AckStatus =
  | { tag: 'Ok'; code: typeof ACK_CODES.OK }
  | { tag: 'CrcError'; code: typeof ACK_CODES.CRC_ERROR }
  | { tag: 'Missing'; code: typeof ACK_CODES.MISSING }
  | { tag: 'Unrecognized'; code: number };

export const PacketTypes = {
  AudioStart: { tag: 'AudioStart', code: PACKET_CODES.AUDIO_START },
  AudioData: { tag: 'AudioData', code: PACKET_CODES.AUDIO_DATA },
  AudioEnd: { tag: 'AudioEnd', code: PACKET_CODES.AUDIO_END },
  Ack: { tag: 'Ack', code: PACKET_CODES.ACK },
} as const satisfies Record<string, PacketType>;

export const Codecs = {
  RawPcm: { tag: 'RawPcm', code: CODEC_CODES.RAW_PCM },
  Compressed: { tag: 'Compressed', code: CODEC_CODES.COMPRESSED },
} as const satisfies Record<string, Codec>;

export const AckStatuses = {
  Ok: { tag: 'Ok', code: ACK_CODES.OK },
  CrcError: { tag: 'CrcError', code: ACK_CODES.CRC_ERROR },
  Missing: { tag: 'Missing', code: ACK_CODES.MISSING },
} as const satisfies Record<string, AckStatus>;

export function packetTypeFromCode(code: number): PacketType {
  switch (code) {
    case PACKET_CODES.AUDIO_START:
      return PacketTypes.AudioStart;
    case PACKET_CODES.AUDIO_DATA:
      return PacketTypes.AudioData;
    case PACKET_CODES.AUDIO_END:
      return PacketTypes.AudioEnd;
    case PACKET_CODES.ACK:
      return PacketTypes.Ack;
    default:
      return { tag: 'Unrecognized', code };
  }
}

export function codecFromCode(code: number): Codec {
  switch (code) {
    case CODEC_CODES.RAW_PCM:
      return Codecs.RawPcm;
    case CODEC_CODES.COMPRESSED:
      return Codecs.Compressed;
    default:
      return { tag: 'Unrecognized', code };
  }
}

export function ackStatusFromCode(code: number): AckStatus {
  switch (code) {
    case ACK_CODES.OK:
      return AckStatuses.Ok;
    case ACK_CODES.CRC_ERROR:
      return AckStatuses.CrcError;
    case ACK_CODES.MISSING:
      return AckStatuses.Missing;
    default:
      return { tag: 'Unrecognized', code };
  }
}

function formatUnknown(code: number): string {
  return `UNKNOWN(0x${code.toString(16).toUpperCase().padStart(2, '0')})`;
}

export function formatPacketType(type: PacketType): string {
  switch (type.tag) {
    case 'AudioStart':
      return 'AUDIO_START';
    case 'AudioData':
      return 'AUDIO_DATA';
    case 'AudioEnd':
      return 'AUDIO_END';
    case 'Ack':
      return 'ACK';
    case 'Unrecognized':
      return formatUnknown(type.code);
  }
}

export function formatCodec(codec: Codec): string {
  switch (codec.tag) {
    case 'RawPcm':
      return 'Raw PCM';
    case 'Compressed':
      return 'Compressed';
    case 'Unrecognized':
      return formatUnknown(codec.code);
  }
}

export function formatAckStatus(status: AckStatus): string {
  switch (status.tag) {
    case 'Ok':
      return 'OK';
    case 'CrcError':
      return 'CRC_ERR';
    case 'Missing':
      return 'MISSING';
    case 'Unrecognized':
      return formatUnknown(status.code);
  }
}
