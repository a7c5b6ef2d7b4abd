/**
 * LoRa time-on-air model (Semtech SX1262 formula)
 *
 * Assumes explicit header mode, CRC on, 8 preamble symbols and low data
 * rate optimisation on for SF11/SF12 at 125 kHz.
 */
import { PROTOCOL, RADIO_DEFAULTS } from '../utils/constants';
import { fragmentCount } from '../encode/index';

export interface TransferStats {
  audioBytes: number;
  totalFrags: number;
  /** DATA packets plus START and END */
  totalPackets: number;
  airtimeMs: number;
  airtimeS: number;
  throughputBps: number;
}

export interface TransferStatsOptions {
  /**
   * Size the last DATA packet from the real remainder instead of a full
   * 245-byte fragment
   */
  exactLastFragment?: boolean;
}

export interface TransferComparison {
  sf: number;
  raw: TransferStats;
  compressed: TransferStats;
  savingS: number;
  savingPct: number;
}

// Packet sizes on air, header included
export const START_PACKET_SIZE = PROTOCOL.HEADER_SIZE + PROTOCOL.START_PAYLOAD_SIZE;
export const DATA_PACKET_SIZE = PROTOCOL.HEADER_SIZE + PROTOCOL.MAX_DATA_PAYLOAD;
export const END_PACKET_SIZE = PROTOCOL.HEADER_SIZE + PROTOCOL.END_PAYLOAD_SIZE;

/**
 * Airtime of one packet in milliseconds
 * @param payloadBytes PHY payload length (our header + payload)
 * @param cr Coding rate denominator as configured on the radio (5 = 4/5)
 */
export function estimatePacketAirtimeMs(
  payloadBytes: number,
  sf: number,
  bwKhz: number = RADIO_DEFAULTS.BANDWIDTH_KHZ,
  cr: number = RADIO_DEFAULTS.CODING_RATE
): number {
  const tSym = Math.pow(2, sf) / (bwKhz * 1000) * 1000;
  const tPreamble = (RADIO_DEFAULTS.PREAMBLE_SYMBOLS + 4.25) * tSym;

  const de = sf >= 11 && bwKhz === 125.0 ? 1 : 0;
  const nPayload = Math.max(
    8 + Math.max(
      Math.ceil((8 * payloadBytes - 4 * sf + 28 + 16 - 20) / (4 * (sf - 2 * de))),
      0
    ) * (cr + 4),
    0
  );

  return tPreamble + nPayload * tSym;
}

/**
 * Total airtime and throughput of one transfer (START + DATA×N + END)
 */
export function estimateTransferStats(
  audioBytes: number,
  sf: number,
  bwKhz: number = RADIO_DEFAULTS.BANDWIDTH_KHZ,
  cr: number = RADIO_DEFAULTS.CODING_RATE,
  options: TransferStatsOptions = {}
): TransferStats {
  const totalFrags = fragmentCount(audioBytes);

  const airtimeStart = estimatePacketAirtimeMs(START_PACKET_SIZE, sf, bwKhz, cr);
  const airtimeEnd = estimatePacketAirtimeMs(END_PACKET_SIZE, sf, bwKhz, cr);
  const airtimeFull = estimatePacketAirtimeMs(DATA_PACKET_SIZE, sf, bwKhz, cr);

  let airtimeData = airtimeFull * totalFrags;
  if (options.exactLastFragment && totalFrags > 0) {
    const lastPayload = audioBytes - (totalFrags - 1) * PROTOCOL.MAX_DATA_PAYLOAD;
    const lastSize = PROTOCOL.HEADER_SIZE + lastPayload;
    airtimeData = airtimeFull * (totalFrags - 1) + estimatePacketAirtimeMs(lastSize, sf, bwKhz, cr);
  }

  const airtimeMs = airtimeStart + airtimeData + airtimeEnd;
  const airtimeS = airtimeMs / 1000;

  return {
    audioBytes,
    totalFrags,
    totalPackets: totalFrags + 2,
    airtimeMs,
    airtimeS,
    throughputBps: (audioBytes * 8) / airtimeS,
  };
}

/**
 * Raw vs compressed transfer airtime for each spreading factor
 */
export function compareTransfers(
  rawBytes: number,
  compressedBytes: number,
  sfs: number[],
  bwKhz: number = RADIO_DEFAULTS.BANDWIDTH_KHZ,
  cr: number = RADIO_DEFAULTS.CODING_RATE,
  options: TransferStatsOptions = {}
): TransferComparison[] {
  return sfs.map(sf => {
    const raw = estimateTransferStats(rawBytes, sf, bwKhz, cr, options);
    const compressed = estimateTransferStats(compressedBytes, sf, bwKhz, cr, options);
    const savingS = raw.airtimeS - compressed.airtimeS;
    return {
      sf,
      raw,
      compressed,
      savingS,
      savingPct: (savingS / raw.airtimeS) * 100,
    };
  });
}
