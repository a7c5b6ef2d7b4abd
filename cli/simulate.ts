/**
 * CLI Simulate Command - build the packet sequence a sender would transmit
 */

import { readFileSync } from 'fs';
import { LIMITS, LINK_DEFAULTS, RADIO_DEFAULTS } from '../src/utils/constants.js';
import { Codecs, formatCodec, type Codec } from '../src/utils/codes.js';
import { generateRamp, generateSessionId, formatBytes } from '../src/utils/helpers.js';
import { buildTransfer, prepareAudio, transferToWire, transferWireBytes } from '../src/encode/index.js';
import { estimateTransferStats } from '../src/lib/airtime.js';
import { isWav, parseWavBuffer } from './wav-io.js';
import { writeCaptureFile } from './capture.js';
import { formatSessionId, formatStartLayout } from './report.js';
import { progressLog } from './quiet.js';

export interface SimulateOptions {
  size?: number;
  codec: string;
  deflate?: boolean;
  session?: number;
  exp?: number;
  src?: number;
  dst?: number;
  sf: number;
  cr: number;
  bw: number;
  power: number;
  sampleRate?: number;
  duration?: number;
  drop?: number[];
  output?: string;
  layout?: boolean;
  json?: boolean;
  quiet?: boolean;
}

export interface SimulateSummary {
  sessionId: number;
  codec: string;
  audioBytes: number;
  payloadBytes: number;
  totalFrags: number;
  totalPackets: number;
  sentPackets: number;
  droppedFragments: number[];
  wireBytes: number;
  crc16: number;
  crc32: number;
  startPacketSize: number;
  firstDataPacketSize: number | null;
  endPacketSize: number;
  airtimeS: number;
  output?: string;
}

interface AudioInput {
  audio: Uint8Array;
  sampleHz: number;
  durationMs: number;
}

function clampU16(value: number, what: string, log: (...args: unknown[]) => void): number {
  if (value > 0xFFFF) {
    log(`Warning: ${what} ${value} does not fit in 16 bits, sending ${0xFFFF}`);
    return 0xFFFF;
  }
  return value;
}

function loadAudio(file: string | undefined, options: SimulateOptions, log: (...args: unknown[]) => void): AudioInput {
  if (!file) {
    const size = options.size ?? LIMITS.DEFAULT_TEST_BYTES;
    log(`Generating ${size}-byte ramp test buffer`);
    return {
      audio: generateRamp(size),
      sampleHz: options.sampleRate ?? LINK_DEFAULTS.SAMPLE_HZ,
      durationMs: options.duration ?? LINK_DEFAULTS.DURATION_MS,
    };
  }

  log(`Reading ${file}...`);
  const bytes = new Uint8Array(readFileSync(file));
  if (isWav(bytes)) {
    const wav = parseWavBuffer(bytes);
    log(`WAV: ${wav.sampleRate} Hz, ${wav.numChannels} ch, ${wav.bitsPerSample}-bit, ${wav.durationMs} ms`);
    return {
      audio: wav.pcm,
      sampleHz: options.sampleRate ?? wav.sampleRate,
      durationMs: options.duration ?? wav.durationMs,
    };
  }

  return {
    audio: bytes,
    sampleHz: options.sampleRate ?? LINK_DEFAULTS.SAMPLE_HZ,
    durationMs: options.duration ?? LINK_DEFAULTS.DURATION_MS,
  };
}

function codecOption(name: string): Codec {
  switch (name.toLowerCase()) {
    case 'raw':
      return Codecs.RawPcm;
    case 'compressed':
      return Codecs.Compressed;
    default:
      throw new Error(`Invalid codec "${name}". Use "raw" or "compressed".`);
  }
}

/**
 * Build the transfer and report it. Returns the summary that was printed.
 */
export function simulateCommand(file: string | undefined, options: SimulateOptions): SimulateSummary {
  const log = progressLog(options.quiet || options.json);

  const input = loadAudio(file, options, log);

  let payload = input.audio;
  let codec = codecOption(options.codec);
  // Codec Compressed always carries a DEFLATE stream
  if (options.deflate || codec.tag === 'Compressed') {
    const prepared = prepareAudio(input.audio, true);
    payload = prepared.data;
    codec = prepared.codec;
    log(`DEFLATE: ${formatBytes(input.audio.length)} → ${formatBytes(payload.length)} (${formatCodec(codec)})`);
  }

  const sessionId = options.session ?? generateSessionId();
  const transfer = buildTransfer(payload, {
    codec,
    sampleHz: clampU16(input.sampleHz, 'sample rate', log),
    durationMs: clampU16(input.durationMs, 'duration', log),
    srcId: options.src ?? LINK_DEFAULTS.SRC_ID,
    dstId: options.dst ?? LINK_DEFAULTS.DST_ID,
    expId: options.exp ?? LINK_DEFAULTS.EXP_ID,
    sessionId,
    txPow: options.power,
    sf: options.sf,
    cr: options.cr,
  });

  const wire = transferToWire(transfer);
  const dropped = new Set(options.drop ?? []);
  // wire[0] is START, wire[1 + i] is DATA seq i, last is END
  const sent = wire.filter((_, i) => !(i >= 1 && i <= transfer.totalFrags && dropped.has(i - 1)));
  const droppedFragments = [...dropped].filter(seq => seq < transfer.totalFrags).sort((a, b) => a - b);

  const stats = estimateTransferStats(payload.length, options.sf, options.bw, options.cr);

  if (options.output) {
    writeCaptureFile(
      options.output,
      sent,
      `session ${formatSessionId(sessionId)} ${transfer.totalFrags} fragments, SF${options.sf} CR4/${options.cr}`
    );
  }

  const summary: SimulateSummary = {
    sessionId,
    codec: formatCodec(codec),
    audioBytes: input.audio.length,
    payloadBytes: payload.length,
    totalFrags: transfer.totalFrags,
    totalPackets: wire.length,
    sentPackets: sent.length,
    droppedFragments,
    wireBytes: transferWireBytes(transfer),
    crc16: transfer.crc16,
    crc32: transfer.crc32,
    startPacketSize: wire[0].length,
    firstDataPacketSize: transfer.totalFrags > 0 ? wire[1].length : null,
    endPacketSize: wire[wire.length - 1].length,
    airtimeS: stats.airtimeS,
    output: options.output,
  };

  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
    return summary;
  }

  if (options.layout) {
    console.log('START packet hex:');
    for (const line of formatStartLayout(wire[0])) console.log(line);
  }

  console.error(`Session:  ${formatSessionId(sessionId)}`);
  console.error(`Codec:    ${summary.codec}`);
  console.error(`Audio:    ${summary.audioBytes} bytes (payload ${summary.payloadBytes} bytes)`);
  console.error(`Packets:  ${summary.totalPackets} (${summary.totalFrags} fragments + START + END)`);
  if (droppedFragments.length > 0) {
    console.error(`Dropped:  ${droppedFragments.join(', ')}`);
  }
  console.error(`On air:   ${summary.wireBytes} bytes`);
  console.error(`CRC16:    0x${summary.crc16.toString(16).toUpperCase().padStart(4, '0')}`);
  console.error(`CRC32:    0x${summary.crc32.toString(16).toUpperCase().padStart(8, '0')}`);
  console.error(`Radio:    ${RADIO_DEFAULTS.FREQUENCY_MHZ} MHz, ${options.power} dBm`);
  console.error(`Airtime:  ${summary.airtimeS.toFixed(2)}s (SF${options.sf}, ${options.bw} kHz, CR4/${options.cr})`);
  if (options.output) {
    console.error(`Output:   ${options.output}`);
  }

  return summary;
}

export const SIMULATE_DEFAULTS = {
  codec: 'raw',
  sf: RADIO_DEFAULTS.SPREADING_FACTOR,
  cr: RADIO_DEFAULTS.CODING_RATE,
  bw: RADIO_DEFAULTS.BANDWIDTH_KHZ,
  power: RADIO_DEFAULTS.TX_POWER_DBM,
} as const;
