/**
 * Text rendering for CLI output. Pure: every function returns lines.
 */

import { formatCodec } from '../src/utils/codes.js';
import type { ReceiverSession, SessionSummary, MinMaxAvg } from '../src/analysis/sessions.js';
import type { TransferStats, TransferComparison } from '../src/lib/airtime.js';

const RULE = '='.repeat(50);

export function formatSessionId(sessionId: number): string {
  return `0x${sessionId.toString(16).toUpperCase().padStart(4, '0')}`;
}

function formatSpread(label: string, values: MinMaxAvg | null, unit: string): string | null {
  if (!values) return null;
  return `  ${label.padEnd(13)}: min=${values.min.toFixed(1)}  max=${values.max.toFixed(1)}  avg=${values.avg.toFixed(1)} ${unit}`;
}

/**
 * Report block for one reconstructed session
 */
export function formatSessionReport(session: ReceiverSession, summary: SessionSummary): string[] {
  const lines = [
    RULE,
    `  Session      : ${formatSessionId(session.sessionId)}`,
    `  Experiment   : ${session.expId}`,
    `  Codec        : ${formatCodec(session.codec)}`,
    `  Sample Rate  : ${session.sampleHz} Hz`,
    `  Audio Size   : ${session.totalSize} bytes`,
    `  Fragments    : ${summary.fragsReceived}/${summary.fragsExpected} received`,
    `  Packet Loss  : ${summary.loss} (${summary.lossPct.toFixed(1)}%)`,
    `  CRC OK       : ${summary.crcOk === null ? 'unknown' : summary.crcOk ? 'yes' : 'no'}`,
  ];

  if (session.state === 'open') {
    lines.push('  Status       : OPEN (no SESSION_END)');
  } else if (summary.timedOut) {
    lines.push('  Status       : TIMED OUT');
  }
  if (summary.durationMs !== null) {
    lines.push(`  Duration     : ${summary.durationMs} ms`);
  }

  const rssi = formatSpread('RSSI', summary.rssi, 'dBm');
  if (rssi) lines.push(rssi);
  const snr = formatSpread('SNR', summary.snr, 'dB');
  if (snr) lines.push(snr);

  lines.push(RULE);
  return lines;
}

/**
 * One row of the airtime table
 */
export function formatStatsRow(label: string, stats: TransferStats): string {
  return `    ${label.padEnd(11)}: ${String(stats.totalFrags).padStart(4)} frags  ${stats.airtimeS.toFixed(2).padStart(8)}s  airtime  ${stats.throughputBps.toFixed(0).padStart(6)} bps`;
}

export function formatComparison(comparison: TransferComparison): string[] {
  return [
    `  SF${comparison.sf}:`,
    formatStatsRow('Raw PCM', comparison.raw),
    formatStatsRow('Compressed', comparison.compressed),
    `    Saving     : ${comparison.savingS.toFixed(2)}s  (${comparison.savingPct.toFixed(0)}% less airtime)`,
  ];
}

const START_LAYOUT: string[] = [
  'ver_type',
  'src_id',
  'dst_id',
  'exp_id',
  'session_id (low byte)',
  'session_id (high byte)',
  'seq_num (low byte)',
  'seq_num (high byte)',
  'tx_pow',
  'sf_cr',
  'total_frags (low byte)',
  'total_frags (high byte)',
  'codec_id',
  'sample_hz (low byte)',
  'sample_hz (high byte)',
  'duration_ms (low byte)',
  'duration_ms (high byte)',
  'total_size byte 0',
  'total_size byte 1',
  'total_size byte 2',
  'total_size byte 3',
  'crc16 (low byte)',
  'crc16 (high byte)',
];

/**
 * Annotated byte dump of an AUDIO_START packet
 */
export function formatStartLayout(packet: Uint8Array): string[] {
  return Array.from(packet, (b, i) => {
    const label = START_LAYOUT[i];
    const hex = b.toString(16).toUpperCase().padStart(2, '0');
    const base = `    [${String(i).padStart(2, '0')}]  0x${hex}  (${String(b).padStart(3)})`;
    return label ? `${base} <- ${label}` : base;
  });
}
