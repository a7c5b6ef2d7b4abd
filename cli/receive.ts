/**
 * CLI Receive Command - replay a packet capture through the receiver
 */

import { writeFileSync } from 'fs';
import { extname } from 'path';
import { formatCodec } from '../src/utils/codes.js';
import { Receiver, type TransferResult } from '../src/decode/index.js';
import { readCaptureFile } from './capture.js';
import { writeWavFile } from './wav-io.js';
import { formatSessionId } from './report.js';
import { progressLog, withCoreLogsMuted } from './quiet.js';

export interface ReceiveOptions {
  output?: string;
  bits: number;
  channels: number;
  json?: boolean;
  quiet?: boolean;
}

export interface ReceivedSession {
  sessionId: number;
  codec: string;
  sampleHz: number;
  bytes: number;
  audioBytes: number;
  fragments: number;
  crc32: number;
  crc16Valid: boolean;
  output?: string;
}

export interface ReceiveSummary {
  ok: boolean;
  packets: number;
  invalidLines: number;
  completed: ReceivedSession[];
  errors: string[];
  /** Sessions with no AUDIO_END in the capture */
  pending: number[];
}

/**
 * Output path for one session; with several sessions the session id is
 * appended to the base name
 */
export function outputPathFor(path: string, sessionId: number, multiple: boolean): string {
  if (!multiple) return path;
  const ext = extname(path);
  const base = ext ? path.slice(0, -ext.length) : path;
  return `${base}-${sessionId.toString(16).padStart(4, '0')}${ext}`;
}

function writeAudio(path: string, result: TransferResult, options: ReceiveOptions): void {
  if (extname(path).toLowerCase() === '.wav' && result.sampleHz > 0) {
    writeWavFile(path, result.audio, result.sampleHz, options.channels, options.bits);
  } else {
    writeFileSync(path, result.audio);
  }
}

export function receiveCommand(file: string, options: ReceiveOptions): ReceiveSummary {
  const log = progressLog(options.quiet || options.json);

  log(`Reading ${file}...`);
  const capture = readCaptureFile(file);
  if (capture.invalid > 0) {
    log(`Skipped ${capture.invalid} line(s) that are not hex`);
  }

  const results: TransferResult[] = [];
  const errors: string[] = [];
  const receiver = new Receiver();

  const pending = withCoreLogsMuted(options.quiet || options.json, () => {
    receiver.start(
      result => results.push(result),
      error => errors.push(error.message)
    );
    for (const packet of capture.packets) {
      receiver.receive(packet);
    }
    return receiver.getPendingSessions();
  });

  for (const sessionId of pending) {
    errors.push(`Session ${formatSessionId(sessionId)} has no AUDIO_END in capture`);
  }

  const completed = results.map((result): ReceivedSession => {
    const session: ReceivedSession = {
      sessionId: result.sessionId,
      codec: formatCodec(result.codec),
      sampleHz: result.sampleHz,
      bytes: result.data.length,
      audioBytes: result.audio.length,
      fragments: result.fragments,
      crc32: result.crc32,
      crc16Valid: result.crc16Valid,
    };
    if (options.output) {
      session.output = outputPathFor(options.output, result.sessionId, results.length > 1);
      writeAudio(session.output, result, options);
    }
    return session;
  });

  const summary: ReceiveSummary = {
    ok: errors.length === 0 && completed.length > 0,
    packets: capture.packets.length,
    invalidLines: capture.invalid,
    completed,
    errors,
    pending,
  };

  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
    return summary;
  }

  for (const session of completed) {
    console.error(`Session ${formatSessionId(session.sessionId)}: OK`);
    console.error(`  Codec:     ${session.codec}`);
    console.error(`  Fragments: ${session.fragments}`);
    console.error(`  Audio:     ${session.audioBytes} bytes`);
    console.error(`  CRC32:     0x${session.crc32.toString(16).toUpperCase().padStart(8, '0')}`);
    console.error(`  CRC16:     ${session.crc16Valid ? 'match' : 'MISMATCH'}`);
    if (session.output) {
      console.error(`  Output:    ${session.output}`);
    }
  }
  for (const error of errors) {
    console.error(`Error: ${error}`);
  }

  return summary;
}
