/**
 * Receiver log records
 *
 *   SESSION_START,exp_id,session_id,total_frags,codec,sample_hz,duration_ms,total_size
 *   RX,exp_id,session_id,seq,rssi,snr,len,timestamp_ms
 *   SESSION_END,exp_id,session_id,frags_received,frags_expected,crc_ok,duration_ms|TIMEOUT
 *
 * Lines starting with '#' and blank lines are ignored. Anything else that
 * does not fit one of the three shapes is reported as Malformed, never
 * thrown: receiver logs are often cut short or interleaved with debug output.
 */
import { codecFromCode, type Codec } from '../utils/codes';

export const RECORD_TAGS = {
  SESSION_START: 'SESSION_START',
  RX: 'RX',
  SESSION_END: 'SESSION_END',
  TIMEOUT: 'TIMEOUT',
} as const;

export interface SessionOpenRecord {
  kind: 'session-open';
  expId: number;
  sessionId: number;
  totalFrags: number;
  codec: Codec;
  sampleHz: number;
  durationMs: number;
  totalSize: number;
}

export interface FragmentObservedRecord {
  kind: 'fragment';
  expId: number;
  sessionId: number;
  seq: number;
  rssi: number;
  snr: number;
  len: number;
  timestampMs: number;
}

export interface SessionCloseRecord {
  kind: 'session-close';
  expId: number;
  sessionId: number;
  fragsReceived: number;
  fragsExpected: number;
  crcOk: boolean;
  /** null when the receiver gave up waiting */
  durationMs: number | null;
  timedOut: boolean;
}

export interface BlankRecord {
  kind: 'blank';
}

export interface MalformedRecord {
  kind: 'malformed';
  line: string;
  reason: string;
}

export type ObservationRecord =
  | SessionOpenRecord
  | FragmentObservedRecord
  | SessionCloseRecord
  | BlankRecord
  | MalformedRecord;

const FIELD_COUNTS: Record<string, number> = {
  [RECORD_TAGS.SESSION_START]: 8,
  [RECORD_TAGS.RX]: 8,
  [RECORD_TAGS.SESSION_END]: 7,
};

function parseInteger(token: string): number | null {
  return /^-?\d+$/.test(token) ? parseInt(token, 10) : null;
}

function parseReal(token: string): number | null {
  if (token === '') return null;
  const value = Number(token);
  return Number.isFinite(value) ? value : null;
}

/**
 * Session ids are written either in decimal or as 0x-prefixed hex
 */
export function parseSessionId(token: string): number | null {
  if (/^0x[0-9a-f]+$/i.test(token)) {
    return parseInt(token.slice(2), 16);
  }
  return /^\d+$/.test(token) ? parseInt(token, 10) : null;
}

function integers(tokens: string[]): number[] | null {
  const values: number[] = [];
  for (const token of tokens) {
    const value = parseInteger(token);
    if (value === null) return null;
    values.push(value);
  }
  return values;
}

/**
 * Parse one log line into a typed record
 */
export function parseRecord(rawLine: string): ObservationRecord {
  const line = rawLine.trim();
  if (!line || line.startsWith('#')) {
    return { kind: 'blank' };
  }

  const parts = line.split(',').map(p => p.trim());
  const tag = parts[0];
  const needed = FIELD_COUNTS[tag];

  if (needed === undefined) {
    return { kind: 'malformed', line, reason: `unknown record type "${tag}"` };
  }
  if (parts.length < needed) {
    return { kind: 'malformed', line, reason: `${tag} needs ${needed} fields, got ${parts.length}` };
  }

  const sessionId = parseSessionId(parts[2]);
  if (sessionId === null) {
    return { kind: 'malformed', line, reason: `bad session id "${parts[2]}"` };
  }

  switch (tag) {
    case RECORD_TAGS.SESSION_START: {
      const values = integers([parts[1], ...parts.slice(3, 8)]);
      if (!values) return { kind: 'malformed', line, reason: 'non-numeric SESSION_START field' };
      const [expId, totalFrags, codec, sampleHz, durationMs, totalSize] = values;
      return {
        kind: 'session-open',
        expId,
        sessionId,
        totalFrags,
        codec: codecFromCode(codec),
        sampleHz,
        durationMs,
        totalSize,
      };
    }

    case RECORD_TAGS.RX: {
      const ints = integers([parts[1], parts[3], parts[6], parts[7]]);
      const rssi = parseReal(parts[4]);
      const snr = parseReal(parts[5]);
      if (!ints || rssi === null || snr === null) {
        return { kind: 'malformed', line, reason: 'non-numeric RX field' };
      }
      const [expId, seq, len, timestampMs] = ints;
      return { kind: 'fragment', expId, sessionId, seq, rssi, snr, len, timestampMs };
    }

    default: {
      const values = integers([parts[1], parts[3], parts[4]]);
      if (!values) return { kind: 'malformed', line, reason: 'non-numeric SESSION_END field' };
      const [expId, fragsReceived, fragsExpected] = values;

      // Anything but a number in the duration slot means the receiver timed out
      const durationMs = parseInteger(parts[6]);
      return {
        kind: 'session-close',
        expId,
        sessionId,
        fragsReceived,
        fragsExpected,
        crcOk: parts[5] === '1',
        durationMs: durationMs !== null && durationMs >= 0 ? durationMs : null,
        timedOut: durationMs === null,
      };
    }
  }
}

/**
 * Parse every line of a log
 */
export function parseRecords(text: string): ObservationRecord[] {
  return text.split(/\r?\n/).map(parseRecord);
}
