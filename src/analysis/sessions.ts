/**
 * Session reconstruction from receiver logs
 *
 * State per session id: absent → open (SESSION_START) → open (RX) →
 * closed (SESSION_END). Sessions are never removed during a run.
 */
import type { Codec } from '../utils/codes';
import {
  parseRecord,
  type ObservationRecord,
  type SessionOpenRecord,
  type FragmentObservedRecord,
  type SessionCloseRecord,
} from './records';

export interface FragmentObservation {
  expId: number;
  sessionId: number;
  seq: number;
  rssi: number;
  snr: number;
  len: number;
  timestampMs: number;
}

export interface SessionClose {
  fragsReceived: number;
  fragsExpected: number;
  crcOk: boolean;
  durationMs: number | null;
  timedOut: boolean;
}

export interface ReceiverSession {
  sessionId: number;
  expId: number;
  totalFrags: number;
  codec: Codec;
  sampleHz: number;
  /** Nominal audio duration declared by the sender */
  durationMs: number;
  totalSize: number;
  /** In arrival order */
  fragments: FragmentObservation[];
  state: 'open' | 'closed';
  close: SessionClose | null;
}

export interface Reconstruction {
  sessions: Map<number, ReceiverSession>;
  /** Every RX record, including those for sessions never opened */
  fragments: FragmentObservation[];
  /** Malformed lines */
  skipped: number;
  /** SESSION_END records for sessions never opened */
  orphanCloses: number;
}

export interface MinMaxAvg {
  min: number;
  max: number;
  avg: number;
}

export interface SessionSummary {
  sessionId: number;
  expId: number;
  codec: Codec;
  fragsReceived: number;
  fragsExpected: number;
  loss: number;
  lossPct: number;
  crcOk: boolean | null;
  timedOut: boolean;
  durationMs: number | null;
  rssi: MinMaxAvg | null;
  snr: MinMaxAvg | null;
}

export function openSession(record: SessionOpenRecord): ReceiverSession {
  return {
    sessionId: record.sessionId,
    expId: record.expId,
    totalFrags: record.totalFrags,
    codec: record.codec,
    sampleHz: record.sampleHz,
    durationMs: record.durationMs,
    totalSize: record.totalSize,
    fragments: [],
    state: 'open',
    close: null,
  };
}

export function toObservation(record: FragmentObservedRecord): FragmentObservation {
  return {
    expId: record.expId,
    sessionId: record.sessionId,
    seq: record.seq,
    rssi: record.rssi,
    snr: record.snr,
    len: record.len,
    timestampMs: record.timestampMs,
  };
}

export function observeFragment(session: ReceiverSession, fragment: FragmentObservation): void {
  session.fragments.push(fragment);
}

export function closeSession(session: ReceiverSession, record: SessionCloseRecord): void {
  session.state = 'closed';
  session.close = {
    fragsReceived: record.fragsReceived,
    fragsExpected: record.fragsExpected,
    crcOk: record.crcOk,
    durationMs: record.durationMs,
    timedOut: record.timedOut,
  };
}

/**
 * Single-pass reconstructor over an ordered record stream
 */
export class SessionReconstructor {
  private sessions: Map<number, ReceiverSession> = new Map();
  private fragments: FragmentObservation[] = [];
  private skipped = 0;
  private orphanCloses = 0;

  ingest(record: ObservationRecord): void {
    switch (record.kind) {
      case 'session-open':
        // A repeated SESSION_START restarts the session
        this.sessions.set(record.sessionId, openSession(record));
        break;

      case 'fragment': {
        const fragment = toObservation(record);
        this.fragments.push(fragment);
        const session = this.sessions.get(record.sessionId);
        if (session) {
          observeFragment(session, fragment);
        }
        break;
      }

      case 'session-close': {
        const session = this.sessions.get(record.sessionId);
        if (session) {
          closeSession(session, record);
        } else {
          this.orphanCloses++;
        }
        break;
      }

      case 'malformed':
        this.skipped++;
        break;

      case 'blank':
        break;
    }
  }

  ingestLine(line: string): void {
    this.ingest(parseRecord(line));
  }

  result(): Reconstruction {
    return {
      sessions: this.sessions,
      fragments: this.fragments,
      skipped: this.skipped,
      orphanCloses: this.orphanCloses,
    };
  }
}

/**
 * Rebuild every session found in a receiver log
 */
export function reconstructSessions(text: string): Reconstruction {
  const reconstructor = new SessionReconstructor();
  for (const line of text.split(/\r?\n/)) {
    reconstructor.ingestLine(line);
  }
  const result = reconstructor.result();
  if (result.skipped > 0) {
    console.log('[Sessions] Skipped', result.skipped, 'malformed line(s)');
  }
  return result;
}

function minMaxAvg(values: number[]): MinMaxAvg | null {
  if (values.length === 0) return null;
  let min = values[0];
  let max = values[0];
  let sum = 0;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
    sum += v;
  }
  return { min, max, avg: sum / values.length };
}

/**
 * Loss and link quality for one session. Before SESSION_END the counts
 * fall back to the fragments seen and the declared total.
 */
export function summarizeSession(session: ReceiverSession): SessionSummary {
  const fragsReceived = session.close?.fragsReceived ?? session.fragments.length;
  const fragsExpected = session.close?.fragsExpected ?? session.totalFrags;

  let loss = 0;
  let lossPct = 0;
  if (fragsExpected > 0) {
    loss = fragsExpected - fragsReceived;
    lossPct = (loss / fragsExpected) * 100;
  }

  return {
    sessionId: session.sessionId,
    expId: session.expId,
    codec: session.codec,
    fragsReceived,
    fragsExpected,
    loss,
    lossPct,
    crcOk: session.close?.crcOk ?? null,
    timedOut: session.close?.timedOut ?? false,
    durationMs: session.close?.durationMs ?? null,
    rssi: minMaxAvg(session.fragments.map(f => f.rssi)),
    snr: minMaxAvg(session.fragments.map(f => f.snr)),
  };
}
