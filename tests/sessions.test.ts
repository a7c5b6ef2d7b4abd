import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  reconstructSessions,
  summarizeSession,
  SessionReconstructor,
} from '../src/analysis/sessions';
import { Codecs } from '../src/utils/codes';

const LOG = [
  '# bench run, node 2',
  'SESSION_START,1,0x0A0B,5,0,16000,1000,1200',
  'RX,1,0x0A0B,0,-90,8,245,1000',
  'RX,1,0x0A0B,1,-92,7.5,245,1200',
  'RX,1,0x0A0B,2,-94,7,245,1400',
  'RX,1,0x0A0B,3,-96,6.5,245,1600',
  'RX,1,0x0A0B,4,-98,6,220,1800',
  'SESSION_END,1,0x0A0B,5,5,1,900',
  '',
  'SESSION_START,2,0x0C0D,4,1,8000,500,900',
  'RX,2,0x0C0D,0,-110,-2,245,5000',
  'RX,2,0x0C0D,2,-112,-4,245,5400',
  'SESSION_END,2,0x0C0D,2,4,0,TIMEOUT',
].join('\n');

describe('Session reconstruction', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should rebuild every session in log order', () => {
    const result = reconstructSessions(LOG);

    expect(Array.from(result.sessions.keys())).toEqual([0x0A0B, 0x0C0D]);
    expect(result.fragments.length).toBe(7);
    expect(result.skipped).toBe(0);
    expect(result.orphanCloses).toBe(0);
  });

  it('should attach fragments and the close record', () => {
    const session = reconstructSessions(LOG).sessions.get(0x0A0B);

    expect(session?.state).toBe('closed');
    expect(session?.codec).toEqual(Codecs.RawPcm);
    expect(session?.fragments.map(f => f.seq)).toEqual([0, 1, 2, 3, 4]);
    expect(session?.close).toEqual({
      fragsReceived: 5,
      fragsExpected: 5,
      crcOk: true,
      durationMs: 900,
      timedOut: false,
    });
  });

  it('should summarize a clean session', () => {
    const session = reconstructSessions(LOG).sessions.get(0x0A0B);
    expect(session).toBeDefined();
    if (!session) return;

    expect(summarizeSession(session)).toEqual({
      sessionId: 0x0A0B,
      expId: 1,
      codec: Codecs.RawPcm,
      fragsReceived: 5,
      fragsExpected: 5,
      loss: 0,
      lossPct: 0,
      crcOk: true,
      timedOut: false,
      durationMs: 900,
      rssi: { min: -98, max: -90, avg: -94 },
      snr: { min: 6, max: 8, avg: 7 },
    });
  });

  it('should summarize a timed-out session with loss', () => {
    const session = reconstructSessions(LOG).sessions.get(0x0C0D);
    expect(session).toBeDefined();
    if (!session) return;

    const summary = summarizeSession(session);
    expect(summary.codec).toEqual(Codecs.Compressed);
    expect(summary.loss).toBe(2);
    expect(summary.lossPct).toBe(50);
    expect(summary.crcOk).toBe(false);
    expect(summary.timedOut).toBe(true);
    expect(summary.durationMs).toBeNull();
    expect(summary.rssi).toEqual({ min: -112, max: -110, avg: -111 });
    expect(summary.snr).toEqual({ min: -4, max: -2, avg: -3 });
  });

  it('should keep RX for unknown sessions without creating one', () => {
    const result = reconstructSessions('RX,1,0x0099,0,-80,5,245,10\nSESSION_END,1,0x0099,1,1,1,10');

    expect(result.sessions.size).toBe(0);
    expect(result.fragments.length).toBe(1);
    expect(result.orphanCloses).toBe(1);
  });

  it('should skip malformed lines and log how many', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const result = reconstructSessions('SESSION_START,1,1,1,0,8000,500,100\ngarbage\nRX,1,1\nRX,1,1,0,-80,9,100,5');

    expect(result.skipped).toBe(2);
    expect(result.sessions.get(1)?.fragments.length).toBe(1);
    expect(log).toHaveBeenCalledWith('[Sessions] Skipped', 2, 'malformed line(s)');
  });

  it('should restart a session on a repeated SESSION_START', () => {
    const result = reconstructSessions([
      'SESSION_START,1,5,2,0,8000,500,400',
      'RX,1,5,0,-80,9,245,5',
      'SESSION_START,3,5,1,0,8000,500,100',
    ].join('\n'));

    const session = result.sessions.get(5);
    expect(session?.expId).toBe(3);
    expect(session?.totalFrags).toBe(1);
    expect(session?.fragments).toEqual([]);
    expect(result.fragments.length).toBe(1);
  });

  it('should fall back to observed counts for an open session', () => {
    const reconstructor = new SessionReconstructor();
    reconstructor.ingestLine('SESSION_START,1,9,4,0,8000,500,900');
    reconstructor.ingestLine('RX,1,9,0,-85,4,245,5');
    reconstructor.ingestLine('RX,1,9,3,-87,2,165,9');

    const session = reconstructor.result().sessions.get(9);
    expect(session?.state).toBe('open');
    if (!session) return;

    const summary = summarizeSession(session);
    expect(summary.fragsReceived).toBe(2);
    expect(summary.fragsExpected).toBe(4);
    expect(summary.loss).toBe(2);
    expect(summary.lossPct).toBe(50);
    expect(summary.crcOk).toBeNull();
    expect(summary.timedOut).toBe(false);
  });

  it('should report no loss and no link figures for an empty session', () => {
    const reconstructor = new SessionReconstructor();
    reconstructor.ingest({
      kind: 'session-open',
      expId: 1,
      sessionId: 1,
      totalFrags: 0,
      codec: Codecs.RawPcm,
      sampleHz: 8000,
      durationMs: 0,
      totalSize: 0,
    });

    const session = reconstructor.result().sessions.get(1);
    if (!session) throw new Error('session missing');
    const summary = summarizeSession(session);
    expect(summary.loss).toBe(0);
    expect(summary.lossPct).toBe(0);
    expect(summary.rssi).toBeNull();
    expect(summary.snr).toBeNull();
  });
});
