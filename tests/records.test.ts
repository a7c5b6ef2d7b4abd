import { describe, it, expect } from 'vitest';
import { parseRecord, parseRecords, parseSessionId } from '../src/analysis/records';
import { Codecs } from '../src/utils/codes';

describe('Receiver log records', () => {
  describe('parseSessionId', () => {
    it('should accept decimal and 0x-prefixed hex', () => {
      expect(parseSessionId('4660')).toBe(0x1234);
      expect(parseSessionId('0x1234')).toBe(0x1234);
      expect(parseSessionId('0XABcd')).toBe(0xABCD);
    });

    it('should reject anything else', () => {
      expect(parseSessionId('')).toBeNull();
      expect(parseSessionId('-1')).toBeNull();
      expect(parseSessionId('12ab')).toBeNull();
      expect(parseSessionId('0x')).toBeNull();
    });
  });

  describe('parseRecord', () => {
    it('should parse SESSION_START', () => {
      expect(parseRecord('SESSION_START,1,0xABCD,131,0,16000,1000,32000')).toEqual({
        kind: 'session-open',
        expId: 1,
        sessionId: 0xABCD,
        totalFrags: 131,
        codec: Codecs.RawPcm,
        sampleHz: 16000,
        durationMs: 1000,
        totalSize: 32000,
      });
    });

    it('should parse RX with fractional link figures', () => {
      expect(parseRecord('RX,1,43981,5,-97.5,7.25,245,123456')).toEqual({
        kind: 'fragment',
        expId: 1,
        sessionId: 43981,
        seq: 5,
        rssi: -97.5,
        snr: 7.25,
        len: 245,
        timestampMs: 123456,
      });
    });

    it('should parse SESSION_END', () => {
      expect(parseRecord('SESSION_END,1,0xABCD,129,131,0,95000')).toEqual({
        kind: 'session-close',
        expId: 1,
        sessionId: 0xABCD,
        fragsReceived: 129,
        fragsExpected: 131,
        crcOk: false,
        durationMs: 95000,
        timedOut: false,
      });
    });

    it('should mark a TIMEOUT duration as timed out', () => {
      const record = parseRecord('SESSION_END,2,7,3,5,1,TIMEOUT');
      expect(record).toMatchObject({ kind: 'session-close', crcOk: true, durationMs: null, timedOut: true });
    });

    it('should trim whitespace around fields and lines', () => {
      const record = parseRecord('  RX, 1, 0x0001 , 0, -80 , 9 , 10, 5  ');
      expect(record).toMatchObject({ kind: 'fragment', sessionId: 1, rssi: -80, snr: 9 });
    });

    it('should ignore extra trailing fields', () => {
      expect(parseRecord('RX,1,1,0,-80,9,10,5,extra').kind).toBe('fragment');
    });

    it('should treat blank and comment lines as blank', () => {
      expect(parseRecord('')).toEqual({ kind: 'blank' });
      expect(parseRecord('   ')).toEqual({ kind: 'blank' });
      expect(parseRecord('# receiver boot')).toEqual({ kind: 'blank' });
    });

    it('should report malformed lines with a reason', () => {
      expect(parseRecord('HELLO,1,2')).toEqual({
        kind: 'malformed', line: 'HELLO,1,2', reason: 'unknown record type "HELLO"',
      });
      expect(parseRecord('RX,1,2,3')).toEqual({
        kind: 'malformed', line: 'RX,1,2,3', reason: 'RX needs 8 fields, got 4',
      });
      expect(parseRecord('RX,1,zz,0,-80,9,10,5')).toEqual({
        kind: 'malformed', line: 'RX,1,zz,0,-80,9,10,5', reason: 'bad session id "zz"',
      });
      expect(parseRecord('RX,1,1,0,loud,9,10,5')).toMatchObject({ kind: 'malformed', reason: 'non-numeric RX field' });
      expect(parseRecord('SESSION_START,1,1,x,0,16000,1000,10')).toMatchObject({
        kind: 'malformed', reason: 'non-numeric SESSION_START field',
      });
      expect(parseRecord('SESSION_END,1,1,a,5,1,100')).toMatchObject({
        kind: 'malformed', reason: 'non-numeric SESSION_END field',
      });
    });

    it('should keep an unknown codec code', () => {
      const record = parseRecord('SESSION_START,1,1,1,9,8000,500,100');
      expect(record).toMatchObject({ codec: { tag: 'Unrecognized', code: 9 } });
    });
  });

  describe('parseRecords', () => {
    it('should return one record per line', () => {
      const records = parseRecords('SESSION_START,1,1,1,0,8000,500,100\r\nRX,1,1,0,-80,9,100,5\n\nSESSION_END,1,1,1,1,1,20');
      expect(records.map(r => r.kind)).toEqual(['session-open', 'fragment', 'blank', 'session-close']);
    });
  });
});
