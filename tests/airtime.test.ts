import { describe, it, expect } from 'vitest';
import {
  estimatePacketAirtimeMs,
  estimateTransferStats,
  compareTransfers,
  START_PACKET_SIZE,
  DATA_PACKET_SIZE,
  END_PACKET_SIZE,
} from '../src/lib/airtime';

describe('Airtime model', () => {
  it('should size packets with their header', () => {
    expect(START_PACKET_SIZE).toBe(23);
    expect(DATA_PACKET_SIZE).toBe(255);
    expect(END_PACKET_SIZE).toBe(17);
  });

  describe('estimatePacketAirtimeMs', () => {
    it('should match reference values at 125 kHz, CR4/5', () => {
      const cases: [number, number, number][] = [
        [0, 7, 20.736],
        [17, 7, 66.816],
        [23, 7, 85.248],
        [255, 7, 693.504],
        [17, 9, 230.4],
        [23, 9, 267.264],
        [255, 9, 2184.192],
        [0, 12, 663.552],
        [23, 12, 1843.2],
        [255, 12, 15704.064],
      ];
      for (const [bytes, sf, ms] of cases) {
        expect(estimatePacketAirtimeMs(bytes, sf)).toBeCloseTo(ms, 6);
      }
    });

    it('should halve symbol time at 250 kHz', () => {
      expect(estimatePacketAirtimeMs(255, 7, 250)).toBeCloseTo(346.752, 6);
    });

    it('should only use low data rate optimisation at 125 kHz', () => {
      expect(estimatePacketAirtimeMs(255, 12, 250)).toBeCloseTo(6524.928, 6);
      expect(estimatePacketAirtimeMs(255, 11, 125, 1)).toBeCloseTo(5001.216, 6);
    });

    it('should never decrease with payload size or spreading factor', () => {
      for (let sf = 7; sf <= 12; sf++) {
        let previous = 0;
        for (let bytes = 0; bytes <= 255; bytes += 5) {
          const ms = estimatePacketAirtimeMs(bytes, sf);
          expect(ms).toBeGreaterThanOrEqual(previous);
          previous = ms;
        }
        if (sf < 12) {
          expect(estimatePacketAirtimeMs(100, sf + 1)).toBeGreaterThan(estimatePacketAirtimeMs(100, sf));
        }
      }
    });
  });

  describe('estimateTransferStats', () => {
    it('should estimate a 32000-byte transfer at SF7', () => {
      const stats = estimateTransferStats(32000, 7);

      expect(stats.audioBytes).toBe(32000);
      expect(stats.totalFrags).toBe(131);
      expect(stats.totalPackets).toBe(133);
      expect(stats.airtimeMs).toBeCloseTo(91001.088, 6);
      expect(stats.airtimeS).toBeCloseTo(91.001088, 9);
      expect(stats.throughputBps).toBeCloseTo(2813.1531790037493, 6);
    });

    it('should scale with spreading factor', () => {
      expect(estimateTransferStats(32000, 9).airtimeMs).toBeCloseTo(286626.816, 6);
      expect(estimateTransferStats(32000, 12).airtimeMs).toBeCloseTo(2060623.872, 6);
    });

    it('should count START and END for an empty transfer', () => {
      const stats = estimateTransferStats(0, 7);

      expect(stats.totalFrags).toBe(0);
      expect(stats.totalPackets).toBe(2);
      expect(stats.airtimeMs).toBeCloseTo(152.064, 6);
      expect(stats.throughputBps).toBe(0);
    });

    it('should size the last fragment exactly on request', () => {
      const stats = estimateTransferStats(32000, 7, 125, 5, { exactLastFragment: true });
      expect(stats.airtimeMs).toBeCloseTo(90752.256, 6);
      expect(stats.airtimeMs).toBeLessThan(estimateTransferStats(32000, 7).airtimeMs);
    });

    it('should treat a full last fragment the same either way', () => {
      const approx = estimateTransferStats(490, 7);
      const exact = estimateTransferStats(490, 7, 125, 5, { exactLastFragment: true });
      expect(exact.airtimeMs).toBeCloseTo(approx.airtimeMs, 9);
    });
  });

  describe('compareTransfers', () => {
    it('should report savings per spreading factor', () => {
      const rows = compareTransfers(32000, 3200, [7, 9]);

      expect(rows.map(r => r.sf)).toEqual([7, 9]);
      expect(rows[0].raw.totalFrags).toBe(131);
      expect(rows[0].compressed.totalFrags).toBe(14);
      expect(rows[0].compressed.airtimeMs).toBeCloseTo(9861.12, 6);
      expect(rows[0].savingS).toBeCloseTo(81.139968, 6);
      expect(rows[0].savingPct).toBeCloseTo(89.16373395447755, 6);
      expect(rows[1].compressed.airtimeMs).toBeCloseTo(31076.352, 6);
    });

    it('should return no rows without spreading factors', () => {
      expect(compareTransfers(100, 50, [])).toEqual([]);
    });
  });
});
