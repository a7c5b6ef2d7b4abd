import { describe, it, expect } from 'vitest';
import {
  buildTransfer,
  fragmentCount,
  transferToWire,
  transferWireBytes,
  prepareAudio,
} from '../src/encode/index';
import { decodePacket, decodeStartPayload, decodeEndPayload } from '../src/decode/deframe';
import { Codecs, PacketTypes } from '../src/utils/codes';
import { ProtocolError } from '../src/utils/errors';
import { generateRamp, stringToBytes } from '../src/utils/helpers';

describe('Sender pipeline', () => {
  describe('fragmentCount', () => {
    it('should round up to whole fragments', () => {
      expect(fragmentCount(0)).toBe(0);
      expect(fragmentCount(1)).toBe(1);
      expect(fragmentCount(245)).toBe(1);
      expect(fragmentCount(246)).toBe(2);
      expect(fragmentCount(32000)).toBe(131);
    });
  });

  describe('buildTransfer', () => {
    const audio = generateRamp(32000);
    const transfer = buildTransfer(audio, {
      sessionId: 0xBEEF,
      expId: 4,
      sampleHz: 16000,
      durationMs: 1000,
      sf: 9,
    });

    it('should produce START, 131 DATA and END packets', () => {
      expect(transfer.totalFrags).toBe(131);
      expect(transfer.data.length).toBe(131);
      expect(transferToWire(transfer).length).toBe(133);
    });

    it('should fill every fragment but the last', () => {
      expect(transfer.data[0].payload.length).toBe(245);
      expect(transfer.data[129].payload.length).toBe(245);
      expect(transfer.data[130].payload.length).toBe(150);
    });

    it('should number DATA packets from zero and END with the fragment count', () => {
      expect(transfer.start.header.seqNum).toBe(0);
      expect(transfer.data.map(p => p.header.seqNum)).toEqual(Array.from({ length: 131 }, (_, i) => i));
      expect(transfer.end.header.seqNum).toBe(131);
    });

    it('should carry sizes and checksums in START and END', () => {
      expect(decodeStartPayload(transfer.start.payload)).toEqual({
        totalFrags: 131,
        codec: Codecs.RawPcm,
        sampleHz: 16000,
        durationMs: 1000,
        totalSize: 32000,
        crc16: 0x0C11,
      });
      expect(decodeEndPayload(transfer.end.payload)).toEqual({ fragCount: 131, crc32: 0x42EF9528, reserved: 0 });
      expect(transfer.crc16).toBe(0x0C11);
      expect(transfer.crc32).toBe(0x42EF9528);
    });

    it('should apply defaults to the header of every packet', () => {
      const packets = transferToWire(transfer).map(decodePacket);
      for (const packet of packets) {
        expect(packet.header.srcId).toBe(1);
        expect(packet.header.dstId).toBe(2);
        expect(packet.header.expId).toBe(4);
        expect(packet.header.sessionId).toBe(0xBEEF);
        expect(packet.header.txPow).toBe(14);
        expect(packet.header.sf).toBe(9);
        expect(packet.header.cr).toBe(5);
      }
      expect(packets.map(p => p.kind).filter(k => k !== 'data')).toEqual(['start', 'end']);
    });

    it('should concatenate back to the original buffer', () => {
      const joined = new Uint8Array(32000);
      let offset = 0;
      for (const packet of transfer.data) {
        joined.set(packet.payload, offset);
        offset += packet.payload.length;
      }
      expect(joined).toEqual(audio);
    });

    it('should count bytes on air', () => {
      // 23 + 131 * 10 + 32000 + 17
      expect(transferWireBytes(transfer)).toBe(33350);
    });
  });

  describe('edge cases', () => {
    it('should send START and END only for an empty buffer', () => {
      const transfer = buildTransfer(new Uint8Array(0), { sessionId: 1 });

      expect(transfer.totalFrags).toBe(0);
      expect(transfer.data).toEqual([]);
      expect(transfer.end.header.seqNum).toBe(0);
      expect(transfer.crc16).toBe(0xFFFF);
      expect(transfer.crc32).toBe(0);
      expect(transferToWire(transfer).map(p => p.length)).toEqual([23, 17]);
    });

    it('should send a single short fragment', () => {
      const transfer = buildTransfer(stringToBytes('Hello LoRa'), { sessionId: 2 });

      expect(transfer.totalFrags).toBe(1);
      expect(transfer.data[0].header.type).toEqual(PacketTypes.AudioData);
      expect(transfer.data[0].payload.length).toBe(10);
      expect(transfer.crc32).toBe(0xAB53EFA7);
    });

    it('should mask the session id to 16 bits', () => {
      const transfer = buildTransfer(new Uint8Array(1), { sessionId: 0x12345 });
      expect(transfer.sessionId).toBe(0x2345);
      expect(transfer.start.header.sessionId).toBe(0x2345);
    });

    it('should refuse buffers needing more than 65535 fragments', () => {
      const build = () => buildTransfer(new Uint8Array(65535 * 245 + 1), { sessionId: 3 });
      expect(build).toThrow(ProtocolError);
      expect(build).toThrow('needs 65536 fragments');
    });

    it('should accept the largest buffer a session can describe', () => {
      const transfer = buildTransfer(new Uint8Array(65535 * 245), { sessionId: 3 });
      expect(transfer.totalFrags).toBe(65535);
    });
  });

  describe('prepareAudio', () => {
    it('should leave audio untouched without deflate', () => {
      const audio = generateRamp(1000);
      const prepared = prepareAudio(audio, false);
      expect(prepared.data).toBe(audio);
      expect(prepared.codec).toEqual(Codecs.RawPcm);
    });

    it('should compress repetitive audio', () => {
      const audio = generateRamp(4096);
      const prepared = prepareAudio(audio, true);
      expect(prepared.codec).toEqual(Codecs.Compressed);
      expect(prepared.data.length).toBeLessThan(4096);
    });

    it('should fall back to raw when deflate does not help', () => {
      const audio = new Uint8Array([0x42]);
      const prepared = prepareAudio(audio, true);
      expect(prepared.codec).toEqual(Codecs.RawPcm);
      expect(prepared.data).toBe(audio);
    });
  });
});
