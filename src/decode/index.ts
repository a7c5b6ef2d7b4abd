/**
 * Receiver pipeline
 *
 * Flow: Packet bytes → decodePacket → FragmentCollector (per session) →
 *       on AUDIO_END: reassemble → CRC32 check → expand codec → result
 */
import { formatPacketType, type Codec } from '../utils/codes';
import { IncompleteTransferError, IntegrityError } from '../utils/errors';
import { verifyCRC16 } from '../lib/crc16';
import { decodePacket, FragmentCollector, type DecodedPacket } from './deframe';
import { expandAudio } from './decompress';

export { reassemble, reassembleFragments } from './reassemble';
export type { ReassemblyResult, ReassemblyExpectation } from './reassemble';

export interface TransferResult {
  sessionId: number;
  expId: number;
  srcId: number;
  codec: Codec;
  sampleHz: number;
  durationMs: number;
  /** Buffer as carried over the air (still compressed for codec Compressed) */
  data: Uint8Array;
  /** PCM after expanding the codec */
  audio: Uint8Array;
  crc32: number;
  /** START crc16 matches the reassembled buffer */
  crc16Valid: boolean;
  fragments: number;
}

/**
 * Receiver class - routes packets to per-session collectors and reports
 * each session when its AUDIO_END arrives
 */
export class Receiver {
  private collectors: Map<number, FragmentCollector> = new Map();
  private origins: Map<number, { expId: number; srcId: number }> = new Map();
  /** Sessions whose AUDIO_END was handled; cleared by a new AUDIO_START */
  private finished: Set<number> = new Set();
  private onComplete?: (result: TransferResult) => void;
  private onError?: (error: Error) => void;

  /**
   * Start receiving
   */
  start(onComplete: (result: TransferResult) => void, onError: (error: Error) => void): void {
    this.reset();
    this.onComplete = onComplete;
    this.onError = onError;
  }

  reset(): void {
    this.collectors.clear();
    this.origins.clear();
    this.finished.clear();
  }

  /**
   * Sessions that have seen packets but no AUDIO_END yet
   */
  getPendingSessions(): number[] {
    return Array.from(this.collectors.keys());
  }

  getCollector(sessionId: number): FragmentCollector | undefined {
    return this.collectors.get(sessionId);
  }

  /**
   * Process one over-the-air packet.
   * Returns the decoded packet, or null if it could not be decoded.
   */
  receive(bytes: Uint8Array): DecodedPacket | null {
    let packet: DecodedPacket;
    try {
      packet = decodePacket(bytes);
    } catch (err) {
      console.log('[Receiver] Dropping packet:', err instanceof Error ? err.message : err);
      this.onError?.(err instanceof Error ? err : new Error(String(err)));
      return null;
    }

    const sessionId = packet.header.sessionId;

    switch (packet.kind) {
      case 'start': {
        this.finished.delete(sessionId);
        const collector = this.collectorFor(sessionId);
        if (collector.getStart()) {
          // Session id reused before the previous END arrived
          console.log('[Receiver] Restarting session', sessionId);
          collector.reset();
        }
        collector.setStart(packet.start);
        this.origins.set(sessionId, { expId: packet.header.expId, srcId: packet.header.srcId });
        console.log('[Receiver] AUDIO_START session', sessionId, 'frags', packet.start.totalFrags);
        break;
      }

      case 'data':
        if (this.finished.has(sessionId)) {
          console.warn('[Receiver] Late AUDIO_DATA seq', packet.header.seqNum, 'for finished session', sessionId);
          break;
        }
        this.collectorFor(sessionId).addFragment(packet.header.seqNum, packet.payload, sessionId);
        break;

      case 'end': {
        if (this.finished.has(sessionId)) {
          console.warn('[Receiver] Repeated AUDIO_END for finished session', sessionId);
          break;
        }
        const collector = this.collectorFor(sessionId);
        collector.setEnd(packet.end);
        this.finish(collector);
        break;
      }

      case 'ack':
      case 'unrecognized':
        console.log('[Receiver] Ignoring', formatPacketType(packet.header.type), 'for session', sessionId);
        break;
    }

    return packet;
  }

  private collectorFor(sessionId: number): FragmentCollector {
    let collector = this.collectors.get(sessionId);
    if (!collector) {
      // DATA before START (lost or reordered): collect anyway
      collector = new FragmentCollector(sessionId);
      this.collectors.set(sessionId, collector);
    }
    return collector;
  }

  private finish(collector: FragmentCollector): void {
    const sessionId = collector.sessionId;
    const start = collector.getStart();
    const result = collector.reassemble();
    const origin = this.origins.get(sessionId);

    this.collectors.delete(sessionId);
    this.origins.delete(sessionId);
    this.finished.add(sessionId);

    if (!start || !result) {
      this.onError?.(new IncompleteTransferError(sessionId, null));
      return;
    }

    switch (result.status) {
      case 'incomplete':
        console.log('[Receiver] Session', sessionId, 'missing fragments:', result.missing);
        this.onError?.(new IncompleteTransferError(sessionId, result.missing));
        return;

      case 'integrity-failure':
        console.log('[Receiver] Session', sessionId, 'integrity failure:', result.reason);
        this.onError?.(new IntegrityError(sessionId, result.expectedCrc32 ?? 0, result.actualCrc32));
        return;

      case 'complete': {
        let audio: Uint8Array;
        try {
          audio = expandAudio(result.data, start.codec);
        } catch (err) {
          this.onError?.(err instanceof Error ? err : new Error(String(err)));
          return;
        }

        console.log('[Receiver] Session', sessionId, 'complete:', result.data.length, 'bytes');
        this.onComplete?.({
          sessionId,
          expId: origin?.expId ?? 0,
          srcId: origin?.srcId ?? 0,
          codec: start.codec,
          sampleHz: start.sampleHz,
          durationMs: start.durationMs,
          data: result.data,
          audio,
          crc32: result.crc32,
          crc16Valid: verifyCRC16(result.data, start.crc16),
          fragments: collector.getReceivedCount(),
        });
        return;
      }
    }
  }
}
