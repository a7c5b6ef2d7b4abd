export type ProtocolErrorCode =
  | 'TRUNCATED_HEADER'
  | 'TRUNCATED_PAYLOAD'
  | 'UNSUPPORTED_VERSION'
  | 'PACKET_TOO_LARGE'
  | 'TRANSFER_TOO_LARGE'
  | 'INCOMPLETE_TRANSFER'
  | 'INTEGRITY_FAILURE';

export class ProtocolError extends Error {
  constructor(
    message: string,
    public readonly code: ProtocolErrorCode
  ) {
    super(message);
    this.name = 'ProtocolError';
  }
}

function sessionLabel(sessionId: number): string {
  return `Session 0x${sessionId.toString(16).padStart(4, '0')}`;
}

/**
 * A session closed with fragments missing from 0..fragCount-1.
 * `missing` is null when the AUDIO_START never arrived, so the fragment
 * count is unknown.
 */
export class IncompleteTransferError extends ProtocolError {
  constructor(
    public readonly sessionId: number,
    public readonly missing: number[] | null
  ) {
    super(
      missing === null
        ? `${sessionLabel(sessionId)} ended without AUDIO_START`
        : `${sessionLabel(sessionId)} incomplete: missing ${missing.length} fragment(s)`,
      'INCOMPLETE_TRANSFER'
    );
    this.name = 'IncompleteTransferError';
  }
}

export class IntegrityError extends ProtocolError {
  constructor(
    public readonly sessionId: number,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(
      `${sessionLabel(sessionId)} CRC32 mismatch: expected ${expected.toString(16).padStart(8, '0')}, got ${actual.toString(16).padStart(8, '0')}`,
      'INTEGRITY_FAILURE'
    );
    this.name = 'IntegrityError';
  }
}
