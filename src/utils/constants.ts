// Protocol layout - every packet is a 10-byte header plus one payload
export const PROTOCOL = {
  VERSION: 0x01,

  // LoRa PHY limit for a single packet
  MAX_PACKET_SIZE: 255,
  HEADER_SIZE: 10,
  MAX_DATA_PAYLOAD: 245,    // MAX_PACKET_SIZE - HEADER_SIZE

  // Fixed payload sizes
  START_PAYLOAD_SIZE: 13,
  END_PAYLOAD_SIZE: 7,
  ACK_PAYLOAD_SIZE: 3,

  // Addressing
  BROADCAST_ID: 0xFF,

  // Field limits
  MAX_FRAGMENTS: 0xFFFF,    // seq_num / total_frags are u16
  MAX_TOTAL_SIZE: 0xFFFFFFFF,
} as const;

// Packet type codes (low nibble of byte 0)
export const PACKET_CODES = {
  AUDIO_START: 0x01,
  AUDIO_DATA: 0x02,
  AUDIO_END: 0x03,
  ACK: 0x04,
} as const;

// Codec codes carried in the Start payload
export const CODEC_CODES = {
  RAW_PCM: 0x00,
  COMPRESSED: 0x01,
} as const;

// Ack status codes
export const ACK_CODES = {
  OK: 0x00,
  CRC_ERROR: 0x01,
  MISSING: 0x02,
} as const;

// Radio parameters of the reference node (Heltec V3, SX1262)
export const RADIO_DEFAULTS = {
  FREQUENCY_MHZ: 915.0,
  BANDWIDTH_KHZ: 125.0,
  SPREADING_FACTOR: 7,
  CODING_RATE: 5,           // 4/5
  TX_POWER_DBM: 14,
  PREAMBLE_SYMBOLS: 8,
} as const;

// Addressing used when none is given
export const LINK_DEFAULTS = {
  SRC_ID: 0x01,
  DST_ID: 0x02,
  EXP_ID: 0x01,
  SAMPLE_HZ: 16000,
  DURATION_MS: 1000,
} as const;

// Limits for CLI input
export const LIMITS = {
  DEFAULT_TEST_BYTES: 32000,
  DEFAULT_SPREADING_FACTORS: [7, 9, 12],
} as const;
