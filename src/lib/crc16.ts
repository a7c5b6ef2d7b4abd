/**
 * CRC-16/CCITT-FALSE (poly 0x1021, init 0xFFFF, no reflection, no final xor)
 *
 * Early "likely intact" stamp computed over the whole audio buffer before
 * fragmentation and carried in the AUDIO_START payload.
 */
export function crc16(data: Uint8Array): number {
  let crc = 0xFFFF;
  for (let i = 0; i < data.length; i++) {
    crc ^= data[i] << 8;
    for (let j = 0; j < 8; j++) {
      if (crc & 0x8000) {
        crc = (crc << 1) ^ 0x1021;
      } else {
        crc <<= 1;
      }
    }
    crc &= 0xFFFF;
  }
  return crc;
}

export function verifyCRC16(data: Uint8Array, expectedCRC: number): boolean {
  return crc16(data) === (expectedCRC & 0xFFFF);
}
