/**
 * Turn a reassembled transfer buffer back into PCM audio
 */
import pako from 'pako';
import { formatCodec, type Codec } from '../utils/codes';

/**
 * Decompress the reassembled buffer according to the START codec.
 * Compressed is a zlib-wrapped DEFLATE stream.
 * Unrecognized codecs are passed through untouched.
 */
export function expandAudio(data: Uint8Array, codec: Codec): Uint8Array {
  switch (codec.tag) {
    case 'RawPcm':
      return data;

    case 'Compressed':
      try {
        return pako.inflate(data);
      } catch (err) {
        throw new Error('Decompression failed: ' + (err instanceof Error ? err.message : String(err)));
      }

    case 'Unrecognized':
      console.warn('[Decompress] Unknown codec', formatCodec(codec), '- passing data through');
      return data;
  }
}
