/**
 * COBS (Consistent Overhead Byte Stuffing) for the I/O link.
 *
 * Encoded frames never contain 0x00, so the link uses 0x00 as the frame
 * delimiter. Both functions work on frames WITHOUT the delimiter; the
 * transport appends and strips it.
 */

/** Frame delimiter byte value. */
export const FRAME_DELIMITER = 0x00;

/** Largest code value: 254 data bytes followed by no implicit zero. */
const MAX_CODE = 0xFF;

/**
 * COBS-encode a payload.
 *
 * @returns Encoded bytes WITHOUT the trailing delimiter.
 */
export function cobs_encode(data: Uint8Array): Uint8Array {
  const out: number[] = [0];
  let code_at = 0;
  let code = 1;

  for (const byte of data) {
    if (byte !== FRAME_DELIMITER) {
      out.push(byte);
      code++;
    }
    if (byte === FRAME_DELIMITER || code === MAX_CODE) {
      out[code_at] = code;
      code_at = out.length;
      out.push(0);
      code = 1;
    }
  }

  out[code_at] = code;
  return Uint8Array.from(out);
}

/**
 * COBS-decode a frame.
 *
 * @param frame - Encoded bytes WITHOUT the trailing delimiter.
 * @returns Decoded payload, or null if the frame is malformed.
 */
export function cobs_decode(frame: Uint8Array): Uint8Array | null {
  if (frame.length === 0) {
    return null;
  }

  const out: number[] = [];
  let at = 0;

  while (at < frame.length) {
    const code = frame[at++];
    if (code === FRAME_DELIMITER || at + code - 1 > frame.length) {
      return null;
    }
    for (let i = 1; i < code; i++) {
      const byte = frame[at++];
      if (byte === FRAME_DELIMITER) {
        return null;
      }
      out.push(byte);
    }
    if (code < MAX_CODE && at < frame.length) {
      out.push(FRAME_DELIMITER);
    }
  }

  return Uint8Array.from(out);
}
