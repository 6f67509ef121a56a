/**
 * CRC-32 as computed by the STM32 hardware CRC unit on the I/O controller.
 *
 *   - Polynomial 0x04C11DB7, initial value 0xFFFFFFFF
 *   - No final XOR, no input/output reflection
 *   - Data consumed as 32-bit big-endian words; a short tail word is
 *     zero-padded on the right
 *
 * @module protocol/crc32
 */

import { CRC32_POLY, CRC32_INIT } from './constants';

/**
 * Compute the CRC-32 of a byte sequence.
 *
 * @returns Unsigned 32-bit CRC.
 */
export function crc32_compute(data: Uint8Array): number {
  let crc = CRC32_INIT;

  for (let offset = 0; offset < data.length; offset += 4) {
    let word = 0;
    for (let i = 0; i < 4; i++) {
      const byte = offset + i < data.length ? data[offset + i] : 0;
      word |= byte << (24 - i * 8);
    }
    crc = fold_word(crc, word >>> 0);
  }

  return crc >>> 0;
}

/** Shift one 32-bit word through the CRC register. */
function fold_word(crc: number, word: number): number {
  let reg = (crc ^ word) >>> 0;
  for (let bit = 0; bit < 32; bit++) {
    reg = reg & 0x80000000 ? ((reg << 1) ^ CRC32_POLY) >>> 0 : (reg << 1) >>> 0;
  }
  return reg;
}

/**
 * Check a packet whose last four bytes hold its CRC-32 (little-endian).
 *
 * @returns False for packets too short to carry a CRC.
 */
export function crc32_check_trailer(packet: Uint8Array): boolean {
  if (packet.length < 5) {
    return false;
  }
  const at = packet.length - 4;
  const expected =
    (packet[at] | (packet[at + 1] << 8) | (packet[at + 2] << 16) | (packet[at + 3] << 24)) >>> 0;
  return crc32_compute(packet.subarray(0, at)) === expected;
}

/**
 * Write the CRC-32 of `packet[0 .. length-4)` into its last four bytes.
 */
export function crc32_seal(packet: Uint8Array): Uint8Array {
  const at = packet.length - 4;
  const crc = crc32_compute(packet.subarray(0, at));
  packet[at] = crc & 0xFF;
  packet[at + 1] = (crc >>> 8) & 0xFF;
  packet[at + 2] = (crc >>> 16) & 0xFF;
  packet[at + 3] = (crc >>> 24) & 0xFF;
  return packet;
}
