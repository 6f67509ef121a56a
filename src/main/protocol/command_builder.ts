/**
 * Command packet builder for the reactor I/O link.
 *
 * Command packet structure:
 *   [msg_id] [MAGIC_1] [MAGIC_2] [fields...] [CRC-32:u32 LE]
 *
 * @module protocol/command_builder
 */

import {
  MSG_ID_SET_CHANNEL,
  MAGIC_1,
  MAGIC_2,
  SIZE_SET_CHANNEL,
  MAX_BUS_SIDE,
  MAX_BUS_CHANNEL
} from './constants';
import { crc32_seal } from './crc32';

/** Throw unless `value` is an integer within [min, max]. */
function assert_u8_range(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${name} must be an integer in [${min}, ${max}], got ${value}`);
  }
}

/**
 * Build a MSG_SET_CHANNEL packet (10 bytes).
 *
 * Layout:
 *   [0]    msg_id (0x80)
 *   [1]    MAGIC_1 (0xB5)
 *   [2]    MAGIC_2 (0x5E)
 *   [3]    side (0-5)
 *   [4]    channel (0-15)
 *   [5]    value (0-255)
 *   [6-9]  CRC-32 (u32, LE) over bytes [0..5]
 *
 * @throws RangeError if side, channel or value is out of range.
 */
export function build_set_channel(side: number, channel: number, value: number): Uint8Array {
  assert_u8_range('side', side, 0, MAX_BUS_SIDE);
  assert_u8_range('channel', channel, 0, MAX_BUS_CHANNEL);
  assert_u8_range('value', value, 0, 255);

  const buf = new Uint8Array(SIZE_SET_CHANNEL);
  buf[0] = MSG_ID_SET_CHANNEL;
  buf[1] = MAGIC_1;
  buf[2] = MAGIC_2;
  buf[3] = side;
  buf[4] = channel;
  buf[5] = value;

  return crc32_seal(buf);
}
