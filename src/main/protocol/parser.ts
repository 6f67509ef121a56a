/**
 * Message parser for the reactor I/O link.
 *
 * Dispatches on the message ID byte (first byte of the payload after COBS
 * decode) and returns a typed ParseResult. Multi-byte fields are
 * little-endian. This module never throws; all errors are returned as
 * typed results.
 *
 * @module protocol/parser
 */

import type { ParseResult, TelemMsg, SetChannelMsg } from './types';
import {
  MSG_ID_TELEM,
  MSG_ID_SET_CHANNEL,
  MAGIC_1,
  MAGIC_2,
  SIZE_TELEM,
  SIZE_SET_CHANNEL,
  CAP_ENERGY_SENSOR,
  CAP_REACTOR_ADAPTER,
  FAULT_ENERGY,
  FAULT_PLASMA_HEAT,
  FAULT_PRODUCTION,
  STATUS_IGNITED_KNOWN,
  STATUS_IGNITED,
  STATUS_CAN_IGNITE_KNOWN,
  STATUS_CAN_IGNITE
} from './constants';
import { crc32_check_trailer } from './crc32';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Read a little-endian IEEE-754 double at offset. */
function read_f64_le(data: Uint8Array, offset: number): number {
  return new DataView(data.buffer, data.byteOffset, data.byteLength).getFloat64(offset, true);
}

/** Decode a known/value bit pair into a tri-state flag. */
function tri_state(bits: number, known_mask: number, value_mask: number): boolean | null {
  if ((bits & known_mask) === 0) {
    return null;
  }
  return (bits & value_mask) !== 0;
}

// ---------------------------------------------------------------------------
// Main parser
// ---------------------------------------------------------------------------

/**
 * Parse a raw packet payload (after COBS decode, message ID is first byte).
 *
 * @param payload - Raw bytes. First byte is the message ID.
 * @returns Typed parse result (ok + message, or error description).
 */
export function parse_packet(payload: Uint8Array): ParseResult {
  if (payload.length === 0) {
    return { ok: false, error: 'Empty payload' };
  }

  const msg_id = payload[0];

  switch (msg_id) {
    case MSG_ID_TELEM:
      return parse_telem(payload);

    case MSG_ID_SET_CHANNEL:
      return parse_set_channel(payload);

    default:
      return {
        ok: false,
        error: `Unknown message ID 0x${msg_id.toString(16).padStart(2, '0')}`,
        msg_id
      };
  }
}

// ---------------------------------------------------------------------------
// MSG_TELEM parser (msg_id 0x01, 33 bytes)
// ---------------------------------------------------------------------------

/**
 * Parse MSG_TELEM.
 *
 * Layout (33 bytes total):
 *   [0]     msg_id (0x01)
 *   [1]     capabilities (bit0 energy sensor, bit1 reactor adapter)
 *   [2]     faults (bit0 energy, bit1 plasma heat, bit2 production)
 *   [3]     reactor status (known/value pairs for ignited, can-ignite)
 *   [4]     seq (u8)
 *   [5-12]  energy, EU (f64)
 *   [13-20] plasma heat, K (f64)
 *   [21-28] production, EU/t (f64)
 *   [29-32] CRC-32 (u32, LE)
 */
function parse_telem(payload: Uint8Array): ParseResult {
  if (payload.length < SIZE_TELEM) {
    return {
      ok: false,
      error: `MSG_TELEM too short: ${payload.length} < ${SIZE_TELEM}`,
      msg_id: MSG_ID_TELEM
    };
  }

  const packet = payload.subarray(0, SIZE_TELEM);
  const caps = packet[1];
  const faults = packet[2];
  const status = packet[3];

  const data: TelemMsg = {
    msg_id: MSG_ID_TELEM,
    capabilities: {
      energy_sensor: (caps & CAP_ENERGY_SENSOR) !== 0,
      reactor_adapter: (caps & CAP_REACTOR_ADAPTER) !== 0
    },
    faults: {
      energy: (faults & FAULT_ENERGY) !== 0,
      plasma_heat: (faults & FAULT_PLASMA_HEAT) !== 0,
      production: (faults & FAULT_PRODUCTION) !== 0
    },
    reactor_status: {
      ignited: tri_state(status, STATUS_IGNITED_KNOWN, STATUS_IGNITED),
      can_ignite: tri_state(status, STATUS_CAN_IGNITE_KNOWN, STATUS_CAN_IGNITE)
    },
    seq: packet[4],
    energy_eu: read_f64_le(packet, 5),
    plasma_heat_k: read_f64_le(packet, 13),
    production: read_f64_le(packet, 21),
    crc_ok: crc32_check_trailer(packet)
  };

  return { ok: true, message: { type: 'telem', data } };
}

// ---------------------------------------------------------------------------
// MSG_SET_CHANNEL parser (msg_id 0x80, 10 bytes)
// ---------------------------------------------------------------------------

/**
 * Parse MSG_SET_CHANNEL.
 *
 * Layout (10 bytes total):
 *   [0]    msg_id (0x80)
 *   [1]    MAGIC_1
 *   [2]    MAGIC_2
 *   [3]    side (u8)
 *   [4]    channel (u8)
 *   [5]    value (u8)
 *   [6-9]  CRC-32 (u32, LE)
 */
function parse_set_channel(payload: Uint8Array): ParseResult {
  if (payload.length < SIZE_SET_CHANNEL) {
    return {
      ok: false,
      error: `MSG_SET_CHANNEL too short: ${payload.length} < ${SIZE_SET_CHANNEL}`,
      msg_id: MSG_ID_SET_CHANNEL
    };
  }

  if (payload[1] !== MAGIC_1 || payload[2] !== MAGIC_2) {
    return { ok: false, error: 'MSG_SET_CHANNEL bad magic', msg_id: MSG_ID_SET_CHANNEL };
  }

  const packet = payload.subarray(0, SIZE_SET_CHANNEL);
  const data: SetChannelMsg = {
    msg_id: MSG_ID_SET_CHANNEL,
    side: packet[3],
    channel: packet[4],
    value: packet[5],
    crc_ok: crc32_check_trailer(packet)
  };

  return { ok: true, message: { type: 'set_channel', data } };
}
