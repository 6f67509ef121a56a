/**
 * Protocol types for the reactor I/O link.
 *
 * Decoded message shapes exchanged between the control panel and the
 * I/O controller that hosts the bundled outputs and the sensors.
 *
 * @module protocol/types
 */

// ---------------------------------------------------------------------------
// Decoded bit fields
// ---------------------------------------------------------------------------

/** Which peripherals the I/O controller reports as attached. */
export interface LinkCapabilities {
  /** Energy (laser charge) sensor attached. */
  energy_sensor: boolean;
  /** Reactor logic adapter attached. */
  reactor_adapter: boolean;
}

/** Per-field read failures reported by the controller. */
export interface TelemFaults {
  energy: boolean;
  plasma_heat: boolean;
  production: boolean;
}

/** Tri-state reactor flags; null when the controller could not read them. */
export interface TelemReactorStatus {
  ignited: boolean | null;
  can_ignite: boolean | null;
}

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

/** Decoded MSG_TELEM packet. */
export interface TelemMsg {
  msg_id: number;
  capabilities: LinkCapabilities;
  faults: TelemFaults;
  reactor_status: TelemReactorStatus;
  /** Rolling sequence number. */
  seq: number;
  /** Stored laser energy in EU. */
  energy_eu: number;
  /** Reactor plasma heat in kelvin. */
  plasma_heat_k: number;
  /** Reactor production in EU per tick. */
  production: number;
  /** Whether the trailing CRC-32 matched. */
  crc_ok: boolean;
}

/** Decoded MSG_SET_CHANNEL packet (echoed by controllers in loopback mode). */
export interface SetChannelMsg {
  msg_id: number;
  side: number;
  channel: number;
  value: number;
  crc_ok: boolean;
}

// ---------------------------------------------------------------------------
// Parse result
// ---------------------------------------------------------------------------

/** Discriminated union of every message the parser can produce. */
export type ParsedMessage =
  | { type: 'telem'; data: TelemMsg }
  | { type: 'set_channel'; data: SetChannelMsg };

/** Parser output: a typed message or a description of why parsing failed. */
export type ParseResult =
  | { ok: true; message: ParsedMessage }
  | { ok: false; error: string; msg_id?: number };
