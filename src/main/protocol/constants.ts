/**
 * Protocol constants for the reactor I/O link.
 *
 * Message IDs, magic bytes, frame sizes, bit masks and CRC parameters
 * shared by the parser and the command builder.
 *
 * @module protocol/constants
 */

// ---------------------------------------------------------------------------
// Message IDs
// ---------------------------------------------------------------------------

/** MSG_TELEM: periodic sensor telemetry from the I/O controller. */
export const MSG_ID_TELEM = 0x01;

/** MSG_SET_CHANNEL: bundled output write from the panel. */
export const MSG_ID_SET_CHANNEL = 0x80;

// ---------------------------------------------------------------------------
// Magic bytes
// ---------------------------------------------------------------------------

/** First magic byte in command packets. */
export const MAGIC_1 = 0xB5;

/** Second magic byte in command packets. */
export const MAGIC_2 = 0x5E;

// ---------------------------------------------------------------------------
// CRC-32 parameters (STM32 hardware CRC peripheral)
// ---------------------------------------------------------------------------

/** CRC-32 polynomial (unreflected). */
export const CRC32_POLY = 0x04C11DB7;

/** CRC-32 initial value. */
export const CRC32_INIT = 0xFFFFFFFF;

// ---------------------------------------------------------------------------
// Packet sizes in bytes (including msg_id and CRC)
// ---------------------------------------------------------------------------

/** MSG_TELEM total size. */
export const SIZE_TELEM = 33;

/** MSG_SET_CHANNEL total size. */
export const SIZE_SET_CHANNEL = 10;

// ---------------------------------------------------------------------------
// MSG_TELEM bit fields
// ---------------------------------------------------------------------------

/** Capability byte: an energy sensor is attached. */
export const CAP_ENERGY_SENSOR = 0x01;

/** Capability byte: a reactor logic adapter is attached. */
export const CAP_REACTOR_ADAPTER = 0x02;

/** Fault byte: the energy read failed on the controller. */
export const FAULT_ENERGY = 0x01;

/** Fault byte: the plasma heat read failed. */
export const FAULT_PLASMA_HEAT = 0x02;

/** Fault byte: the production read failed. */
export const FAULT_PRODUCTION = 0x04;

/** Reactor status byte: the ignited flag is valid. */
export const STATUS_IGNITED_KNOWN = 0x01;

/** Reactor status byte: the reactor is ignited. */
export const STATUS_IGNITED = 0x02;

/** Reactor status byte: the can-ignite flag is valid. */
export const STATUS_CAN_IGNITE_KNOWN = 0x04;

/** Reactor status byte: the reactor reports it can ignite. */
export const STATUS_CAN_IGNITE = 0x08;

// ---------------------------------------------------------------------------
// Bus limits
// ---------------------------------------------------------------------------

/** Highest side index on a bundled output block. */
export const MAX_BUS_SIDE = 5;

/** Highest channel index within one bundled cable. */
export const MAX_BUS_CHANNEL = 15;

/** Full-scale channel value (signal high). */
export const CHANNEL_HIGH = 255;

/** Channel value for signal low. */
export const CHANNEL_LOW = 0;

// ---------------------------------------------------------------------------
// Link timing
// ---------------------------------------------------------------------------

/** Default baud rate for the I/O link. */
export const DEFAULT_BAUD_RATE = 115200;

/** Telemetry older than this is treated as a failed sensor read. */
export const DEFAULT_STALE_AFTER_MS = 1000;

/** How long startup waits for the first telemetry frame. */
export const DEFAULT_DISCOVERY_TIMEOUT_MS = 2000;
