/**
 * Types for the cached I/O link telemetry.
 *
 * @module store/store_types
 */

import type { LinkCapabilities, TelemFaults, TelemReactorStatus } from '../protocol/types';

/** Numeric sensor fields carried by MSG_TELEM. */
export type LinkValueField = 'energy_eu' | 'plasma_heat_k' | 'production';

/** Tri-state reactor flags carried by MSG_TELEM. */
export type LinkFlagField = keyof TelemReactorStatus;

/**
 * Latest view of the I/O controller, as assembled from MSG_TELEM frames.
 */
export interface LinkSnapshot {
  /** Serial link currently open. */
  connected: boolean;
  /** Capabilities from the latest valid frame; null until one arrives. */
  capabilities: LinkCapabilities | null;
  energy_eu: number;
  plasma_heat_k: number;
  production: number;
  faults: TelemFaults;
  reactor_status: TelemReactorStatus;
  /** Sequence number of the last accepted frame. */
  seq: number;
  /** Frames accepted. */
  frames_ok: number;
  /** Frames dropped for a CRC mismatch. */
  frames_bad_crc: number;
  /** Local time (ms) of the last accepted frame, 0 if none. */
  last_valid_ms: number;
}

/** Snapshot before any frame has been received. */
export const DEFAULT_LINK_SNAPSHOT: Readonly<LinkSnapshot> = Object.freeze({
  connected: false,
  capabilities: null,
  energy_eu: 0,
  plasma_heat_k: 0,
  production: 0,
  faults: Object.freeze({ energy: false, plasma_heat: false, production: false }),
  reactor_status: Object.freeze({ ignited: null, can_ignite: null }),
  seq: 0,
  frames_ok: 0,
  frames_bad_crc: 0,
  last_valid_ms: 0
});
