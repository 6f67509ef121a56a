/**
 * Actuator controller types.
 *
 * @module control/actuator_types
 */

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

/** Latched actuator outputs. The ignition pulse is not latched. */
export interface ActuatorState {
  charging: boolean;
  fuel_open: boolean;
  cavity_open: boolean;
}

/**
 * Engine-visible lifecycle:
 *   idle <-> charging           on toggle, or the energy-ready interlock
 *   idle/charging -> igniting   for the duration of the pulse
 */
export type ActuatorPhase = 'idle' | 'charging' | 'igniting';

// ---------------------------------------------------------------------------
// Wiring
// ---------------------------------------------------------------------------

/** Bundled-cable channel used by each output. */
export interface ActuatorChannels {
  ignition: number;
  charge: number;
  fuel: number;
  cavity: number;
}

export interface ActuatorWiring {
  /** Side of the output block the bundled cable is attached to. */
  side: number;
  channels: ActuatorChannels;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export type IgniteResult =
  | { ok: true }
  | { ok: false; error: 'insufficient_energy' };
