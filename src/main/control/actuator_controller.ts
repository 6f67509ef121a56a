/**
 * Actuator controller.
 *
 * Owns the latched outputs (charge relay, fuel valve, cavity valve), the
 * ignition pulse and the safety rules around them:
 *
 *   - every mutation is followed by a full re-push of the three latched
 *     channels, so the bus never drifts from the state;
 *   - ignition requires stored energy at or above the threshold;
 *   - once energy is ready, charging is forced off (interlock);
 *   - shutdown drops every output.
 *
 * Emits:
 *   'phase_change' (phase: ActuatorPhase)
 *
 * @module control/actuator_controller
 */

import { EventEmitter } from 'events';
import type { Clock, DiscreteBus } from '../peripherals/types';
import { CHANNEL_HIGH, CHANNEL_LOW } from '../protocol/constants';
import type { StatusBoard } from './status_board';
import type { ActuatorPhase, ActuatorState, ActuatorWiring, IgniteResult } from './actuator_types';

/** How long the ignition channel is held high. */
export const DEFAULT_PULSE_MS = 300;

export interface ActuatorControllerDeps {
  bus: DiscreteBus;
  wiring: ActuatorWiring;
  clock: Clock;
  status: StatusBoard;
  pulse_ms?: number;
}

function on_off(flag: boolean): string {
  return flag ? 'ON' : 'OFF';
}

export class ActuatorController extends EventEmitter {
  private state: ActuatorState = { charging: false, fuel_open: false, cavity_open: false };
  private phase: ActuatorPhase = 'idle';
  private readonly bus: DiscreteBus;
  private readonly wiring: ActuatorWiring;
  private readonly clock: Clock;
  private readonly status: StatusBoard;
  private readonly pulse_ms: number;

  constructor(deps: ActuatorControllerDeps) {
    super();
    this.bus = deps.bus;
    this.wiring = deps.wiring;
    this.clock = deps.clock;
    this.status = deps.status;
    this.pulse_ms = deps.pulse_ms ?? DEFAULT_PULSE_MS;
  }

  // -----------------------------------------------------------------------
  // Accessors
  // -----------------------------------------------------------------------

  get_state(): ActuatorState {
    return { ...this.state };
  }

  get_phase(): ActuatorPhase {
    return this.phase;
  }

  // -----------------------------------------------------------------------
  // Operator actions
  // -----------------------------------------------------------------------

  toggle_charging(): void {
    this._mutate({ charging: !this.state.charging });
    this.status.post(`Charging: ${on_off(this.state.charging)}`);
  }

  toggle_fuel(): void {
    this._mutate({ fuel_open: !this.state.fuel_open });
    this.status.post(`Fuel: ${on_off(this.state.fuel_open)}`);
  }

  toggle_cavity(): void {
    this._mutate({ cavity_open: !this.state.cavity_open });
    this.status.post(`Cavity: ${on_off(this.state.cavity_open)}`);
  }

  /**
   * Fire the ignition pulse if stored energy is sufficient.
   *
   * The pulse holds the ignition channel high for the pulse duration and
   * cannot be cancelled; the caller is stalled until the channel is low
   * again.
   *
   * @param energy_ready - Readiness from a fresh energy read.
   */
  async try_ignite(energy_ready: boolean): Promise<IgniteResult> {
    if (!energy_ready) {
      this.status.post('Not enough energy.');
      return { ok: false, error: 'insufficient_energy' };
    }

    const resume = this.phase;
    this._transition('igniting');
    try {
      this._write(this.wiring.channels.ignition, CHANNEL_HIGH);
      await this.clock.sleep(this.pulse_ms);
    } finally {
      this._write(this.wiring.channels.ignition, CHANNEL_LOW);
      this._transition(resume);
    }

    this.status.post('Ignition triggered.');
    return { ok: true };
  }

  // -----------------------------------------------------------------------
  // Automatic rules
  // -----------------------------------------------------------------------

  /**
   * Energy-ready interlock, evaluated once per frame.
   *
   * @returns True when charging was forced off.
   */
  enforce_interlock(energy_ready: boolean): boolean {
    if (!energy_ready || !this.state.charging) {
      return false;
    }
    this._mutate({ charging: false });
    this.status.post('Laser charged - charging OFF.');
    return true;
  }

  /** Re-push every latched channel from the current state. */
  push_outputs(): void {
    const { channels } = this.wiring;
    this._write(channels.charge, this.state.charging ? CHANNEL_HIGH : CHANNEL_LOW);
    this._write(channels.fuel, this.state.fuel_open ? CHANNEL_HIGH : CHANNEL_LOW);
    this._write(channels.cavity, this.state.cavity_open ? CHANNEL_HIGH : CHANNEL_LOW);
  }

  /** Drop every output. Called when the loop stops, whatever the reason. */
  shutdown(): void {
    this._mutate({ charging: false, fuel_open: false, cavity_open: false });
    this._write(this.wiring.channels.ignition, CHANNEL_LOW);
  }

  // -----------------------------------------------------------------------
  // Private
  // -----------------------------------------------------------------------

  private _mutate(patch: Partial<ActuatorState>): void {
    this.state = { ...this.state, ...patch };
    this.push_outputs();
    if (this.phase !== 'igniting') {
      this._transition(this.state.charging ? 'charging' : 'idle');
    }
  }

  private _transition(next: ActuatorPhase): void {
    if (next === this.phase) return;
    this.phase = next;
    this.emit('phase_change', next);
  }

  private _write(channel: number, value: number): void {
    this.bus.set_channel(this.wiring.side, channel, value);
  }
}
