/**
 * Fault-tolerant sensor polling.
 *
 * Every sensor call is wrapped at the point of use: a rejection, a
 * negative number or a non-finite value becomes 0 (or `null` for the
 * tri-state reactor flags), so nothing downstream ever sees a peripheral
 * failure.
 *
 * @module control/telemetry_sampler
 */

import type { EnergySensor, ReactorSensor } from '../peripherals/types';
import type { HistoryBuffer } from './history_buffer';

export interface EnergyReading {
  energy_eu: number;
  threshold_eu: number;
  /** Stored energy has reached the ignition threshold. */
  ready: boolean;
  /** energy / threshold clamped to [0, 1]. */
  fill_ratio: number;
}

export interface ReactorSample {
  plasma_heat: number;
  production: number;
}

export interface ReactorStatus {
  ignited: boolean | null;
  can_ignite: boolean | null;
}

export interface SamplerHistories {
  power: HistoryBuffer;
  heat: HistoryBuffer;
}

async function read_quantity(read: () => Promise<number>): Promise<number> {
  try {
    const value = await read();
    return Number.isFinite(value) && value > 0 ? value : 0;
  } catch {
    return 0;
  }
}

async function read_flag(read: () => Promise<boolean | null>): Promise<boolean | null> {
  try {
    const value = await read();
    return typeof value === 'boolean' ? value : null;
  } catch {
    return null;
  }
}

/** Derive the readiness view of one energy value. */
export function evaluate_energy(energy_eu: number, threshold_eu: number): EnergyReading {
  const ratio = threshold_eu > 0 ? energy_eu / threshold_eu : 1;
  return {
    energy_eu,
    threshold_eu,
    ready: energy_eu >= threshold_eu,
    fill_ratio: Math.min(1, Math.max(0, ratio))
  };
}

export class TelemetrySampler {
  private readonly reactor: ReactorSensor | null;

  /**
   * @param reactor - Reactor adapter, or null when none is installed. The
   *   choice is fixed for the sampler's lifetime.
   */
  constructor(
    private readonly energy: EnergySensor,
    reactor: ReactorSensor | null,
    private readonly histories: SamplerHistories,
    private readonly threshold_eu: number
  ) {
    this.reactor = reactor;
  }

  has_reactor(): boolean {
    return this.reactor !== null;
  }

  async read_energy(): Promise<EnergyReading> {
    const energy_eu = await read_quantity(() => this.energy.get_energy());
    return evaluate_energy(energy_eu, this.threshold_eu);
  }

  /**
   * Poll heat and production once and append them to the histories
   * (production first).
   *
   * @returns null when no reactor adapter is installed.
   */
  async sample(): Promise<ReactorSample | null> {
    const reactor = this.reactor;
    if (!reactor) {
      return null;
    }

    const plasma_heat = await read_quantity(() => reactor.get_plasma_heat());
    const production = await read_quantity(() => reactor.get_production());

    this.histories.power.push(production);
    this.histories.heat.push(plasma_heat);

    return { plasma_heat, production };
  }

  /** Indicator flags; null when no reactor adapter is installed. */
  async read_status(): Promise<ReactorStatus | null> {
    const reactor = this.reactor;
    if (!reactor) {
      return null;
    }
    return {
      ignited: await read_flag(() => reactor.is_ignited()),
      can_ignite: await read_flag(() => reactor.can_ignite())
    };
  }
}
