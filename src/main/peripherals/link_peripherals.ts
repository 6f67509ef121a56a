/**
 * Bus and sensor capabilities backed by the serial I/O link.
 *
 * Writes go out immediately as MSG_SET_CHANNEL packets; reads are answered
 * from the {@link LinkTelemetry} cache, so a stale or faulted field rejects
 * just like a failing device call would.
 *
 * @module peripherals/link_peripherals
 */

import { build_set_channel } from '../protocol/command_builder';
import type { PacketSender } from '../transport/io_link';
import type { LinkTelemetry } from '../store/link_telemetry';
import type { Clock, DiscreteBus, EnergySensor, ReactorSensor } from './types';

export class LinkBus implements DiscreteBus {
  constructor(private readonly link: PacketSender) {}

  set_channel(side: number, channel: number, value: number): void {
    this.link.send(build_set_channel(side, channel, value));
  }
}

export class LinkEnergySensor implements EnergySensor {
  constructor(
    private readonly telemetry: LinkTelemetry,
    private readonly clock: Clock
  ) {}

  async get_energy(): Promise<number> {
    return this.telemetry.read_value('energy_eu', this.clock.now_ms());
  }
}

export class LinkReactorSensor implements ReactorSensor {
  constructor(
    private readonly telemetry: LinkTelemetry,
    private readonly clock: Clock
  ) {}

  async get_plasma_heat(): Promise<number> {
    return this.telemetry.read_value('plasma_heat_k', this.clock.now_ms());
  }

  async get_production(): Promise<number> {
    return this.telemetry.read_value('production', this.clock.now_ms());
  }

  async is_ignited(): Promise<boolean | null> {
    return this.telemetry.read_flag('ignited', this.clock.now_ms());
  }

  async can_ignite(): Promise<boolean | null> {
    return this.telemetry.read_flag('can_ignite', this.clock.now_ms());
  }
}
