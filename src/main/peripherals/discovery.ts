/**
 * Startup discovery: decide which capabilities are present and refuse to
 * start without the required ones.
 *
 * @module peripherals/discovery
 */

import type { LinkCapabilities } from '../protocol/types';
import type { LinkTelemetry } from '../store/link_telemetry';
import type { PacketSender } from '../transport/io_link';
import { LinkBus, LinkEnergySensor, LinkReactorSensor } from './link_peripherals';
import type {
  Clock,
  DiscreteBus,
  DisplaySurface,
  EnergySensor,
  PeripheralSet,
  ReactorSensor
} from './types';

/** Thrown when a required capability is absent at launch. */
export class MissingCapabilityError extends Error {
  constructor(readonly missing: readonly string[]) {
    super(`Required components missing: ${missing.join(', ')}`);
    this.name = 'MissingCapabilityError';
  }
}

/** Whatever startup managed to find; null marks an absent capability. */
export interface PeripheralCandidates {
  display: DisplaySurface | null;
  bus: DiscreteBus | null;
  energy: EnergySensor | null;
  reactor: ReactorSensor | null;
}

/**
 * Check the required capabilities and narrow the candidates.
 *
 * @throws MissingCapabilityError naming every absent required capability.
 */
export function resolve_peripherals(found: PeripheralCandidates): PeripheralSet {
  const { display, bus, energy, reactor } = found;
  if (display && bus && energy) {
    return { display, bus, energy, reactor };
  }

  const missing: string[] = [];
  if (!display) missing.push('display');
  if (!bus) missing.push('discrete bus');
  if (!energy) missing.push('energy sensor');
  throw new MissingCapabilityError(missing);
}

/**
 * Wait for the first accepted telemetry frame and report the capabilities
 * it announced.
 *
 * @returns null when nothing arrived within `timeout_ms`.
 */
export function wait_for_capabilities(
  telemetry: LinkTelemetry,
  timeout_ms: number
): Promise<LinkCapabilities | null> {
  const known = telemetry.get_snapshot().capabilities;
  if (known) {
    return Promise.resolve(known);
  }

  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      unsubscribe();
      resolve(null);
    }, timeout_ms);

    const unsubscribe = telemetry.subscribe((snapshot) => {
      if (!snapshot.capabilities) return;
      clearTimeout(timer);
      unsubscribe();
      resolve(snapshot.capabilities);
    });
  });
}

/**
 * Build link-backed capabilities from what the controller announced.
 *
 * @param link - Open link, or null when the port could not be opened.
 * @param capabilities - Announced capabilities, or null when the
 *   controller never spoke.
 */
export function link_candidates(
  link: PacketSender | null,
  telemetry: LinkTelemetry,
  capabilities: LinkCapabilities | null,
  clock: Clock
): Omit<PeripheralCandidates, 'display'> {
  return {
    bus: link ? new LinkBus(link) : null,
    energy: capabilities?.energy_sensor ? new LinkEnergySensor(telemetry, clock) : null,
    reactor: capabilities?.reactor_adapter ? new LinkReactorSensor(telemetry, clock) : null
  };
}
