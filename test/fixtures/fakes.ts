/**
 * In-process peripherals for control-core tests.
 */

import type {
  Clock,
  DiscreteBus,
  EnergySensor,
  InputEvent,
  InputSource,
  ReactorSensor
} from '../../src/main/peripherals/types';

export interface BusWrite {
  side: number;
  channel: number;
  value: number;
}

export class FakeBus implements DiscreteBus {
  readonly writes: BusWrite[] = [];

  set_channel(side: number, channel: number, value: number): void {
    this.writes.push({ side, channel, value });
  }

  /** Writes addressed to one channel, in order. */
  writes_to(channel: number): number[] {
    return this.writes.filter((w) => w.channel === channel).map((w) => w.value);
  }

  clear(): void {
    this.writes.length = 0;
  }
}

/** A reading, or an Error to reject with. */
export type FakeReading<T> = T | Error;

function answer<T>(reading: FakeReading<T>): Promise<T> {
  return reading instanceof Error ? Promise.reject(reading) : Promise.resolve(reading);
}

export class FakeEnergySensor implements EnergySensor {
  reads = 0;

  constructor(public energy: FakeReading<number> = 0) {}

  get_energy(): Promise<number> {
    this.reads++;
    return answer(this.energy);
  }
}

export class FakeReactorSensor implements ReactorSensor {
  plasma_heat: FakeReading<number> = 0;
  production: FakeReading<number> = 0;
  ignited: FakeReading<boolean | null> = null;
  can_ignite_flag: FakeReading<boolean | null> = null;

  get_plasma_heat(): Promise<number> {
    return answer(this.plasma_heat);
  }

  get_production(): Promise<number> {
    return answer(this.production);
  }

  is_ignited(): Promise<boolean | null> {
    return answer(this.ignited);
  }

  can_ignite(): Promise<boolean | null> {
    return answer(this.can_ignite_flag);
  }
}

/**
 * Replays a script of events, then reports an interrupt forever so a loop
 * under test always ends.
 */
export class FakeInput implements InputSource {
  readonly waits: number[] = [];
  private readonly script: InputEvent[];

  constructor(script: InputEvent[]) {
    this.script = [...script];
  }

  poll(max_wait_ms: number): Promise<InputEvent> {
    this.waits.push(max_wait_ms);
    return Promise.resolve(this.script.shift() ?? { type: 'interrupt' });
  }
}

/** Manual clock; sleep() advances time immediately. */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(public now = 1_000) {}

  now_ms(): number {
    return this.now;
  }

  sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.now += ms;
    return Promise.resolve();
  }

  advance(ms: number): void {
    this.now += ms;
  }
}
