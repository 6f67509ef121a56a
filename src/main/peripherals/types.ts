/**
 * Capability contracts between the control core and its peripherals.
 *
 * The core never reaches for a device on its own; every peripheral is an
 * object passed in at construction so the loop runs unchanged against the
 * serial link, the terminal, or test fakes.
 *
 * @module peripherals/types
 */

// ---------------------------------------------------------------------------
// Display
// ---------------------------------------------------------------------------

/** Character-grid size in cells. */
export interface Resolution {
  width: number;
  height: number;
}

/**
 * Fixed-size character grid. Coordinates are 1-based (column, row).
 * Calls are synchronous and assumed to succeed.
 */
export interface DisplaySurface {
  resolution(): Resolution;
  /** 24-bit RGB foreground for subsequent fill/write calls. */
  set_foreground(color: number): void;
  /** 24-bit RGB background for subsequent fill/write calls. */
  set_background(color: number): void;
  fill(x: number, y: number, width: number, height: number, char: string): void;
  write(x: number, y: number, text: string): void;
  /** Present everything drawn since the previous flush. */
  flush(): void;
}

// ---------------------------------------------------------------------------
// Discrete bus
// ---------------------------------------------------------------------------

/** Bundled-signal output block. No read-back. */
export interface DiscreteBus {
  set_channel(side: number, channel: number, value: number): void;
}

// ---------------------------------------------------------------------------
// Sensors
// ---------------------------------------------------------------------------

/** Laser charge sensor. Any call may reject. */
export interface EnergySensor {
  get_energy(): Promise<number>;
}

/** Reactor logic adapter. Each call may reject independently. */
export interface ReactorSensor {
  get_plasma_heat(): Promise<number>;
  get_production(): Promise<number>;
  /** null when the adapter cannot tell. */
  is_ignited(): Promise<boolean | null>;
  /** null when the adapter cannot tell. */
  can_ignite(): Promise<boolean | null>;
}

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

/** One result of polling the input source. */
export type InputEvent =
  | { type: 'timeout' }
  | { type: 'pointer'; x: number; y: number }
  | { type: 'interrupt' };

export interface InputSource {
  /** Resolve with the next event, or `timeout` after `max_wait_ms`. */
  poll(max_wait_ms: number): Promise<InputEvent>;
}

// ---------------------------------------------------------------------------
// Time
// ---------------------------------------------------------------------------

export interface Clock {
  now_ms(): number;
  sleep(ms: number): Promise<void>;
}

/** Wall clock backed by Date.now() and setTimeout. */
export const system_clock: Clock = {
  now_ms: () => Date.now(),
  sleep: (ms) => new Promise<void>((resolve) => setTimeout(resolve, ms))
};

// ---------------------------------------------------------------------------
// Aggregate
// ---------------------------------------------------------------------------

/** The peripherals a running panel needs; the reactor adapter is optional. */
export interface PeripheralSet {
  display: DisplaySurface;
  bus: DiscreteBus;
  energy: EnergySensor;
  reactor: ReactorSensor | null;
}
