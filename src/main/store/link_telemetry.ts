/**
 * Telemetry cache for the reactor I/O link.
 *
 * Holds the latest accepted MSG_TELEM frame and answers sensor reads from
 * it. A read fails with {@link LinkFault} when the controller flagged the
 * field as faulty or when no frame arrived within the staleness window,
 * which is how a dead link surfaces to the sampler as a failed sensor call.
 *
 * @module store/link_telemetry
 */

import type { TelemMsg } from '../protocol/types';
import { DEFAULT_STALE_AFTER_MS } from '../protocol/constants';
import { DEFAULT_LINK_SNAPSHOT } from './store_types';
import type { LinkSnapshot, LinkValueField, LinkFlagField } from './store_types';

/** A sensor value that cannot be served from the link right now. */
export class LinkFault extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LinkFault';
  }
}

const FAULT_FOR_FIELD: Record<LinkValueField, keyof TelemMsg['faults']> = {
  energy_eu: 'energy',
  plasma_heat_k: 'plasma_heat',
  production: 'production'
};

function clone_snapshot(s: Readonly<LinkSnapshot>): LinkSnapshot {
  return {
    ...s,
    capabilities: s.capabilities ? { ...s.capabilities } : null,
    faults: { ...s.faults },
    reactor_status: { ...s.reactor_status }
  };
}

export class LinkTelemetry {
  private snapshot: LinkSnapshot = clone_snapshot(DEFAULT_LINK_SNAPSHOT);
  private subscribers: Set<(s: LinkSnapshot) => void> = new Set();

  constructor(private readonly stale_after_ms: number = DEFAULT_STALE_AFTER_MS) {}

  /**
   * Register a callback fired after every accepted frame or connection
   * change.
   *
   * @returns An unsubscribe function.
   */
  subscribe(callback: (snapshot: LinkSnapshot) => void): () => void {
    this.subscribers.add(callback);
    return () => {
      this.subscribers.delete(callback);
    };
  }

  /** Isolated copy of the current state. */
  get_snapshot(): LinkSnapshot {
    return clone_snapshot(this.snapshot);
  }

  /**
   * Ingest a decoded MSG_TELEM. Frames with a bad CRC are counted and
   * otherwise ignored.
   *
   * @param now_ms - Local receive time.
   */
  update_from_telem(msg: TelemMsg, now_ms: number): void {
    const s = this.snapshot;
    if (!msg.crc_ok) {
      s.frames_bad_crc++;
      return;
    }

    s.capabilities = { ...msg.capabilities };
    s.faults = { ...msg.faults };
    s.reactor_status = { ...msg.reactor_status };
    s.energy_eu = msg.energy_eu;
    s.plasma_heat_k = msg.plasma_heat_k;
    s.production = msg.production;
    s.seq = msg.seq;
    s.frames_ok++;
    s.last_valid_ms = now_ms;
    this._notify();
  }

  /**
   * Record a link open/close. Closing keeps the cached values; they go
   * stale on their own.
   */
  set_connected(connected: boolean): void {
    this.snapshot.connected = connected;
    this._notify();
  }

  /** True when no frame was accepted within the staleness window. */
  is_stale(now_ms: number): boolean {
    return this.snapshot.last_valid_ms === 0 || now_ms - this.snapshot.last_valid_ms > this.stale_after_ms;
  }

  /**
   * Serve a numeric sensor field.
   *
   * @throws LinkFault when stale or flagged faulty by the controller.
   */
  read_value(field: LinkValueField, now_ms: number): number {
    this._assert_fresh(field, now_ms);
    if (this.snapshot.faults[FAULT_FOR_FIELD[field]]) {
      throw new LinkFault(`${field}: controller reported a read fault`);
    }
    return this.snapshot[field];
  }

  /**
   * Serve a tri-state reactor flag (null when the controller did not know).
   *
   * @throws LinkFault when stale.
   */
  read_flag(field: LinkFlagField, now_ms: number): boolean | null {
    this._assert_fresh(field, now_ms);
    return this.snapshot.reactor_status[field];
  }

  // --- Private helpers ---

  private _assert_fresh(field: string, now_ms: number): void {
    if (this.is_stale(now_ms)) {
      throw new LinkFault(`${field}: no telemetry within ${this.stale_after_ms} ms`);
    }
  }

  private _notify(): void {
    const snap = this.get_snapshot();
    for (const cb of this.subscribers) {
      cb(snap);
    }
  }
}
