/**
 * Raw-mode terminal input with SGR mouse reporting.
 *
 * Left-button presses become `pointer` events at the reported cell;
 * Ctrl-C becomes `interrupt`. Releases, motion, wheel and keystrokes are
 * dropped. Events queue until the control loop polls for them.
 *
 * @module input/terminal_input
 */

import type { InputEvent, InputSource } from '../peripherals/types';

const ESC = '\x1b';
const CTRL_C = '\x03';

/** Button tracking (1000) with SGR coordinates (1006). */
export const MOUSE_ON = `${ESC}[?1000h${ESC}[?1006h`;
export const MOUSE_OFF = `${ESC}[?1006l${ESC}[?1000l`;

const SGR_MOUSE = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])/;
const SGR_MOUSE_PARTIAL = /^\x1b(\[(<[\d;]*)?)?$/;

const LEFT_BUTTON = 0;

export interface ParsedChunk {
  events: InputEvent[];
  /** Trailing bytes of an escape sequence not yet complete. */
  rest: string;
}

/**
 * Parse terminal input. `text` is the unconsumed tail of the previous
 * chunk followed by the new one.
 */
export function parse_input_chunk(text: string): ParsedChunk {
  const events: InputEvent[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (ch === CTRL_C) {
      events.push({ type: 'interrupt' });
      i++;
      continue;
    }
    if (ch !== ESC) {
      i++;
      continue;
    }

    const tail = text.slice(i);
    const m = SGR_MOUSE.exec(tail);
    if (m) {
      const code = Number(m[1]);
      if (code === LEFT_BUTTON && m[4] === 'M') {
        events.push({ type: 'pointer', x: Number(m[2]), y: Number(m[3]) });
      }
      i += m[0].length;
      continue;
    }
    if (SGR_MOUSE_PARTIAL.test(tail)) {
      return { events, rest: tail };
    }
    i++;
  }

  return { events, rest: '' };
}

/** The parts of a tty read stream the input source uses. */
export interface TerminalInputStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  off(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface TerminalControlOutput {
  write(chunk: string): unknown;
}

export class TerminalInput implements InputSource {
  private readonly input: TerminalInputStream;
  private readonly output: TerminalControlOutput;
  private queue: InputEvent[] = [];
  private pending = '';
  private waiter: ((event: InputEvent) => void) | null = null;
  private started = false;

  private readonly on_data = (chunk: Buffer | string): void => {
    this.feed(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
  };

  constructor(input: TerminalInputStream, output: TerminalControlOutput) {
    this.input = input;
    this.output = output;
  }

  /** Enter raw mode and enable mouse reporting. */
  start(): void {
    if (this.started) return;
    this.started = true;
    if (this.input.isTTY && this.input.setRawMode) this.input.setRawMode(true);
    this.input.on('data', this.on_data);
    this.input.resume();
    this.output.write(MOUSE_ON);
  }

  /** Disable mouse reporting and leave raw mode. */
  stop(): void {
    if (!this.started) return;
    this.started = false;
    this.output.write(MOUSE_OFF);
    this.input.off('data', this.on_data);
    if (this.input.isTTY && this.input.setRawMode) this.input.setRawMode(false);
    this.input.pause();
  }

  /** Parse raw terminal text and queue the resulting events. */
  feed(text: string): void {
    const parsed = parse_input_chunk(this.pending + text);
    this.pending = parsed.rest;
    for (const event of parsed.events) this.push(event);
  }

  /** Queue an interrupt, e.g. from a signal handler. */
  interrupt(): void {
    this.push({ type: 'interrupt' });
  }

  poll(max_wait_ms: number): Promise<InputEvent> {
    const next = this.queue.shift();
    if (next) return Promise.resolve(next);

    return new Promise<InputEvent>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve({ type: 'timeout' });
      }, max_wait_ms);
      this.waiter = (event) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(event);
      };
    });
  }

  private push(event: InputEvent): void {
    if (this.waiter) {
      this.waiter(event);
    } else {
      this.queue.push(event);
    }
  }
}
