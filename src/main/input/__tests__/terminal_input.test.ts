import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import { TerminalInput, parse_input_chunk, MOUSE_ON, MOUSE_OFF } from '../terminal_input';
import type { TerminalInputStream } from '../terminal_input';

// ---------------------------------------------------------------------------
// Fake tty
// ---------------------------------------------------------------------------

class FakeStdin extends EventEmitter implements TerminalInputStream {
  isTTY = true;
  raw_modes: boolean[] = [];
  paused = true;

  setRawMode(mode: boolean): this {
    this.raw_modes.push(mode);
    return this;
  }

  resume(): this {
    this.paused = false;
    return this;
  }

  pause(): this {
    this.paused = true;
    return this;
  }
}

describe('parse_input_chunk', () => {
  it('turns a left-button press into a pointer event', () => {
    expect(parse_input_chunk('\x1b[<0;17;9M')).toEqual({
      events: [{ type: 'pointer', x: 17, y: 9 }],
      rest: ''
    });
  });

  it('ignores releases, motion, wheel and other buttons', () => {
    const text = '\x1b[<0;17;9m' + '\x1b[<32;5;5M' + '\x1b[<64;5;5M' + '\x1b[<2;5;5M';
    expect(parse_input_chunk(text)).toEqual({ events: [], rest: '' });
  });

  it('turns Ctrl-C into an interrupt and skips other keys', () => {
    expect(parse_input_chunk('q\x03x').events).toEqual([{ type: 'interrupt' }]);
  });

  it('keeps an incomplete sequence for the next chunk', () => {
    const first = parse_input_chunk('\x1b[<0;1');
    expect(first).toEqual({ events: [], rest: '\x1b[<0;1' });
    expect(parse_input_chunk(first.rest + '2;3M').events).toEqual([{ type: 'pointer', x: 12, y: 3 }]);
  });

  it('skips unrelated escape sequences', () => {
    expect(parse_input_chunk('\x1b[A\x1b[<0;2;2M').events).toEqual([{ type: 'pointer', x: 2, y: 2 }]);
  });
});

describe('TerminalInput', () => {
  let stdin: FakeStdin;
  let written: string[];
  let input: TerminalInput;

  beforeEach(() => {
    vi.useFakeTimers();
    stdin = new FakeStdin();
    written = [];
    input = new TerminalInput(stdin, { write: (chunk: string) => written.push(chunk) });
  });

  afterEach(() => {
    input.stop();
    vi.useRealTimers();
  });

  it('enters raw mode and enables mouse reporting on start', () => {
    input.start();
    expect(stdin.raw_modes).toEqual([true]);
    expect(stdin.paused).toBe(false);
    expect(written).toEqual([MOUSE_ON]);
  });

  it('restores the terminal on stop', () => {
    input.start();
    input.stop();
    expect(stdin.raw_modes).toEqual([true, false]);
    expect(stdin.paused).toBe(true);
    expect(written).toEqual([MOUSE_ON, MOUSE_OFF]);
    expect(stdin.listenerCount('data')).toBe(0);
  });

  it('delivers queued events before waiting', async () => {
    input.start();
    stdin.emit('data', Buffer.from('\x1b[<0;5;6M'));
    await expect(input.poll(300)).resolves.toEqual({ type: 'pointer', x: 5, y: 6 });
  });

  it('wakes a pending poll when input arrives', async () => {
    input.start();
    const pending = input.poll(300);
    stdin.emit('data', '\x03');
    await expect(pending).resolves.toEqual({ type: 'interrupt' });
  });

  it('times out after the poll interval', async () => {
    const pending = input.poll(300);
    vi.advanceTimersByTime(300);
    await expect(pending).resolves.toEqual({ type: 'timeout' });
  });

  it('queues interrupts from signal handlers', async () => {
    input.interrupt();
    await expect(input.poll(300)).resolves.toEqual({ type: 'interrupt' });
  });
});
