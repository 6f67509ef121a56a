import { describe, it, expect } from 'vitest';
import { apply_draw_commands } from '../apply';
import type { DrawCommand } from '../draw_types';
import type { DisplaySurface, Resolution } from '../../peripherals/types';

class RecordingSurface implements DisplaySurface {
  readonly calls: string[] = [];

  resolution(): Resolution {
    return { width: 10, height: 5 };
  }
  set_foreground(color: number): void {
    this.calls.push(`fg ${color}`);
  }
  set_background(color: number): void {
    this.calls.push(`bg ${color}`);
  }
  fill(x: number, y: number, width: number, height: number, char: string): void {
    this.calls.push(`fill ${x},${y} ${width}x${height} '${char}'`);
  }
  write(x: number, y: number, text: string): void {
    this.calls.push(`write ${x},${y} '${text}'`);
  }
  flush(): void {
    this.calls.push('flush');
  }
}

describe('apply_draw_commands', () => {
  it('sets colors before every command and replays in order', () => {
    const surface = new RecordingSurface();
    const commands: DrawCommand[] = [
      { kind: 'fill', x: 1, y: 1, width: 10, height: 5, char: ' ', fg: 1, bg: 2 },
      { kind: 'text', x: 2, y: 3, text: 'Hi', fg: 3, bg: 4 }
    ];

    apply_draw_commands(surface, commands);

    expect(surface.calls).toEqual([
      'fg 1',
      'bg 2',
      "fill 1,1 10x5 ' '",
      'fg 3',
      'bg 4',
      "write 2,3 'Hi'"
    ]);
  });
});
