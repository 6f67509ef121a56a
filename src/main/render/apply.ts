/**
 * Replays draw commands on a display surface.
 *
 * @module render/apply
 */

import type { DisplaySurface } from '../peripherals/types';
import type { DrawCommand } from './draw_types';

export function apply_draw_commands(surface: DisplaySurface, commands: readonly DrawCommand[]): void {
  for (const cmd of commands) {
    surface.set_foreground(cmd.fg);
    surface.set_background(cmd.bg);
    switch (cmd.kind) {
      case 'fill':
        surface.fill(cmd.x, cmd.y, cmd.width, cmd.height, cmd.char);
        break;
      case 'text':
        surface.write(cmd.x, cmd.y, cmd.text);
        break;
    }
  }
}
