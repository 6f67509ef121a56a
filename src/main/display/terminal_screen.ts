/**
 * Terminal-backed display surface.
 *
 * A {@link CellGrid} whose `flush()` paints the cells that changed since
 * the previous flush using cursor moves and 24-bit SGR colors. The grid
 * follows the terminal size unless fixed dimensions are given.
 *
 * @module display/terminal_screen
 */

import type { Resolution } from '../peripherals/types';
import { CellGrid } from './cell_grid';
import type { Cell } from './cell_grid';

const ESC = '\x1b';

export const ENTER_ALT_SCREEN = `${ESC}[?1049h${ESC}[?25l`;
export const LEAVE_ALT_SCREEN = `${ESC}[0m${ESC}[?25h${ESC}[?1049l`;
export const RESET_ATTRS = `${ESC}[0m`;

const FALLBACK_COLUMNS = 80;
const FALLBACK_ROWS = 24;

/** The parts of a tty write stream the screen uses. */
export interface TerminalOutput {
  write(chunk: string): unknown;
  columns?: number;
  rows?: number;
}

function rgb(color: number): string {
  return `${(color >> 16) & 0xFF};${(color >> 8) & 0xFF};${color & 0xFF}`;
}

export function sgr_colors(fg: number, bg: number): string {
  return `${ESC}[38;2;${rgb(fg)};48;2;${rgb(bg)}m`;
}

export function cursor_to(x: number, y: number): string {
  return `${ESC}[${y};${x}H`;
}

export class TerminalScreen extends CellGrid {
  private readonly out: TerminalOutput;
  private readonly fixed: Partial<Resolution>;
  /** What the terminal shows; null forces a full repaint. */
  private painted: Cell[] | null = null;

  constructor(out: TerminalOutput, fixed: Partial<Resolution> = {}) {
    super(
      fixed.width ?? out.columns ?? FALLBACK_COLUMNS,
      fixed.height ?? out.rows ?? FALLBACK_ROWS
    );
    this.out = out;
    this.fixed = fixed;
  }

  /** Switch to the alternate screen and hide the cursor. */
  open(): void {
    this.out.write(ENTER_ALT_SCREEN);
    this.painted = null;
  }

  /** Restore the primary screen and the cursor. */
  close(): void {
    this.out.write(LEAVE_ALT_SCREEN);
  }

  resolution(): Resolution {
    this.sync_size();
    return super.resolution();
  }

  flush(): void {
    const shown = this.painted;
    let chunk = '';
    let pen_fg = -1;
    let pen_bg = -1;
    let next_x = -1;
    let next_y = -1;

    for (let y = 1; y <= this.grid_height; y++) {
      for (let x = 1; x <= this.grid_width; x++) {
        const idx = this.index_of(x, y);
        const cell = this.cells[idx];
        const prev = shown?.[idx];
        if (prev && prev.char === cell.char && prev.fg === cell.fg && prev.bg === cell.bg) continue;

        if (x !== next_x || y !== next_y) chunk += cursor_to(x, y);
        if (cell.fg !== pen_fg || cell.bg !== pen_bg) {
          chunk += sgr_colors(cell.fg, cell.bg);
          pen_fg = cell.fg;
          pen_bg = cell.bg;
        }
        chunk += cell.char;
        next_x = x + 1;
        next_y = y;
      }
    }

    if (chunk.length > 0) {
      this.out.write(chunk + RESET_ATTRS);
    }
    this.painted = this.cells.map((c) => ({ char: c.char, fg: c.fg, bg: c.bg }));
    super.flush();
  }

  private sync_size(): void {
    const width = this.fixed.width ?? this.out.columns ?? this.grid_width;
    const height = this.fixed.height ?? this.out.rows ?? this.grid_height;
    if (width !== this.grid_width || height !== this.grid_height) {
      this.resize(width, height);
      this.painted = null;
    }
  }
}
