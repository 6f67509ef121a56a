/**
 * In-memory character grid.
 *
 * Implements {@link DisplaySurface} over a flat array of cells. Writes
 * outside the grid are clipped cell by cell. `flush()` only counts frames
 * here; {@link TerminalScreen} overrides it to paint a terminal.
 *
 * @module display/cell_grid
 */

import type { DisplaySurface, Resolution } from '../peripherals/types';

export interface Cell {
  char: string;
  fg: number;
  bg: number;
}

export const DEFAULT_FG = 0xFFFFFF;
export const DEFAULT_BG = 0x000000;

function blank_cell(): Cell {
  return { char: ' ', fg: DEFAULT_FG, bg: DEFAULT_BG };
}

export class CellGrid implements DisplaySurface {
  protected grid_width: number;
  protected grid_height: number;
  protected cells: Cell[];
  private fg = DEFAULT_FG;
  private bg = DEFAULT_BG;
  private frames = 0;

  constructor(width: number, height: number) {
    this.grid_width = Math.max(0, Math.floor(width));
    this.grid_height = Math.max(0, Math.floor(height));
    this.cells = CellGrid.blank(this.grid_width, this.grid_height);
  }

  resolution(): Resolution {
    return { width: this.grid_width, height: this.grid_height };
  }

  set_foreground(color: number): void {
    this.fg = color;
  }

  set_background(color: number): void {
    this.bg = color;
  }

  fill(x: number, y: number, width: number, height: number, char: string): void {
    const glyph = Array.from(char)[0] ?? ' ';
    for (let row = y; row < y + height; row++) {
      for (let col = x; col < x + width; col++) {
        this.put(col, row, glyph);
      }
    }
  }

  write(x: number, y: number, text: string): void {
    let col = x;
    for (const glyph of text) {
      this.put(col, y, glyph);
      col++;
    }
  }

  flush(): void {
    this.frames++;
  }

  /** Number of flushes so far. */
  get frame_count(): number {
    return this.frames;
  }

  /** Copy of the cell at (x, y), or null off-grid. */
  cell_at(x: number, y: number): Cell | null {
    const idx = this.index_of(x, y);
    if (idx < 0) return null;
    const cell = this.cells[idx];
    return { char: cell.char, fg: cell.fg, bg: cell.bg };
  }

  /** Characters of row y, or '' off-grid. */
  row_text(y: number): string {
    if (y < 1 || y > this.grid_height) return '';
    const start = (y - 1) * this.grid_width;
    return this.cells.slice(start, start + this.grid_width).map((c) => c.char).join('');
  }

  /** Change the grid size. Contents are discarded. */
  resize(width: number, height: number): void {
    this.grid_width = Math.max(0, Math.floor(width));
    this.grid_height = Math.max(0, Math.floor(height));
    this.cells = CellGrid.blank(this.grid_width, this.grid_height);
  }

  private put(x: number, y: number, char: string): void {
    const idx = this.index_of(x, y);
    if (idx < 0) return;
    this.cells[idx] = { char, fg: this.fg, bg: this.bg };
  }

  protected index_of(x: number, y: number): number {
    if (!Number.isInteger(x) || !Number.isInteger(y)) return -1;
    if (x < 1 || x > this.grid_width || y < 1 || y > this.grid_height) return -1;
    return (y - 1) * this.grid_width + (x - 1);
  }

  private static blank(width: number, height: number): Cell[] {
    return Array.from({ length: width * height }, blank_cell);
  }
}
