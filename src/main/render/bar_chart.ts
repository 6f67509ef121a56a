/**
 * Auto-scaled history bar chart.
 *
 * The history is split into one contiguous bucket per column and each
 * column shows its bucket's maximum (max-pooling), scaled against the
 * maximum of the whole history. Spikes survive downsampling.
 *
 * @module render/bar_chart
 */

import type { DrawCommand, Palette, Rect } from './draw_types';
import { rect_height, rect_width } from './draw_types';
import { fill_cmd, text_cmd } from './widgets';

const BAR_CHAR = '█';

/**
 * Column heights for a history drawn `width` columns wide.
 *
 * Column `c` covers samples `floor(c*n/width) .. floor((c+1)*n/width) - 1`
 * (at least one sample); columns whose bucket starts past the end are
 * omitted.
 *
 * @returns Heights in cells, one per drawn column; empty when there is
 *   nothing to scale against.
 */
export function compute_bar_columns(samples: readonly number[], width: number, usable_height: number): number[] {
  const n = samples.length;
  if (n === 0 || width <= 0) return [];

  let global_max = 0;
  for (const v of samples) {
    if (v > global_max) global_max = v;
  }
  if (global_max <= 0) return [];

  const heights: number[] = [];
  for (let col = 0; col < width; col++) {
    const from = Math.floor((col * n) / width);
    if (from > n - 1) break;
    const to = Math.min(n - 1, Math.max(from, Math.floor(((col + 1) * n) / width) - 1));

    let col_max = 0;
    for (let i = from; i <= to; i++) {
      if (samples[i] > col_max) col_max = samples[i];
    }

    const ratio = Math.min(1, Math.max(0, col_max / global_max));
    heights.push(Math.floor(ratio * usable_height + 0.5));
  }
  return heights;
}

export interface GraphSpec {
  samples: readonly number[];
  /** Left-aligned caption on the top row; empty for none. */
  label: string;
  /** Right-aligned current value on the top row. */
  value_text: string;
  color: number;
}

/**
 * Draw a graph into the interior rectangle `r`. The top row carries the
 * caption and value; bars grow up from the bottom row. Areas of two rows
 * or fewer are skipped.
 */
export function draw_graph(out: DrawCommand[], r: Rect, graph: GraphSpec, palette: Palette): void {
  const w = rect_width(r);
  const h = rect_height(r);
  if (w <= 0 || h <= 2) return;

  const fg = palette.foreground;
  const bg = palette.background;

  out.push(fill_cmd(r.x1, r.y1, w, h, ' ', fg, bg));
  if (graph.label.length > 0) {
    out.push(text_cmd(r.x1, r.y1, graph.label, fg, bg));
  }
  if (graph.value_text.length > 0) {
    out.push(text_cmd(r.x1 + w - graph.value_text.length, r.y1, graph.value_text, fg, bg));
  }

  const heights = compute_bar_columns(graph.samples, w, Math.max(1, h - 2));
  heights.forEach((height, col) => {
    if (height > 0) {
      out.push(fill_cmd(r.x1 + col, r.y2 - height + 1, 1, height, BAR_CHAR, graph.color, bg));
    }
  });
}
