/**
 * Panel widgets: frames, bracketed buttons and indicators.
 *
 * Widgets append draw commands to a list; nothing here touches a surface.
 *
 * @module render/widgets
 */

import type { DrawCommand, Palette, Rect } from './draw_types';
import { BUTTON_FACE, DISABLED_TEXT, INK_ON_LIT, rect_height, rect_width } from './draw_types';

export function fill_cmd(
  x: number,
  y: number,
  width: number,
  height: number,
  char: string,
  fg: number,
  bg: number
): DrawCommand {
  return { kind: 'fill', x, y, width, height, char, fg, bg };
}

export function text_cmd(x: number, y: number, text: string, fg: number, bg: number): DrawCommand {
  return { kind: 'text', x, y, text, fg, bg };
}

/** Center `label` in `width` cells: floor of the padding left, the rest right. */
export function center_pad(label: string, width: number): { left: number; right: number; label: string } {
  const fitted = label.length > width ? label.slice(0, width) : label;
  const pad = width - fitted.length;
  const left = Math.floor(pad / 2);
  return { left, right: pad - left, label: fitted };
}

/**
 * Box-drawing frame with an optional title set into the top edge.
 * Frames narrower than 2 columns or shorter than 2 rows are skipped.
 */
export function draw_frame(out: DrawCommand[], r: Rect, title: string, palette: Palette): void {
  const w = rect_width(r);
  if (w < 2 || r.y2 - r.y1 < 1) return;

  const fg = palette.foreground;
  const bg = palette.background;
  const edge = '─'.repeat(w - 2);

  out.push(text_cmd(r.x1, r.y1, `┌${edge}┐`, fg, bg));
  out.push(text_cmd(r.x1, r.y2, `└${edge}┘`, fg, bg));
  for (let y = r.y1 + 1; y < r.y2; y++) {
    out.push(text_cmd(r.x1, y, '│', fg, bg));
    out.push(text_cmd(r.x2, y, '│', fg, bg));
  }

  if (title.length > 0 && w > 4) {
    const framed = ` ${title} `;
    out.push(text_cmd(r.x1 + 2, r.y1, framed.slice(0, w - 4), fg, bg));
  }
}

export interface ButtonStyle {
  enabled: boolean;
  fg?: number;
  bg?: number;
}

/**
 * Solid button with brackets on its outer columns and the label centered
 * between them on the middle row. Disabled buttons always use the
 * disabled colors, whatever the style asks for.
 */
export function draw_button(
  out: DrawCommand[],
  r: Rect,
  label: string,
  style: ButtonStyle,
  palette: Palette
): void {
  const w = rect_width(r);
  if (w < 2) return;

  const inner = center_pad(label, w - 2);
  const display = `[${' '.repeat(inner.left)}${inner.label}${' '.repeat(inner.right)}]`;
  const cy = Math.floor((r.y1 + r.y2) / 2);

  const fg = style.enabled ? style.fg ?? palette.foreground : DISABLED_TEXT;
  const bg = style.enabled ? style.bg ?? BUTTON_FACE : palette.inactive;

  out.push(fill_cmd(r.x1, r.y1, w, rect_height(r), ' ', fg, bg));
  out.push(text_cmd(r.x1, cy, display, fg, bg));
}

/**
 * Bracketless status lamp. `state` null means unknown and renders in the
 * inactive colors.
 */
export function draw_indicator(
  out: DrawCommand[],
  r: Rect,
  label: string,
  state: boolean | null,
  colors: { on: number; off: number },
  palette: Palette
): void {
  const w = rect_width(r);
  if (w <= 0) return;

  let fg: number;
  let bg: number;
  if (state === null) {
    fg = DISABLED_TEXT;
    bg = palette.inactive;
  } else if (state) {
    fg = INK_ON_LIT;
    bg = colors.on;
  } else {
    fg = palette.foreground;
    bg = colors.off;
  }

  const inner = center_pad(label, w);
  const cy = Math.floor((r.y1 + r.y2) / 2);

  out.push(fill_cmd(r.x1, r.y1, w, rect_height(r), ' ', fg, bg));
  out.push(text_cmd(r.x1 + inner.left, cy, inner.label + ' '.repeat(inner.right), fg, bg));
}
