/**
 * Draw command, region and palette types shared by the render engine.
 *
 * @module render/draw_types
 */

// ---------------------------------------------------------------------------
// Geometry
// ---------------------------------------------------------------------------

/** Inclusive cell rectangle, 1-based. */
export interface Rect {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export function rect_width(r: Rect): number {
  return r.x2 - r.x1 + 1;
}

export function rect_height(r: Rect): number {
  return r.y2 - r.y1 + 1;
}

// ---------------------------------------------------------------------------
// Draw commands
// ---------------------------------------------------------------------------

/** One surface operation with its colors resolved. */
export type DrawCommand =
  | { kind: 'fill'; x: number; y: number; width: number; height: number; char: string; fg: number; bg: number }
  | { kind: 'text'; x: number; y: number; text: string; fg: number; bg: number };

// ---------------------------------------------------------------------------
// Hit regions
// ---------------------------------------------------------------------------

/** What a button does when clicked. */
export type PanelCommand = 'exit' | 'charge' | 'ignite' | 'fuel' | 'cavity';

/** Clickable area of the current frame. Rebuilt on every render. */
export interface ButtonRegion {
  /** Button label, for diagnostics. */
  name: string;
  action: PanelCommand;
  bounds: Rect;
  enabled: boolean;
}

// ---------------------------------------------------------------------------
// Palette
// ---------------------------------------------------------------------------

/** 24-bit RGB colors used by the panel. */
export interface Palette {
  /** Lit button / indicator. */
  active: number;
  /** Unlit button, disabled button, unknown indicator. */
  inactive: number;
  /** Exit button, insufficient-energy bar, "not ignited". */
  warn: number;
  /** Ignite button when energy is ready. */
  ready: number;
  background: number;
  foreground: number;
  graph_power: number;
  graph_heat: number;
}

export const DEFAULT_PALETTE: Readonly<Palette> = Object.freeze({
  active: 0x00CC00,
  inactive: 0x333333,
  warn: 0xCC0000,
  ready: 0x00CCCC,
  background: 0x000000,
  foreground: 0xFFFFFF,
  graph_power: 0x00A0FF,
  graph_heat: 0xFF8000
});

/** Text on lit buttons and indicators. */
export const INK_ON_LIT = 0x000000;

/** Text on disabled buttons and unknown indicators. */
export const DISABLED_TEXT = 0xAAAAAA;

/** Face of an enabled button when the caller names no color. */
export const BUTTON_FACE = 0x444444;
