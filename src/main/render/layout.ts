/**
 * Panel geometry as a pure function of the surface size.
 *
 * Bands, top to bottom: title + rule, laser frame, control frame, power
 * history, heat history, status line. The two history panels share what
 * is left between the control frame and the status line.
 *
 * @module render/layout
 */

import type { Rect } from './draw_types';

export const BUTTON_WIDTH = 12;
export const BUTTON_GAP = 2;

/** Label of the title-bar exit button; its width sizes the button. */
export const EXIT_LABEL = '[ X ]';

const LASER_FRAME_TOP = 4;
const LASER_FRAME_ROWS = 4;
const CONTROL_FRAME_ROWS = 3;
const MIN_GRAPH_SPAN = 6;

export interface PanelLayout {
  width: number;
  height: number;
  exit_button: Rect;
  laser_frame: Rect;
  control_frame: Rect;
  power_frame: Rect;
  heat_frame: Rect;
  /** Left and right interior columns shared by every frame. */
  inner_x1: number;
  inner_x2: number;
  laser_text_row: number;
  charge_button: Rect;
  ignite_button: Rect;
  fuel_button: Rect;
  cavity_button: Rect;
  can_ignite_indicator: Rect;
  ignited_indicator: Rect;
  status_row: number;
}

/** A one-row, button-wide rectangle starting at x. */
function cell_row(x: number, y: number): Rect {
  return { x1: x, y1: y, x2: x + BUTTON_WIDTH - 1, y2: y };
}

export function compute_layout(width: number, height: number): PanelLayout {
  const frame_x1 = 2;
  const frame_x2 = width - 1;
  const inner_x1 = frame_x1 + 1;
  const inner_x2 = frame_x2 - 1;

  const laser_frame: Rect = {
    x1: frame_x1,
    y1: LASER_FRAME_TOP,
    x2: frame_x2,
    y2: LASER_FRAME_TOP + LASER_FRAME_ROWS - 1
  };
  const control_frame: Rect = {
    x1: frame_x1,
    y1: laser_frame.y2 + 1,
    x2: frame_x2,
    y2: laser_frame.y2 + CONTROL_FRAME_ROWS
  };

  const graphs_top = control_frame.y2 + 1;
  let graphs_bottom = height - 1;
  if (graphs_bottom - graphs_top < MIN_GRAPH_SPAN) {
    graphs_bottom = Math.min(graphs_top + MIN_GRAPH_SPAN, height - 1);
  }
  const graphs_split = Math.floor((graphs_top + graphs_bottom) / 2);

  const control_row = control_frame.y1 + 1;
  const ignite_button = cell_row(inner_x1, control_row);
  const fuel_button = cell_row(ignite_button.x2 + BUTTON_GAP + 1, control_row);
  const cavity_button = cell_row(fuel_button.x2 + BUTTON_GAP + 1, control_row);

  const indicators_x1 = inner_x2 - (2 * BUTTON_WIDTH + BUTTON_GAP) + 1;
  const can_ignite_indicator = cell_row(indicators_x1, control_row);
  const ignited_indicator = cell_row(indicators_x1 + BUTTON_WIDTH + BUTTON_GAP, control_row);

  return {
    width,
    height,
    exit_button: { x1: width - EXIT_LABEL.length + 1, y1: 1, x2: width, y2: 1 },
    laser_frame,
    control_frame,
    power_frame: { x1: frame_x1, y1: graphs_top, x2: frame_x2, y2: graphs_split },
    heat_frame: { x1: frame_x1, y1: graphs_split + 1, x2: frame_x2, y2: graphs_bottom },
    inner_x1,
    inner_x2,
    laser_text_row: laser_frame.y1 + 1,
    charge_button: cell_row(inner_x1, laser_frame.y1 + 2),
    ignite_button,
    fuel_button,
    cavity_button,
    can_ignite_indicator,
    ignited_indicator,
    status_row: height
  };
}
