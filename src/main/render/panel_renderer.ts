/**
 * Full-panel renderer.
 *
 * `render_panel` is a pure function of the view: it returns the frame's
 * draw commands together with the clickable regions of that same frame.
 * Callers must replace their region set with every frame they draw.
 *
 * @module render/panel_renderer
 */

import type { ActuatorState } from '../control/actuator_types';
import type { EnergyReading, ReactorSample, ReactorStatus } from '../control/telemetry_sampler';
import { format_energy, format_temperature } from '../control/units';
import { draw_graph } from './bar_chart';
import type { ButtonRegion, DrawCommand, Palette, PanelCommand, Rect } from './draw_types';
import { INK_ON_LIT, rect_width } from './draw_types';
import { compute_layout } from './layout';
import type { PanelLayout } from './layout';
import { draw_button, draw_frame, draw_indicator, fill_cmd, text_cmd } from './widgets';
import type { ButtonStyle } from './widgets';

export const PANEL_TITLE = 'Reactor Control';
export const NO_REACTOR_TEXT = 'No reactor adapter found';

const BAR_CHAR = '█';

/** Everything one frame depends on. */
export interface PanelView {
  width: number;
  height: number;
  actuators: ActuatorState;
  energy: EnergyReading;
  /** null when no reactor adapter is installed. */
  reactor: ReactorSample | null;
  reactor_status: ReactorStatus | null;
  power_history: readonly number[];
  heat_history: readonly number[];
  /** Status line text, already filtered for expiry. */
  status_text: string | null;
  palette: Palette;
}

export interface RenderedFrame {
  layout: PanelLayout;
  commands: DrawCommand[];
  regions: ButtonRegion[];
}

/** Lit when on, dark otherwise. */
function toggle_style(on: boolean, palette: Palette): ButtonStyle {
  return on
    ? { enabled: true, fg: INK_ON_LIT, bg: palette.active }
    : { enabled: true, fg: palette.foreground, bg: palette.inactive };
}

export function energy_label(energy: EnergyReading): string {
  return `Laser energy: ${format_energy(energy.energy_eu)} / ${format_energy(energy.threshold_eu)}`;
}

export function render_panel(view: PanelView): RenderedFrame {
  const { width, height, palette } = view;
  const layout = compute_layout(width, height);
  const out: DrawCommand[] = [];
  const regions: ButtonRegion[] = [];
  const fg = palette.foreground;
  const bg = palette.background;

  const button = (action: PanelCommand, bounds: Rect, label: string, style: ButtonStyle): void => {
    regions.push({ name: label, action, bounds, enabled: style.enabled });
    draw_button(out, bounds, label, style, palette);
  };

  out.push(fill_cmd(1, 1, width, height, ' ', fg, bg));

  // Title bar
  out.push(text_cmd(2, 1, PANEL_TITLE, fg, bg));
  out.push(text_cmd(2, 2, '─'.repeat(Math.max(0, width - 4)), fg, bg));
  button('exit', layout.exit_button, 'X', { enabled: true, fg: palette.foreground, bg: palette.warn });

  draw_frame(out, layout.laser_frame, 'Laser', palette);
  draw_frame(out, layout.control_frame, 'Reactor Control', palette);
  draw_frame(out, layout.power_frame, 'Power History', palette);
  draw_frame(out, layout.heat_frame, 'Heat History', palette);

  // Laser frame: label, charge bar, charge button
  const { energy } = view;
  const label = energy_label(energy);
  const row = layout.laser_text_row;
  out.push(text_cmd(layout.inner_x1, row, label, fg, bg));

  const bar_x = layout.inner_x1 + label.length + 2;
  if (bar_x < layout.inner_x2) {
    const bar_w = layout.inner_x2 - bar_x + 1;
    const filled = Math.floor(bar_w * energy.fill_ratio + 0.5);
    if (filled > 0) {
      out.push(fill_cmd(bar_x, row, filled, 1, BAR_CHAR, energy.ready ? palette.active : palette.warn, bg));
    }
  }

  button('charge', layout.charge_button, 'Charge', toggle_style(view.actuators.charging, palette));

  // Control frame: indicators right, buttons left
  const status = view.reactor_status;
  draw_indicator(out, layout.can_ignite_indicator, 'Can Ignite', status?.can_ignite ?? null,
    { on: palette.active, off: palette.inactive }, palette);
  draw_indicator(out, layout.ignited_indicator, 'Ignited', status?.ignited ?? null,
    { on: palette.active, off: palette.warn }, palette);

  button('ignite', layout.ignite_button, 'Ignite',
    energy.ready ? { enabled: true, fg: INK_ON_LIT, bg: palette.ready } : { enabled: false });
  button('fuel', layout.fuel_button, 'Fuel', toggle_style(view.actuators.fuel_open, palette));
  button('cavity', layout.cavity_button, 'Cavity', toggle_style(view.actuators.cavity_open, palette));

  // History graphs
  const power_inner = inset(layout.power_frame);
  const heat_inner = inset(layout.heat_frame);
  if (view.reactor) {
    draw_graph(out, power_inner, {
      samples: view.power_history,
      label: '',
      value_text: format_energy(view.reactor.production),
      color: palette.graph_power
    }, palette);
    draw_graph(out, heat_inner, {
      samples: view.heat_history,
      label: '',
      value_text: format_temperature(view.reactor.plasma_heat),
      color: palette.graph_heat
    }, palette);
  } else {
    const area: Rect = { x1: power_inner.x1, y1: power_inner.y1, x2: heat_inner.x2, y2: heat_inner.y2 };
    const area_h = area.y2 - area.y1 + 1;
    if (rect_width(area) > 0 && area_h > 0) {
      out.push(fill_cmd(area.x1, area.y1, rect_width(area), area_h, ' ', fg, bg));
      out.push(text_cmd(area.x1, area.y1, NO_REACTOR_TEXT, fg, bg));
    }
  }

  // Status line
  if (view.status_text) {
    out.push(text_cmd(2, layout.status_row, view.status_text, fg, bg));
  }

  return { layout, commands: out, regions };
}

function inset(r: Rect): Rect {
  return { x1: r.x1 + 1, y1: r.y1 + 1, x2: r.x2 - 1, y2: r.y2 - 1 };
}
