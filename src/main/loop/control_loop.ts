/**
 * Input dispatcher and main loop.
 *
 * One logical loop: wait for input (or the poll interval), then either
 * redraw on a timeout, dispatch a click through the current frame's hit
 * regions, or stop on an interrupt. Every peripheral call is awaited in
 * sequence, so actuator mutations never interleave. Shutdown of the
 * outputs and clearing of the display run however the loop ends.
 *
 * @module loop/control_loop
 */

import type { ActuatorController } from '../control/actuator_controller';
import type { StatusBoard } from '../control/status_board';
import type { SamplerHistories, TelemetrySampler } from '../control/telemetry_sampler';
import type { Clock, DisplaySurface, InputSource } from '../peripherals/types';
import { apply_draw_commands } from '../render/apply';
import type { ButtonRegion, Palette, PanelCommand } from '../render/draw_types';
import { hit_test } from '../render/hit_test';
import { render_panel } from '../render/panel_renderer';
import type { RenderedFrame } from '../render/panel_renderer';

/** Default wait for input before the panel refreshes on its own. */
export const DEFAULT_POLL_INTERVAL_MS = 300;

export interface ControlLoopDeps {
  display: DisplaySurface;
  input: InputSource;
  controller: ActuatorController;
  sampler: TelemetrySampler;
  histories: SamplerHistories;
  status: StatusBoard;
  clock: Clock;
  palette: Palette;
  poll_interval_ms?: number;
}

export class ControlLoop {
  private readonly deps: ControlLoopDeps;
  private readonly poll_interval_ms: number;
  private regions: ButtonRegion[] = [];
  private stop_requested = false;
  private frames = 0;

  constructor(deps: ControlLoopDeps) {
    this.deps = deps;
    this.poll_interval_ms = deps.poll_interval_ms ?? DEFAULT_POLL_INTERVAL_MS;
  }

  /**
   * Run until the exit button, an interrupt or {@link stop}.
   *
   * @throws Whatever escapes an iteration (a bus write on a dead link),
   *   after the outputs have been shut down.
   */
  async run(): Promise<void> {
    const { controller, input } = this.deps;
    this.stop_requested = false;

    try {
      controller.push_outputs();
      await this.draw();

      while (!this.stop_requested) {
        const event = await input.poll(this.poll_interval_ms);
        switch (event.type) {
          case 'timeout':
            await this.draw();
            break;
          case 'pointer':
            await this.handle_pointer(event.x, event.y);
            break;
          case 'interrupt':
            this.stop();
            break;
        }
      }
    } finally {
      try {
        controller.shutdown();
      } finally {
        this.clear_display();
      }
    }
  }

  /** Ask the loop to finish after the current iteration. */
  stop(): void {
    this.stop_requested = true;
  }

  is_stopping(): boolean {
    return this.stop_requested;
  }

  /** Frames drawn since construction. */
  get frame_count(): number {
    return this.frames;
  }

  /** Hit regions of the most recent frame. */
  get_regions(): readonly ButtonRegion[] {
    return this.regions;
  }

  /**
   * Refresh telemetry, apply the interlock and draw one frame.
   *
   * Energy is read once and the same reading drives the bar, the ignite
   * button and the interlock.
   */
  async draw(): Promise<RenderedFrame> {
    const { display, controller, sampler, histories, status, clock, palette } = this.deps;

    const energy = await sampler.read_energy();
    controller.enforce_interlock(energy.ready);
    const reactor = await sampler.sample();
    const reactor_status = await sampler.read_status();

    const { width, height } = display.resolution();
    const frame = render_panel({
      width,
      height,
      actuators: controller.get_state(),
      energy,
      reactor,
      reactor_status,
      power_history: histories.power.snapshot(),
      heat_history: histories.heat.snapshot(),
      status_text: status.visible_text(clock.now_ms()),
      palette
    });

    apply_draw_commands(display, frame.commands);
    display.flush();
    this.regions = frame.regions;
    this.frames++;
    return frame;
  }

  /**
   * Dispatch a click at (x, y). A hit on an enabled region runs its
   * action; any hit redraws. Clicks outside every region do nothing.
   *
   * @returns The region hit, or null.
   */
  async handle_pointer(x: number, y: number): Promise<ButtonRegion | null> {
    const region = hit_test(this.regions, x, y);
    if (!region) {
      return null;
    }
    if (region.enabled) {
      await this.invoke(region.action);
    }
    await this.draw();
    return region;
  }

  private async invoke(action: PanelCommand): Promise<void> {
    const { controller, sampler } = this.deps;
    switch (action) {
      case 'exit':
        this.stop();
        break;
      case 'charge':
        controller.toggle_charging();
        break;
      case 'fuel':
        controller.toggle_fuel();
        break;
      case 'cavity':
        controller.toggle_cavity();
        break;
      case 'ignite': {
        const energy = await sampler.read_energy();
        await controller.try_ignite(energy.ready);
        break;
      }
    }
  }

  private clear_display(): void {
    const { display, palette } = this.deps;
    const { width, height } = display.resolution();
    display.set_foreground(palette.foreground);
    display.set_background(palette.background);
    display.fill(1, 1, width, height, ' ');
    display.flush();
  }
}
