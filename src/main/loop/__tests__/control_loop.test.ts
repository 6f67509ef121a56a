import { describe, it, expect, beforeEach } from 'vitest';
import { ControlLoop, DEFAULT_POLL_INTERVAL_MS } from '../control_loop';
import { ActuatorController } from '../../control/actuator_controller';
import { HistoryBuffer } from '../../control/history_buffer';
import { StatusBoard } from '../../control/status_board';
import { TelemetrySampler } from '../../control/telemetry_sampler';
import type { SamplerHistories } from '../../control/telemetry_sampler';
import { CellGrid } from '../../display/cell_grid';
import { DEFAULT_PALETTE } from '../../render/draw_types';
import type { InputEvent, ReactorSensor } from '../../peripherals/types';
import {
  FakeBus,
  FakeClock,
  FakeEnergySensor,
  FakeInput,
  FakeReactorSensor
} from '../../../../test/fixtures/fakes';

const THRESHOLD = 10_000;
const WIRING = { side: 2, channels: { ignition: 4, charge: 1, fuel: 10, cavity: 12 } };

// Button centres on an 80x25 panel.
const EXIT = { x: 78, y: 1 };
const CHARGE = { x: 5, y: 6 };
const IGNITE = { x: 5, y: 9 };
const FUEL = { x: 20, y: 9 };

function click(at: { x: number; y: number }): InputEvent {
  return { type: 'pointer', x: at.x, y: at.y };
}

interface Rig {
  bus: FakeBus;
  clock: FakeClock;
  energy: FakeEnergySensor;
  display: CellGrid;
  histories: SamplerHistories;
  status: StatusBoard;
  controller: ActuatorController;
  input: FakeInput;
  loop: ControlLoop;
}

function make_rig(opts: { script?: InputEvent[]; reactor?: ReactorSensor | null; bus?: FakeBus } = {}): Rig {
  const bus = opts.bus ?? new FakeBus();
  const clock = new FakeClock();
  const energy = new FakeEnergySensor(0);
  const display = new CellGrid(80, 25);
  const histories = { power: new HistoryBuffer(400), heat: new HistoryBuffer(400) };
  const status = new StatusBoard(() => clock.now_ms());
  const reactor = opts.reactor === undefined ? new FakeReactorSensor() : opts.reactor;
  const sampler = new TelemetrySampler(energy, reactor, histories, THRESHOLD);
  const controller = new ActuatorController({ bus, wiring: WIRING, clock, status });
  const input = new FakeInput(opts.script ?? []);
  const loop = new ControlLoop({
    display,
    input,
    controller,
    sampler,
    histories,
    status,
    clock,
    palette: DEFAULT_PALETTE
  });
  return { bus, clock, energy, display, histories, status, controller, input, loop };
}

describe('ControlLoop', () => {
  let rig: Rig;

  beforeEach(() => {
    rig = make_rig();
  });

  // --- Lifecycle ------------------------------------------------------------

  it('pushes outputs, draws, and shuts down on interrupt', async () => {
    await rig.loop.run();

    expect(rig.loop.frame_count).toBe(1);
    expect(rig.bus.writes).toEqual([
      { side: 2, channel: 1, value: 0 },
      { side: 2, channel: 10, value: 0 },
      { side: 2, channel: 12, value: 0 },
      { side: 2, channel: 1, value: 0 },
      { side: 2, channel: 10, value: 0 },
      { side: 2, channel: 12, value: 0 },
      { side: 2, channel: 4, value: 0 }
    ]);
    // One frame, then the clearing flush.
    expect(rig.display.frame_count).toBe(2);
    expect(rig.display.row_text(1)).toBe(' '.repeat(80));
  });

  it('redraws on every timeout and waits the poll interval', async () => {
    rig = make_rig({ script: [{ type: 'timeout' }, { type: 'timeout' }] });
    await rig.loop.run();
    expect(rig.loop.frame_count).toBe(3);
    expect(rig.input.waits).toEqual([DEFAULT_POLL_INTERVAL_MS, DEFAULT_POLL_INTERVAL_MS, DEFAULT_POLL_INTERVAL_MS]);
  });

  it('stops on the exit button', async () => {
    rig = make_rig({ script: [click(EXIT), { type: 'timeout' }] });
    await rig.loop.run();
    expect(rig.loop.is_stopping()).toBe(true);
    expect(rig.input.waits).toHaveLength(1);
  });

  it('stops when asked from outside', async () => {
    rig.loop.stop();
    expect(rig.loop.is_stopping()).toBe(true);
  });

  it('shuts the outputs down when an iteration throws', async () => {
    class FailingFuelBus extends FakeBus {
      set_channel(side: number, channel: number, value: number): void {
        if (channel === 10 && value === 255) throw new Error('IoLink: not connected');
        super.set_channel(side, channel, value);
      }
    }
    rig = make_rig({ script: [click(FUEL)], bus: new FailingFuelBus() });

    await expect(rig.loop.run()).rejects.toThrow('IoLink: not connected');
    expect(rig.bus.writes.slice(-4)).toEqual([
      { side: 2, channel: 1, value: 0 },
      { side: 2, channel: 10, value: 0 },
      { side: 2, channel: 12, value: 0 },
      { side: 2, channel: 4, value: 0 }
    ]);
    expect(rig.display.row_text(1)).toBe(' '.repeat(80));
  });

  it('clears the display even when shutdown cannot reach the bus', async () => {
    class DeadAfterFailureBus extends FakeBus {
      dead = false;

      set_channel(side: number, channel: number, value: number): void {
        if (this.dead || (channel === 10 && value === 255)) {
          this.dead = true;
          throw new Error('IoLink: not connected');
        }
        super.set_channel(side, channel, value);
      }
    }
    const bus = new DeadAfterFailureBus();
    rig = make_rig({ script: [click(FUEL)], bus });

    await expect(rig.loop.run()).rejects.toThrow('IoLink: not connected');
    expect(bus.dead).toBe(true);
    expect(rig.display.row_text(1)).toBe(' '.repeat(80));
    // The first frame, then the clearing flush.
    expect(rig.display.frame_count).toBe(2);
  });

  // --- Dispatch -------------------------------------------------------------

  it('toggles fuel with one fuel-channel write and one redraw', async () => {
    await rig.loop.draw();
    rig.bus.clear();
    const frames = rig.loop.frame_count;

    const region = await rig.loop.handle_pointer(FUEL.x, FUEL.y);

    expect(region?.action).toBe('fuel');
    expect(rig.controller.get_state().fuel_open).toBe(true);
    expect(rig.bus.writes_to(10)).toEqual([255]);
    expect(rig.loop.frame_count).toBe(frames + 1);
    expect(rig.display.row_text(25)).toBe(' Fuel: ON' + ' '.repeat(71));
  });

  it('ignores clicks outside every button', async () => {
    await rig.loop.draw();
    rig.bus.clear();

    expect(await rig.loop.handle_pointer(60, 20)).toBeNull();
    expect(rig.bus.writes).toEqual([]);
    expect(rig.loop.frame_count).toBe(1);
  });

  it('swallows clicks on a disabled button but still redraws', async () => {
    rig.energy.energy = 5000;
    await rig.loop.draw();
    rig.bus.clear();

    const region = await rig.loop.handle_pointer(IGNITE.x, IGNITE.y);

    expect(region?.enabled).toBe(false);
    expect(rig.bus.writes).toEqual([]);
    expect(rig.clock.sleeps).toEqual([]);
    expect(rig.loop.frame_count).toBe(2);
  });

  it('replaces the regions with every frame', async () => {
    rig.energy.energy = 5000;
    await rig.loop.draw();
    expect(rig.loop.get_regions().find((r) => r.action === 'ignite')?.enabled).toBe(false);

    rig.energy.energy = 10_000;
    await rig.loop.draw();
    expect(rig.loop.get_regions().find((r) => r.action === 'ignite')?.enabled).toBe(true);
  });

  // --- Energy threshold -----------------------------------------------------

  it('shows half a bar and a disabled ignite button at 5,000 of 10,000 EU', async () => {
    rig.energy.energy = 5000;
    const frame = await rig.loop.draw();
    expect(frame.regions.find((r) => r.action === 'ignite')?.enabled).toBe(false);
    expect(rig.display.row_text(5)).toBe(
      ' │Laser energy: 5.00 KEU / 10.00 KEU  ' + '█'.repeat(20) + ' '.repeat(20) + '│ '
    );
  });

  it('re-reads energy when ignite is clicked', async () => {
    rig.energy.energy = 10_000;
    await rig.loop.draw();
    rig.bus.clear();

    // Energy drained between the frame and the click.
    rig.energy.energy = 5000;
    await rig.loop.handle_pointer(IGNITE.x, IGNITE.y);

    expect(rig.bus.writes).toEqual([]);
    expect(rig.clock.sleeps).toEqual([]);
    expect(rig.status.latest()?.text).toBe('Not enough energy.');
  });

  it('fires the ignition pulse when energy is ready', async () => {
    rig.energy.energy = 10_000;
    await rig.loop.draw();
    rig.bus.clear();

    await rig.loop.handle_pointer(IGNITE.x, IGNITE.y);

    expect(rig.bus.writes).toEqual([
      { side: 2, channel: 4, value: 255 },
      { side: 2, channel: 4, value: 0 }
    ]);
    expect(rig.clock.sleeps).toEqual([300]);
    expect(rig.display.row_text(25)).toBe(' Ignition triggered.' + ' '.repeat(60));
  });

  it('forces charging off in the first frame where energy is ready', async () => {
    rig.energy.energy = 2000;
    await rig.loop.draw();
    await rig.loop.handle_pointer(CHARGE.x, CHARGE.y);
    expect(rig.controller.get_state().charging).toBe(true);

    rig.energy.energy = 10_000;
    await rig.loop.draw();

    expect(rig.controller.get_state().charging).toBe(false);
    expect(rig.bus.writes.slice(-3)).toEqual([
      { side: 2, channel: 1, value: 0 },
      { side: 2, channel: 10, value: 0 },
      { side: 2, channel: 12, value: 0 }
    ]);
    expect(rig.display.row_text(25)).toBe(' Laser charged - charging OFF.' + ' '.repeat(50));
    expect(rig.display.cell_at(3, 6)?.bg).toBe(DEFAULT_PALETTE.inactive);
  });

  // --- Reactor --------------------------------------------------------------

  it('records one history sample per frame', async () => {
    await rig.loop.draw();
    await rig.loop.draw();
    expect(rig.histories.power.length).toBe(2);
    expect(rig.histories.heat.length).toBe(2);
  });

  it('shows the static message and keeps the histories empty without a reactor', async () => {
    rig = make_rig({ reactor: null, script: [{ type: 'timeout' }, { type: 'timeout' }] });
    await rig.loop.draw();
    expect(rig.display.row_text(12).startsWith(' │No reactor adapter found')).toBe(true);

    await rig.loop.run();
    expect(rig.histories.power.length).toBe(0);
    expect(rig.histories.heat.length).toBe(0);
  });
});
