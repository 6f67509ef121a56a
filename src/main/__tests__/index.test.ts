import { describe, it, expect, vi } from 'vitest';

vi.mock('serialport', () => ({ SerialPort: class {} }));

import { count_ignitions, wire_link_pipeline } from '../index';
import { IoLink } from '../transport/io_link';
import { LinkTelemetry } from '../store/link_telemetry';
import { build_set_channel } from '../protocol/command_builder';
import { ActuatorController } from '../control/actuator_controller';
import { StatusBoard } from '../control/status_board';
import { build_telem_frame } from '../../../test/fixtures/frames';
import { FakeBus, FakeClock } from '../../../test/fixtures/fakes';

describe('wire_link_pipeline', () => {
  it('caches telemetry and ignores echoed channel writes', () => {
    const clock = new FakeClock(2_000);
    const link = new IoLink();
    const telemetry = new LinkTelemetry(1_000);
    wire_link_pipeline(link, telemetry, clock);

    link.emit('frame', build_telem_frame({ seq: 5, energy_eu: 300 }));
    link.emit('frame', build_set_channel(2, 1, 255));
    link.emit('frame', new Uint8Array([0x7F]));

    const snap = telemetry.get_snapshot();
    expect(snap.frames_ok).toBe(1);
    expect(snap.seq).toBe(5);
    expect(snap.energy_eu).toBe(300);
    expect(snap.last_valid_ms).toBe(2_000);
  });
});

describe('count_ignitions', () => {
  it('counts one per pulse', async () => {
    const clock = new FakeClock();
    const controller = new ActuatorController({
      bus: new FakeBus(),
      wiring: { side: 2, channels: { ignition: 4, charge: 1, fuel: 10, cavity: 12 } },
      clock,
      status: new StatusBoard(() => clock.now_ms())
    });
    const ignitions = count_ignitions(controller);

    controller.toggle_charging();
    await controller.try_ignite(false);
    expect(ignitions()).toBe(0);

    await controller.try_ignite(true);
    await controller.try_ignite(true);
    expect(ignitions()).toBe(2);
  });
});
