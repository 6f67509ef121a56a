import { describe, it, expect } from 'vitest';
import { LinkBus, LinkEnergySensor, LinkReactorSensor } from '../link_peripherals';
import { LinkTelemetry, LinkFault } from '../../store/link_telemetry';
import { parse_packet } from '../../protocol/parser';
import { build_set_channel } from '../../protocol/command_builder';
import type { PacketSender } from '../../transport/io_link';
import { build_telem_frame } from '../../../../test/fixtures/frames';
import type { TelemFrameOptions } from '../../../../test/fixtures/frames';
import { FakeClock } from '../../../../test/fixtures/fakes';

class RecordingSender implements PacketSender {
  readonly sent: Uint8Array[] = [];

  send(data: Uint8Array): void {
    this.sent.push(data);
  }
}

function feed(telemetry: LinkTelemetry, opts: TelemFrameOptions, now_ms: number): void {
  const result = parse_packet(build_telem_frame(opts));
  if (!result.ok || result.message.type !== 'telem') throw new Error('bad fixture');
  telemetry.update_from_telem(result.message.data, now_ms);
}

describe('LinkBus', () => {
  it('sends one MSG_SET_CHANNEL per write', () => {
    const sender = new RecordingSender();
    const bus = new LinkBus(sender);

    bus.set_channel(2, 4, 255);
    bus.set_channel(2, 4, 0);

    expect(sender.sent.map((p) => Array.from(p))).toEqual([
      Array.from(build_set_channel(2, 4, 255)),
      Array.from(build_set_channel(2, 4, 0))
    ]);
  });

  it('propagates a send failure', () => {
    const bus = new LinkBus({
      send: () => {
        throw new Error('IoLink: not connected');
      }
    });
    expect(() => bus.set_channel(2, 1, 255)).toThrow('IoLink: not connected');
  });
});

describe('LinkEnergySensor', () => {
  it('reads energy from fresh telemetry', async () => {
    const clock = new FakeClock(5_000);
    const telemetry = new LinkTelemetry(1_000);
    feed(telemetry, { energy_eu: 1_250_000_000 }, 4_500);

    await expect(new LinkEnergySensor(telemetry, clock).get_energy()).resolves.toBe(1_250_000_000);
  });

  it('rejects once the telemetry is stale', async () => {
    const clock = new FakeClock(5_000);
    const telemetry = new LinkTelemetry(1_000);
    feed(telemetry, { energy_eu: 1 }, 3_000);

    await expect(new LinkEnergySensor(telemetry, clock).get_energy()).rejects.toBeInstanceOf(LinkFault);
  });
});

describe('LinkReactorSensor', () => {
  it('serves every reactor reading', async () => {
    const clock = new FakeClock(1_000);
    const telemetry = new LinkTelemetry(1_000);
    feed(telemetry, { plasma_heat_k: 300, production: 64, ignited: false, can_ignite: true }, 1_000);
    const reactor = new LinkReactorSensor(telemetry, clock);

    await expect(reactor.get_plasma_heat()).resolves.toBe(300);
    await expect(reactor.get_production()).resolves.toBe(64);
    await expect(reactor.is_ignited()).resolves.toBe(false);
    await expect(reactor.can_ignite()).resolves.toBe(true);
  });

  it('fails a faulted field independently', async () => {
    const clock = new FakeClock(1_000);
    const telemetry = new LinkTelemetry(1_000);
    feed(telemetry, { production_fault: true, plasma_heat_k: 300 }, 1_000);
    const reactor = new LinkReactorSensor(telemetry, clock);

    await expect(reactor.get_production()).rejects.toThrow('production: controller reported a read fault');
    await expect(reactor.get_plasma_heat()).resolves.toBe(300);
  });
});
