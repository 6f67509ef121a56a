#!/usr/bin/env node
import { IoLink } from './transport/io_link'
import { scan_ports } from './transport/port_scanner'
import { parse_packet } from './protocol/parser'
import { LinkTelemetry } from './store/link_telemetry'
import { ConfigError, USAGE, load_options, threshold_eu } from './config/config'
import type { LoadedOptions } from './config/config'
import { MissingCapabilityError, link_candidates, resolve_peripherals, wait_for_capabilities } from './peripherals/discovery'
import { system_clock } from './peripherals/types'
import type { Clock, PeripheralSet } from './peripherals/types'
import { TerminalScreen } from './display/terminal_screen'
import { TerminalInput } from './input/terminal_input'
import { HistoryBuffer } from './control/history_buffer'
import { StatusBoard } from './control/status_board'
import { TelemetrySampler } from './control/telemetry_sampler'
import { ActuatorController } from './control/actuator_controller'
import type { ActuatorPhase } from './control/actuator_types'
import { ControlLoop } from './loop/control_loop'

export const EXIT_OK = 0
export const EXIT_MISSING_CAPABILITY = 1
export const EXIT_CONFIG = 2

function describe_error(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

// ---------------------------------------------------------------------------
// Link pipeline wiring
// ---------------------------------------------------------------------------

/**
 * Wire link frames through the protocol parser into the telemetry cache.
 * Frames arrive COBS-decoded with msg_id as byte 0.
 */
export function wire_link_pipeline(link: IoLink, telemetry: LinkTelemetry, clock: Clock): void {
  link.on('frame', (frame: Uint8Array) => {
    if (frame.length < 1) return

    const result = parse_packet(frame)
    if (!result.ok) return

    const msg = result.message
    switch (msg.type) {
      case 'telem':
        telemetry.update_from_telem(msg.data, clock.now_ms())
        break
      case 'set_channel':
        // Controllers in loopback mode echo our writes; they carry no telemetry.
        break
    }
  })
}

/** Count ignition pulses for the shutdown summary. */
export function count_ignitions(controller: ActuatorController): () => number {
  let pulses = 0
  controller.on('phase_change', (phase: ActuatorPhase) => {
    if (phase === 'igniting') pulses++
  })
  return () => pulses
}

/** Flush pending bus writes, then close the port. */
async function close_link(link: IoLink | null): Promise<void> {
  if (!link) return
  try {
    await link.drain()
  } catch (err) {
    console.warn(`[LINK] ${describe_error(err)}`)
  } finally {
    link.disconnect()
  }
}

async function list_ports(): Promise<void> {
  const ports = await scan_ports()
  if (ports.length === 0) {
    console.log('[LINK] no serial ports found')
    return
  }
  for (const port of ports) {
    console.log(port.label)
  }
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

export async function main(argv: readonly string[], env: NodeJS.ProcessEnv): Promise<number> {
  let options: LoadedOptions
  try {
    options = load_options(argv, env)
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[CONFIG] ${err.message}`)
      return EXIT_CONFIG
    }
    throw err
  }

  if (options.help) {
    console.log(USAGE)
    return EXIT_OK
  }
  if (options.list_ports) {
    await list_ports()
    return EXIT_OK
  }

  const { config } = options
  const clock = system_clock

  // 1. Link and telemetry cache
  const telemetry = new LinkTelemetry(config.link.stale_after_ms)
  const status = new StatusBoard(() => clock.now_ms(), config.loop.status_ttl_ms)
  const link = new IoLink()
  let panel_active = false

  // Before the panel owns the terminal, link trouble goes to stderr.
  const report_link = (text: string): void => {
    if (panel_active) {
      status.post(text)
    } else {
      console.error(`[LINK] ${text}`)
    }
  }

  wire_link_pipeline(link, telemetry, clock)
  link.on('error', (err: Error) => report_link(err.message))
  link.on('close', () => {
    telemetry.set_connected(false)
    report_link('Link closed.')
  })

  let opened: IoLink | null = null
  const port_path = config.link.path
  if (port_path) {
    try {
      await link.connect(port_path, config.link.baud_rate)
      telemetry.set_connected(true)
      opened = link
      console.log(`[LINK] connected to ${port_path} at ${config.link.baud_rate} baud`)
    } catch (err) {
      console.error(`[LINK] ${describe_error(err)}`)
    }
  } else {
    console.warn('[LINK] no serial port configured (--port or PANEL_PORT)')
  }

  // 2. Discovery
  const capabilities = opened
    ? await wait_for_capabilities(telemetry, config.link.discovery_timeout_ms)
    : null
  if (opened && !capabilities) {
    console.warn(`[LINK] no telemetry within ${config.link.discovery_timeout_ms} ms`)
  }

  const screen = process.stdout.isTTY ? new TerminalScreen(process.stdout, config.display) : null

  let peripherals: PeripheralSet
  try {
    peripherals = resolve_peripherals({
      display: screen,
      ...link_candidates(opened, telemetry, capabilities, clock)
    })
  } catch (err) {
    if (err instanceof MissingCapabilityError) {
      console.error(err.message)
      await close_link(opened)
      return EXIT_MISSING_CAPABILITY
    }
    throw err
  }

  if (!peripherals.reactor) {
    console.warn('[MAIN] reactor adapter not found, history graphs disabled')
  }

  // 3. Control core
  const histories = {
    power: new HistoryBuffer(config.history.capacity),
    heat: new HistoryBuffer(config.history.capacity)
  }
  const sampler = new TelemetrySampler(peripherals.energy, peripherals.reactor, histories, threshold_eu(config))
  const controller = new ActuatorController({
    bus: peripherals.bus,
    wiring: { side: config.bus.side, channels: config.bus.channels },
    clock,
    status,
    pulse_ms: config.loop.pulse_ms
  })
  const ignitions = count_ignitions(controller)
  const input = new TerminalInput(process.stdin, process.stdout)
  const loop = new ControlLoop({
    display: peripherals.display,
    input,
    controller,
    sampler,
    histories,
    status,
    clock,
    palette: config.palette,
    poll_interval_ms: config.loop.poll_interval_ms
  })

  // 4. Run
  const on_signal = (): void => input.interrupt()
  process.on('SIGINT', on_signal)
  process.on('SIGTERM', on_signal)

  screen?.open()
  input.start()
  panel_active = true
  try {
    await loop.run()
  } finally {
    panel_active = false
    input.stop()
    screen?.close()
    process.off('SIGINT', on_signal)
    process.off('SIGTERM', on_signal)
    await close_link(opened)
  }

  console.log(`[MAIN] outputs off, panel closed after ${ignitions()} ignition pulse(s)`)
  return EXIT_OK
}

if (require.main === module) {
  main(process.argv.slice(2), process.env)
    .then((code) => {
      process.exitCode = code
    })
    .catch((err: unknown) => {
      console.error('[MAIN] fatal:', err instanceof Error ? err.stack ?? err.message : err)
      process.exitCode = 1
    })
}
