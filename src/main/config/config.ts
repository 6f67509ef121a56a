/**
 * Panel configuration: JSON file, environment and command-line flags,
 * validated by one zod schema that supplies a default for every option.
 *
 * Precedence, lowest first: schema defaults, config file
 * (`--config` or `PANEL_CONFIG`), `PANEL_PORT`, command-line flags.
 *
 * @module config/config
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import {
  DEFAULT_BAUD_RATE,
  DEFAULT_DISCOVERY_TIMEOUT_MS,
  DEFAULT_STALE_AFTER_MS,
  MAX_BUS_CHANNEL,
  MAX_BUS_SIDE
} from '../protocol/constants';
import { DEFAULT_HISTORY_CAPACITY } from '../control/history_buffer';
import { DEFAULT_STATUS_TTL_MS } from '../control/status_board';
import { DEFAULT_PULSE_MS } from '../control/actuator_controller';
import { DEFAULT_POLL_INTERVAL_MS } from '../loop/control_loop';
import { DEFAULT_PALETTE } from '../render/draw_types';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(issues.join('\n'));
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const COLOR_TEXT = /^(#|0x)([0-9a-fA-F]{6})$/;

/** "#RRGGBB" or "0xRRGGBB" to a 24-bit number. */
export function parse_color(text: string): number {
  const m = COLOR_TEXT.exec(text);
  if (!m) {
    throw new RangeError(`not a color: ${text}`);
  }
  return parseInt(m[2], 16);
}

const ColorSchema = z.union([
  z.number().int().min(0).max(0xFFFFFF),
  z.string().regex(COLOR_TEXT).transform(parse_color)
], {
  errorMap: () => ({ message: 'expected 0..0xFFFFFF, #RRGGBB or 0xRRGGBB' })
});

const ChannelSchema = z.number().int().min(0).max(MAX_BUS_CHANNEL);
const PositiveMs = z.number().int().positive();

export const PanelConfigSchema = z.object({
  link: z.object({
    path: z.string().min(1).optional(),
    baud_rate: z.number().int().positive().default(DEFAULT_BAUD_RATE),
    stale_after_ms: PositiveMs.default(DEFAULT_STALE_AFTER_MS),
    discovery_timeout_ms: PositiveMs.default(DEFAULT_DISCOVERY_TIMEOUT_MS)
  }).strict().default({}),

  bus: z.object({
    side: z.number().int().min(0).max(MAX_BUS_SIDE).default(2),
    channels: z.object({
      ignition: ChannelSchema.default(4),
      charge: ChannelSchema.default(1),
      fuel: ChannelSchema.default(10),
      cavity: ChannelSchema.default(12)
    }).strict().default({})
      .refine((c) => new Set([c.ignition, c.charge, c.fuel, c.cavity]).size === 4, {
        message: 'actuator channels must be distinct'
      })
  }).strict().default({}),

  energy: z.object({
    required_magnitude: z.number().nonnegative().default(125),
    units_per_magnitude: z.number().positive().default(10_000_000)
  }).strict().default({}),

  history: z.object({
    capacity: z.number().int().min(1).default(DEFAULT_HISTORY_CAPACITY)
  }).strict().default({}),

  loop: z.object({
    poll_interval_ms: PositiveMs.default(DEFAULT_POLL_INTERVAL_MS),
    pulse_ms: PositiveMs.default(DEFAULT_PULSE_MS),
    status_ttl_ms: PositiveMs.default(DEFAULT_STATUS_TTL_MS)
  }).strict().default({}),

  palette: z.object({
    active: ColorSchema.default(DEFAULT_PALETTE.active),
    inactive: ColorSchema.default(DEFAULT_PALETTE.inactive),
    warn: ColorSchema.default(DEFAULT_PALETTE.warn),
    ready: ColorSchema.default(DEFAULT_PALETTE.ready),
    background: ColorSchema.default(DEFAULT_PALETTE.background),
    foreground: ColorSchema.default(DEFAULT_PALETTE.foreground),
    graph_power: ColorSchema.default(DEFAULT_PALETTE.graph_power),
    graph_heat: ColorSchema.default(DEFAULT_PALETTE.graph_heat)
  }).strict().default({}),

  display: z.object({
    width: z.number().int().positive().optional(),
    height: z.number().int().positive().optional()
  }).strict().default({})
}).strict();

export type PanelConfig = z.infer<typeof PanelConfigSchema>;

/** Ignition threshold in EU. */
export function threshold_eu(config: PanelConfig): number {
  return config.energy.required_magnitude * config.energy.units_per_magnitude;
}

// ---------------------------------------------------------------------------
// Command line
// ---------------------------------------------------------------------------

export const USAGE = [
  'Usage: reactor-panel [options]',
  '',
  'Options:',
  '  --config <path>   JSON configuration file (env PANEL_CONFIG)',
  '  --port <path>     Serial port of the I/O controller (env PANEL_PORT)',
  '  --baud <rate>     Serial baud rate',
  '  --list-ports      Print available serial ports and exit',
  '  --help            Print this help and exit'
].join('\n');

export interface CliArgs {
  config_path?: string;
  port?: string;
  baud?: number;
  list_ports: boolean;
  help: boolean;
}

/** Accepts `--flag value` and `--flag=value`. */
export function parse_cli_args(argv: readonly string[]): CliArgs {
  const args: CliArgs = { list_ports: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    const eq = token.indexOf('=');
    const flag = eq >= 0 ? token.slice(0, eq) : token;
    const inline = eq >= 0 ? token.slice(eq + 1) : undefined;

    const value = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new ConfigError([`${flag}: missing value`]);
      }
      i++;
      return next;
    };

    switch (flag) {
      case '--config':
        args.config_path = value();
        break;
      case '--port':
        args.port = value();
        break;
      case '--baud':
        args.baud = Number(value());
        break;
      case '--list-ports':
        args.list_ports = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        throw new ConfigError([`${token}: unknown option`]);
    }
  }

  return args;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export interface LoadedOptions {
  config: PanelConfig;
  list_ports: boolean;
  help: boolean;
}

export type ReadTextFile = (path: string) => string;

function is_record(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function format_issue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

function read_config_file(path: string, read_file: ReadTextFile): unknown {
  let text: string;
  try {
    text = read_file(path);
  } catch (err) {
    throw new ConfigError([`${path}: ${err instanceof Error ? err.message : String(err)}`]);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigError([`${path}: invalid JSON (${err instanceof Error ? err.message : String(err)})`]);
  }
}

/** Validate an already-parsed configuration object. */
export function parse_config(raw: unknown): PanelConfig {
  const result = PanelConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(format_issue));
  }
  return result.data;
}

/**
 * Resolve the effective configuration.
 *
 * @throws {ConfigError} On a bad flag, an unreadable file or a value the
 *   schema rejects.
 */
export function load_options(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  read_file: ReadTextFile = (path) => readFileSync(path, 'utf8')
): LoadedOptions {
  const cli = parse_cli_args(argv);

  const config_path = cli.config_path ?? env.PANEL_CONFIG;
  const raw = config_path ? read_config_file(config_path, read_file) : {};

  const link_overrides: Record<string, unknown> = {};
  const port = cli.port ?? env.PANEL_PORT;
  if (port !== undefined && port !== '') link_overrides.path = port;
  if (cli.baud !== undefined) link_overrides.baud_rate = cli.baud;

  let merged = raw;
  if (Object.keys(link_overrides).length > 0 && is_record(raw)) {
    const link = is_record(raw.link) ? raw.link : {};
    merged = { ...raw, link: { ...link, ...link_overrides } };
  }

  return { config: parse_config(merged), list_ports: cli.list_ports, help: cli.help };
}
