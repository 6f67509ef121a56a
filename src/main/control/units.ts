/**
 * Unit auto-ranging for energy (EU) and temperature (K) readouts.
 *
 * Each scale tries its largest unit first and settles on the first unit
 * whose magnitude is at least 0.1; the base unit takes anything.
 *
 * @module control/units
 */

export type EnergyUnit = 'MEU' | 'KEU' | 'EU';
export type TemperatureUnit = 'GK' | 'MK' | 'K';

export interface Scaled<U extends string> {
  value: number;
  unit: U;
}

/** EU per MEU. */
export const EU_PER_MEU = 10_000_000;

/** EU per KEU. */
export const EU_PER_KEU = 1000;

/** Smallest scaled magnitude a larger unit is allowed to show. */
const MIN_SCALED_MAGNITUDE = 0.1;

type UnitStep<U extends string> = readonly [divisor: number, unit: U];

const ENERGY_STEPS: readonly UnitStep<EnergyUnit>[] = [
  [EU_PER_MEU, 'MEU'],
  [EU_PER_KEU, 'KEU']
];

const TEMPERATURE_STEPS: readonly UnitStep<TemperatureUnit>[] = [
  [1e9, 'GK'],
  [1e6, 'MK']
];

function auto_range<U extends string>(raw: number, steps: readonly UnitStep<U>[], base: U): Scaled<U> {
  for (const [divisor, unit] of steps) {
    const value = raw / divisor;
    if (value >= MIN_SCALED_MAGNITUDE) {
      return { value, unit };
    }
  }
  return { value: raw, unit: base };
}

export function scale_energy(raw_eu: number): Scaled<EnergyUnit> {
  return auto_range(raw_eu, ENERGY_STEPS, 'EU');
}

export function scale_temperature(raw_kelvin: number): Scaled<TemperatureUnit> {
  return auto_range(raw_kelvin, TEMPERATURE_STEPS, 'K');
}

/** Two decimals for scaled units, whole numbers for the base unit. */
function format_scaled<U extends string>(scaled: Scaled<U>, base: U): string {
  const digits = scaled.unit === base ? 0 : 2;
  return `${scaled.value.toFixed(digits)} ${scaled.unit}`;
}

/** e.g. `"1.25 MEU"`, `"5.00 KEU"`, `"42 EU"`. */
export function format_energy(raw_eu: number): string {
  return format_scaled(scale_energy(raw_eu), 'EU');
}

/** e.g. `"1.20 GK"`, `"50.00 MK"`, `"300 K"`. */
export function format_temperature(raw_kelvin: number): string {
  return format_scaled(scale_temperature(raw_kelvin), 'K');
}
