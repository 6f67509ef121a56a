/**
 * Serial port scanner used by `--list-ports`.
 */

import { SerialPort } from 'serialport';

/** Metadata for one serial port. */
export interface PortInfo {
  /** OS device path (e.g., /dev/ttyACM0 or COM3). */
  path: string;
  /** USB vendor ID (hex string). */
  vid?: string;
  /** USB product ID (hex string). */
  pid?: string;
  manufacturer?: string;
  /** One-line description for the port listing. */
  label: string;
}

/**
 * List the serial ports the OS reports.
 *
 * Enumeration failures (missing permissions, no udev) yield an empty list.
 */
export async function scan_ports(): Promise<PortInfo[]> {
  let raw_ports: Awaited<ReturnType<typeof SerialPort.list>>;
  try {
    raw_ports = await SerialPort.list();
  } catch (err) {
    console.warn('[LINK] port enumeration failed:', err instanceof Error ? err.message : err);
    return [];
  }

  return raw_ports.map((p) => {
    const ids = p.vendorId && p.productId ? ` (${p.vendorId}:${p.productId})` : '';
    return {
      path: p.path,
      vid: p.vendorId,
      pid: p.productId,
      manufacturer: p.manufacturer,
      label: `${p.path}${p.manufacturer ? ` - ${p.manufacturer}` : ''}${ids}`
    };
  });
}
