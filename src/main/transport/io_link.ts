/**
 * Serial connection to the reactor I/O controller, with COBS deframing.
 *
 * The controller streams COBS-framed telemetry packets. Incoming bytes are
 * accumulated until the 0x00 delimiter, then the frame is decoded and
 * emitted as a `'frame'` event. Partial frames are discarded on disconnect.
 *
 * Outgoing packets are COBS-encoded and terminated with the delimiter.
 */

import { SerialPort } from 'serialport';
import { EventEmitter } from 'events';
import { cobs_encode, cobs_decode, FRAME_DELIMITER } from './cobs';
import { DEFAULT_BAUD_RATE } from '../protocol/constants';

/** Maximum frame buffer size before forced reset. */
const MAX_FRAME_BUFFER_SIZE = 4096;

/**
 * Events emitted by {@link IoLink}.
 *
 * - `'frame'`: Decoded COBS payload (Uint8Array).
 * - `'error'`: Serial port or framing error.
 * - `'close'`: Serial port closed underneath us.
 */
export interface IoLinkEvents {
  frame: (payload: Uint8Array) => void;
  error: (err: Error) => void;
  close: () => void;
}

/** Anything that can put a packet on the wire. */
export interface PacketSender {
  send(data: Uint8Array): void;
}

function describe_error(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * COBS-framed serial link to the I/O controller.
 *
 * ```ts
 * const link = new IoLink();
 * link.on('frame', (payload) => { ... });
 * await link.connect('/dev/ttyACM0');
 * link.send(build_set_channel(2, 1, 255));
 * await link.drain();
 * link.disconnect();
 * ```
 */
export class IoLink extends EventEmitter implements PacketSender {
  private port: SerialPort | null = null;
  private rx_buffer: number[] = [];

  /**
   * Open the serial port.
   *
   * @throws If already connected, or if the port fails to open.
   */
  async connect(path: string, baud: number = DEFAULT_BAUD_RATE): Promise<void> {
    if (this.port) {
      throw new Error('IoLink: already connected, call disconnect() first');
    }

    this.rx_buffer = [];

    const port = new SerialPort({ path, baudRate: baud, autoOpen: false });

    port.on('data', (buf: Buffer) => this.on_serial_data(buf));
    port.on('error', (err: Error) => this.emit('error', err));
    port.on('close', () => {
      // A close from a port we already replaced must not touch the new one.
      if (this.port === port) {
        this.rx_buffer = [];
        this.port = null;
        this.emit('close');
      }
    });

    await new Promise<void>((resolve, reject) => {
      port.open((err) => {
        if (err) {
          port.removeAllListeners();
          reject(new Error(`IoLink: failed to open ${path}: ${err.message}`));
          return;
        }
        resolve();
      });
    });

    this.port = port;
  }

  /**
   * Close the serial port. Safe to call when already disconnected.
   */
  disconnect(): void {
    this.rx_buffer = [];

    const old_port = this.port;
    if (!old_port) {
      return;
    }
    this.port = null;
    old_port.removeAllListeners();

    try {
      if (old_port.isOpen) {
        old_port.close();
      }
    } catch (err) {
      this.emit('error', new Error(`IoLink: error during disconnect: ${describe_error(err)}`));
    }
  }

  /**
   * COBS-encode a packet and write it with a trailing delimiter.
   *
   * @throws If not connected.
   */
  send(data: Uint8Array): void {
    if (!this.port || !this.port.isOpen) {
      throw new Error('IoLink: not connected');
    }

    const encoded = cobs_encode(data);
    const wire_frame = new Uint8Array(encoded.length + 1);
    wire_frame.set(encoded, 0);
    wire_frame[encoded.length] = FRAME_DELIMITER;

    this.port.write(Buffer.from(wire_frame));
  }

  /**
   * Resolve once every queued write has been handed to the OS.
   */
  async drain(): Promise<void> {
    const port = this.port;
    if (!port || !port.isOpen) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      port.drain((err) => (err ? reject(new Error(`IoLink: drain failed: ${err.message}`)) : resolve()));
    });
  }

  is_connected(): boolean {
    return this.port !== null && this.port.isOpen;
  }

  private on_serial_data(buf: Buffer): void {
    for (const byte of buf) {
      if (byte !== FRAME_DELIMITER) {
        this.rx_buffer.push(byte);
        if (this.rx_buffer.length > MAX_FRAME_BUFFER_SIZE) {
          this.rx_buffer = [];
          this.emit('error', new Error('IoLink: frame buffer overflow, buffer reset'));
        }
        continue;
      }

      // Back-to-back delimiters carry no frame.
      if (this.rx_buffer.length === 0) {
        continue;
      }

      const decoded = cobs_decode(Uint8Array.from(this.rx_buffer));
      this.rx_buffer = [];

      // Malformed frames are dropped.
      if (decoded === null) {
        continue;
      }

      try {
        this.emit('frame', decoded);
      } catch (err) {
        this.emit('error', new Error(`IoLink: frame handler error: ${describe_error(err)}`));
      }
    }
  }
}
