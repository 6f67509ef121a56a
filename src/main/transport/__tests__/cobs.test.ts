import { describe, it, expect } from 'vitest';
import { cobs_encode, cobs_decode } from '../cobs';

function encode(bytes: number[]): number[] {
  return Array.from(cobs_encode(new Uint8Array(bytes)));
}

function decode(bytes: number[]): number[] | null {
  const out = cobs_decode(new Uint8Array(bytes));
  return out ? Array.from(out) : null;
}

describe('cobs_encode', () => {
  it('encodes an empty payload as a single code byte', () => {
    expect(encode([])).toEqual([0x01]);
  });

  it('replaces zeros with code bytes', () => {
    expect(encode([0x00])).toEqual([0x01, 0x01]);
    expect(encode([0x00, 0x00])).toEqual([0x01, 0x01, 0x01]);
    expect(encode([0x11, 0x22, 0x00, 0x33])).toEqual([0x03, 0x11, 0x22, 0x02, 0x33]);
  });

  it('splits runs of 254 non-zero bytes', () => {
    const payload = Array.from({ length: 254 }, (_, i) => i + 1);
    const encoded = encode(payload);
    expect(encoded).toHaveLength(256);
    expect(encoded[0]).toBe(0xFF);
    expect(encoded[255]).toBe(0x01);
    expect(encoded).not.toContain(0x00);
  });
});

describe('cobs_decode', () => {
  it('restores the zeros', () => {
    expect(decode([0x03, 0x11, 0x22, 0x02, 0x33])).toEqual([0x11, 0x22, 0x00, 0x33]);
    expect(decode([0x01, 0x01])).toEqual([0x00]);
    expect(decode([0x01])).toEqual([]);
  });

  it('decodes a maximal block without inserting a zero', () => {
    const payload = Array.from({ length: 254 }, (_, i) => i + 1);
    expect(decode([0xFF, ...payload, 0x01])).toEqual(payload);
  });

  it('rejects malformed frames', () => {
    expect(decode([])).toBeNull();
    expect(decode([0x00])).toBeNull();
    expect(decode([0x05, 0x01, 0x02])).toBeNull();
    expect(decode([0x03, 0x00, 0x01])).toBeNull();
  });

  it('inverts cobs_encode for a payload with leading and trailing zeros', () => {
    const payload = [0x00, 0xAA, 0x00, 0xBB, 0x00];
    expect(decode(encode(payload))).toEqual(payload);
  });
});
