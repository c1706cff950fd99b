import { describe, it, expect } from 'vitest';
import { UTF_16LE, UTF_8 } from './charsets';

const CHICK = '🐥';

describe('charsets', () => {
  it('should encode and decode UTF-8', () => {
    expect(Array.from(UTF_8.encode(CHICK))).toEqual([0xf0, 0x9f, 0x90, 0xa5]);
    expect(Array.from(UTF_8.encode('é'))).toEqual([0xc3, 0xa9]);
    expect(UTF_8.decode(Uint8Array.of(0xf0, 0x9f, 0x90, 0xa5))).toBe(CHICK);
  });

  it('should encode and decode UTF-16LE code units', () => {
    expect(Array.from(UTF_16LE.encode(CHICK))).toEqual([0x3d, 0xd8, 0x25, 0xdc]);
    expect(Array.from(UTF_16LE.encode('A'))).toEqual([0x41, 0x00]);
    expect(UTF_16LE.decode(Uint8Array.of(0x3d, 0xd8, 0x25, 0xdc))).toBe(CHICK);
  });

  it('should name each charset', () => {
    expect(UTF_8.name).toBe('UTF-8');
    expect(UTF_16LE.name).toBe('UTF-16LE');
  });
});
