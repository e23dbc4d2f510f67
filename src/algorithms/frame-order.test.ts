import { describe, it, expect } from 'vitest';
import { frameOrdinal, compareFrameKeys, sortFrameKeys } from './frame-order.js';

describe('frameOrdinal', () => {
  it('reads the number between the last space and the extension', () => {
    expect(frameOrdinal('hero 12.aseprite')).toBe(12);
  });

  it('uses the last space and last dot', () => {
    expect(frameOrdinal('my.sheet v2 7.png')).toBe(7);
  });

  it('reads to the end of the key when there is no extension', () => {
    expect(frameOrdinal('walk 3')).toBe(3);
  });

  it('treats keys without an ordinal as 0', () => {
    expect(frameOrdinal('sprite.aseprite')).toBe(0);
    expect(frameOrdinal('')).toBe(0);
  });

  it('treats an ordinal with trailing characters as 0', () => {
    expect(frameOrdinal('hero 1a.png')).toBe(0);
    expect(frameOrdinal('hero 1.5.png')).toBe(0);
    expect(frameOrdinal('hero 0x10.png')).toBe(0);
  });

  it('reads signed ordinals', () => {
    expect(frameOrdinal('hero -2.png')).toBe(-2);
    expect(frameOrdinal('hero +3.png')).toBe(3);
  });
});

describe('sortFrameKeys', () => {
  it('orders numerically rather than lexically', () => {
    expect(sortFrameKeys(['s 10.png', 's 2.png', 's 1.png'])).toEqual(['s 1.png', 's 2.png', 's 10.png']);
  });

  it('keeps declared order for equal ordinals', () => {
    expect(sortFrameKeys(['b.png', 'a 1.png', 'a.png'])).toEqual(['b.png', 'a.png', 'a 1.png']);
  });

  it('does not mutate its input', () => {
    const keys = ['s 2.png', 's 1.png'];
    sortFrameKeys(keys);
    expect(keys).toEqual(['s 2.png', 's 1.png']);
  });

  it('compareFrameKeys is negative when the first ordinal is lower', () => {
    expect(compareFrameKeys('s 2.png', 's 10.png')).toBeLessThan(0);
    expect(compareFrameKeys('s 10.png', 's 2.png')).toBeGreaterThan(0);
    expect(compareFrameKeys('x 4.png', 'y 4.png')).toBe(0);
  });
});
