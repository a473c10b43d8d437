import { describe, it, expect } from 'vitest';
import { RingBuffer } from './ring_buffer.util';

describe('RingBuffer', () => {
  it('evicts the oldest entry once full', () => {
    const rb = new RingBuffer<number>(2);
    expect(rb.push(1)).toEqual({});
    expect(rb.push(2)).toEqual({});
    expect(rb.push(3)).toEqual({ dropped: 1 });
    expect(rb.push(4)).toEqual({ dropped: 2 });
    expect(rb.to_array()).toEqual([3, 4]);
  });

  it('refuses a non-positive capacity', () => {
    expect(() => new RingBuffer(0)).toThrow('Invalid ring buffer capacity: 0');
  });
});
