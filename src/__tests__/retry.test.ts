import { describe, it, expect } from 'vitest';
import { backoffDelay } from '../control-plane/retry.js';

describe('backoffDelay', () => {
  it('doubles from the base delay', () => {
    expect(backoffDelay(1, 1000, 30_000)).toBe(1000);
    expect(backoffDelay(2, 1000, 30_000)).toBe(2000);
    expect(backoffDelay(3, 1000, 30_000)).toBe(4000);
  });

  it('caps at the max delay', () => {
    expect(backoffDelay(6, 1000, 30_000)).toBe(30_000);
    expect(backoffDelay(40, 1000, 30_000)).toBe(30_000);
  });

  it('treats attempt 0 like the first attempt', () => {
    expect(backoffDelay(0, 250, 1000)).toBe(250);
  });
});
