import { describe, it, expect } from 'vitest';
import { oppositeSide } from './trade.js';

describe('trade helpers', () => {
  it('flips sides', () => {
    expect(oppositeSide('long')).toBe('short');
    expect(oppositeSide('short')).toBe('long');
  });
});
