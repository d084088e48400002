import { describe, it, expect } from 'vitest';
import { WeightedCandidates } from '../weighted-candidates.js';

describe('WeightedCandidates', () => {
  function build(): WeightedCandidates {
    const candidates = new WeightedCandidates();
    candidates.add(30, new Set([1]));
    candidates.add(50, new Set([2, 3]));
    candidates.add(20, new Set([3, 4]));
    return candidates;
  }

  it('keeps the running sum', () => {
    expect(build().totalWeight).toBe(100);
  });

  it('exposes cumulative upper bounds', () => {
    expect(build().view().map((v) => v.cumulativeWeight)).toEqual([30, 80, 100]);
  });

  it('gives each entry the half-open range (previous, cumulative]', () => {
    const candidates = build();
    expect(candidates.select(1)?.stateIds).toEqual(new Set([1]));
    expect(candidates.select(30)?.stateIds).toEqual(new Set([1]));
    expect(candidates.select(31)?.stateIds).toEqual(new Set([2, 3]));
    expect(candidates.select(80)?.stateIds).toEqual(new Set([2, 3]));
    expect(candidates.select(81)?.stateIds).toEqual(new Set([3, 4]));
    expect(candidates.select(100)?.stateIds).toEqual(new Set([3, 4]));
  });

  it('selects nothing beyond the total', () => {
    expect(build().select(101)).toBeUndefined();
  });

  it('lists distinct state ids in first-seen order', () => {
    expect(build().allStateIds()).toEqual([1, 2, 3, 4]);
  });

  it('clears', () => {
    const candidates = build();
    candidates.clear();
    expect(candidates.size).toBe(0);
    expect(candidates.totalWeight).toBe(0);
  });
});
