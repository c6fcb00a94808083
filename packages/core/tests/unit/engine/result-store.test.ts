import { describe, expect, it } from 'vitest';
import { ResultStore } from '../../../src/engine/result-store.js';

describe('ResultStore', () => {
  it('stores and returns output by label', () => {
    const store = new ResultStore();
    store.set('words', 'alpha beta\n');
    expect(store.get('words')).toBe('alpha beta\n');
    expect(store.has('words')).toBe(true);
    expect(store.get('missing')).toBeUndefined();
  });

  it('keeps empty output as a real result', () => {
    const store = new ResultStore();
    store.set('empty', '');
    expect(store.has('empty')).toBe(true);
    expect(store.get('empty')).toBe('');
  });

  it('tracks labels written more than once', () => {
    const store = new ResultStore();
    store.set('a', '1');
    store.set('b', '2');
    store.set('a', '3');
    expect(store.get('a')).toBe('3');
    expect(store.labels()).toEqual(['a', 'b']);
    expect(store.overwrittenLabels()).toEqual(['a']);
  });

  it('snapshots and clears', () => {
    const store = new ResultStore();
    store.set('a', '1');
    store.set('a', '2');
    expect(store.snapshot()).toEqual({ a: '2' });
    store.clear();
    expect(store.labels()).toEqual([]);
    expect(store.overwrittenLabels()).toEqual([]);
  });
});
