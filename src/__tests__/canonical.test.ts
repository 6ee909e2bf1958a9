import { describe, it, expect } from 'vitest';
import { canonicalize, composeKey, digest, KEY_DELIMITER } from '../lib/canonical.js';
import { makeJob, makeResume } from './helpers.js';

describe('canonicalize', () => {
  it('passes raw strings through unchanged', () => {
    expect(canonicalize('  Jane Smith\nEngineer  ')).toBe('  Jane Smith\nEngineer  ');
  });

  it('ignores object key order at every depth', () => {
    const a = { b: 1, a: { d: [1, 2], c: 'x' } };
    const b = { a: { c: 'x', d: [1, 2] }, b: 1 };

    expect(canonicalize(a)).toBe(canonicalize(b));
    expect(canonicalize(a)).toBe('{"a":{"c":"x","d":[1,2]},"b":1}');
  });

  it('keeps array order significant', () => {
    expect(canonicalize(['a', 'b'])).not.toBe(canonicalize(['b', 'a']));
  });

  it('drops undefined members and nulls undefined array items', () => {
    expect(canonicalize({ a: undefined, b: null })).toBe('{"b":null}');
    expect(canonicalize([1, undefined])).toBe('[1,null]');
  });

  it('is identical for structurally equal entities built separately', () => {
    expect(canonicalize(makeResume())).toBe(canonicalize(makeResume()));
  });
});

describe('composeKey', () => {
  it('joins parts in argument order with the stage suffix last', () => {
    expect(composeKey(['a', { x: 1 }], 'matches_v1')).toBe(`a${KEY_DELIMITER}{"x":1}${KEY_DELIMITER}matches_v1`);
  });

  it('separates the same entities across stages', () => {
    const parts = [makeResume(), makeJob()];
    expect(composeKey(parts, 'matches_v1')).not.toBe(composeKey(parts, 'gaps_v1'));
  });

  it('depends on argument order', () => {
    const resume = makeResume();
    const job = makeJob();
    expect(composeKey([resume, job], 's')).not.toBe(composeKey([job, resume], 's'));
  });
});

describe('digest', () => {
  it('is a 64-character hex sha256', () => {
    expect(digest('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    expect(digest('resume text')).toMatch(/^[0-9a-f]{64}$/);
  });
});
