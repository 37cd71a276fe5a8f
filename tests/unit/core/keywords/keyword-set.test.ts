/**
 * Tests for KeywordSet.
 */
import { describe, it, expect, vi } from 'vitest';
import { KeywordSet, normalizeKeyword, normalizeKeywords } from '../../../../src/core/keywords/keyword-set.js';

describe('normalizeKeyword', () => {
  it('should trim and upper-case', () => {
    expect(normalizeKeyword('  select ')).toBe('SELECT');
  });

  it('should return null for blank input', () => {
    expect(normalizeKeyword('   ')).toBeNull();
  });

  it('should drop blanks and duplicates, keeping first-seen order', () => {
    expect(normalizeKeywords(['view', '', 'Table', 'VIEW'])).toEqual(['VIEW', 'TABLE']);
  });
});

describe('KeywordSet', () => {
  it('should compare case-insensitively', () => {
    const set = new KeywordSet('reserved_keywords', ['Select']);

    expect(set.has('select')).toBe(true);
    expect(set.has('SELECT')).toBe(true);
    expect(set.has('')).toBe(false);
  });

  it('should make update idempotent', () => {
    const set = new KeywordSet('unreserved_keywords', ['VIEW']);

    set.update(['view', 'TABLE']);
    set.update(['TABLE']);

    expect(set.values()).toEqual(['TABLE', 'VIEW']);
    expect(set.size).toBe(2);
  });

  it('should ignore absent keywords on differenceUpdate', () => {
    const set = new KeywordSet('unreserved_keywords', ['VIEW', 'TABLE', 'HANDLER']);

    set.differenceUpdate(['handler', 'CURSOR']);

    expect(set.values()).toEqual(['TABLE', 'VIEW']);
  });

  it('should iterate in sorted order', () => {
    const set = new KeywordSet('s', ['WHERE', 'AND', 'FROM']);

    expect([...set]).toEqual(['AND', 'FROM', 'WHERE']);
  });

  it('should return a copy from values()', () => {
    const set = new KeywordSet('s', ['GO']);

    set.values().push('EXTRA');

    expect(set.values()).toEqual(['GO']);
  });

  it('should call hooks around mutations', () => {
    const beforeUpdate = vi.fn();
    const beforeRemove = vi.fn();
    const afterChange = vi.fn();
    const set = new KeywordSet('reserved_keywords', [], { beforeUpdate, beforeRemove, afterChange });

    set.update(['go']);
    set.differenceUpdate(['go']);

    expect(beforeUpdate).toHaveBeenCalledWith('reserved_keywords', ['GO']);
    expect(beforeRemove).toHaveBeenCalledWith('reserved_keywords', ['GO']);
    expect(afterChange).toHaveBeenNthCalledWith(1, { setName: 'reserved_keywords', action: 'update', keywords: ['GO'] });
    expect(afterChange).toHaveBeenNthCalledWith(2, {
      setName: 'reserved_keywords',
      action: 'difference_update',
      keywords: ['GO'],
    });
  });

  it('should leave the set unchanged when a hook rejects the update', () => {
    const set = new KeywordSet('reserved_keywords', ['SELECT'], {
      beforeUpdate: () => {
        throw new Error('rejected');
      },
    });

    expect(() => set.update(['FROM'])).toThrow('rejected');
    expect(set.values()).toEqual(['SELECT']);
  });

  it('should clone into an independent set', () => {
    const original = new KeywordSet('reserved_keywords', ['SELECT']);
    const copy = original.clone();

    copy.update(['GO']);

    expect(original.values()).toEqual(['SELECT']);
    expect(copy.values()).toEqual(['GO', 'SELECT']);
    expect(copy.name).toBe('reserved_keywords');
  });
});
