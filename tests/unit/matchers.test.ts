/**
 * @fileoverview Unit tests for log line matchers
 * @module tests/unit/matchers
 */

import { describe, it, expect } from 'vitest';

import { MatcherExhaustedError } from '../../src/stream/errors';
import {
  EqualsMatcher,
  OrderedMatcher,
  RegexMatcher,
  UnorderedMatcher,
  toMatcher,
} from '../../src/stream/matchers';

describe('unit: Matchers', () => {
  describe('EqualsMatcher', () => {
    it('matches exactly equal lines and nothing else', () => {
      const matcher = new EqualsMatcher('foo');

      expect(matcher.match('foo')).toBe(true);
      expect(matcher.match('foobar')).toBe(false);
    });

    it('has a readable string form', () => {
      expect(String(new EqualsMatcher('bar'))).toBe("EqualsMatcher('bar')");
      expect(String(new EqualsMatcher("it's"))).toBe("EqualsMatcher('it\\'s')");
    });

    it('can be used as a plain predicate', () => {
      expect(['a', 'b', 'a'].filter(new EqualsMatcher('a').asPredicate())).toEqual(['a', 'a']);
    });
  });

  describe('RegexMatcher', () => {
    it('matches the pattern anywhere in the line', () => {
      const matcher = new RegexMatcher('^foo');

      expect(matcher.match('foobar')).toBe(true);
      expect(matcher.match('barfoo')).toBe(false);
    });

    it('accepts RegExp objects and ignores the global flag', () => {
      const matcher = new RegexMatcher(/ready/gi);

      expect(matcher.match('READY')).toBe(true);
      expect(matcher.match('READY')).toBe(true);
    });

    it('has a readable string form', () => {
      expect(String(new RegexMatcher('^bar'))).toBe("RegexMatcher('^bar')");
      expect(String(new RegexMatcher(/^b/))).toBe("RegexMatcher('^b')");
    });
  });

  describe('toMatcher', () => {
    it('wraps raw values and passes matchers through', () => {
      const existing = new RegexMatcher('x');

      expect(toMatcher((value: string) => new EqualsMatcher(value), existing)).toBe(existing);
      expect(String(toMatcher((value: string) => new EqualsMatcher(value), 'y'))).toBe("EqualsMatcher('y')");
    });
  });

  describe('OrderedMatcher', () => {
    it('advances only in order and matches on the last child', () => {
      const matcher = new OrderedMatcher(new EqualsMatcher('a'), new RegexMatcher('^b'));

      expect(['x', 'a', 'y', 'ba'].map((line) => matcher.match(line))).toEqual([false, false, false, true]);
      expect(() => matcher.match('ba')).toThrow(MatcherExhaustedError);
    });

    it('ignores a later child matching early', () => {
      const matcher = new OrderedMatcher(new EqualsMatcher('foo'), new RegexMatcher('^bar'));

      expect(matcher.match('barfoo')).toBe(false);
      expect(matcher.match('foo')).toBe(false);
      expect(matcher.match('baz')).toBe(false);
      expect(matcher.match('barfoo')).toBe(true);
    });

    it('builds from expected lines with byEquality', () => {
      const matcher = OrderedMatcher.byEquality('foo', 'bar');

      expect(matcher).toBeInstanceOf(OrderedMatcher);
      expect(matcher.match('bar')).toBe(false);
      expect(matcher.match('foo')).toBe(false);
      expect(matcher.match('baz')).toBe(false);
      expect(matcher.match('bar')).toBe(true);
    });

    it('builds from patterns with byRegex', () => {
      const matcher = OrderedMatcher.byRegex('^foo', /bar$/);

      expect(matcher.match('fuzzbar')).toBe(false);
      expect(matcher.match('foobar')).toBe(false);
      expect(matcher.match('baz')).toBe(false);
      expect(matcher.match('foobar')).toBe(true);
    });

    it('accepts prebuilt matchers alongside raw values', () => {
      const matcher = OrderedMatcher.byRegex(new EqualsMatcher('^x'), '^y');

      expect(matcher.match('xyz')).toBe(false);
      expect(matcher.match('^x')).toBe(false);
      expect(matcher.match('yes')).toBe(true);
    });

    it('describes matched and unmatched children', () => {
      const matcher = new OrderedMatcher(new EqualsMatcher('a'), new RegexMatcher('^b'));
      expect(String(matcher)).toBe("OrderedMatcher(matched=[], unmatched=[EqualsMatcher('a'), RegexMatcher('^b')])");

      matcher.match('a');
      expect(String(matcher)).toBe("OrderedMatcher(matched=[EqualsMatcher('a')], unmatched=[RegexMatcher('^b')])");
      expect(matcher.isExhausted).toBe(false);

      matcher.match('b');
      expect(String(matcher)).toBe("OrderedMatcher(matched=[EqualsMatcher('a'), RegexMatcher('^b')], unmatched=[])");
      expect(matcher.isExhausted).toBe(true);
    });

    it('is exhausted from the start when empty', () => {
      const matcher = new OrderedMatcher();

      expect(matcher.isExhausted).toBe(true);
      expect(() => matcher.match('anything')).toThrow('Matcher exhausted, no more matchers to use');
    });
  });

  describe('UnorderedMatcher', () => {
    it.each([
      [['bar1', 'foo']],
      [['foo', 'bar1']],
    ])('matches on the second relevant line whatever the order (%j)', (lines) => {
      const matcher = new UnorderedMatcher(new EqualsMatcher('foo'), new RegexMatcher('^bar'));

      expect(matcher.match('noise')).toBe(false);
      expect(matcher.match(lines[0] ?? '')).toBe(false);
      expect(matcher.match('more noise')).toBe(false);
      expect(matcher.match(lines[1] ?? '')).toBe(true);
    });

    it('retires only the first child that fits a line', () => {
      const matcher = new UnorderedMatcher(new RegexMatcher('a'), new EqualsMatcher('ab'));

      expect(matcher.match('ab')).toBe(false);
      expect(String(matcher)).toBe("UnorderedMatcher(matched=[RegexMatcher('a')], unmatched=[EqualsMatcher('ab')])");
      expect(matcher.match('ab')).toBe(true);
    });

    it('builds from expected lines and patterns', () => {
      const byEquality = UnorderedMatcher.byEquality('foo', 'bar');
      expect(byEquality).toBeInstanceOf(UnorderedMatcher);
      expect(byEquality.match('bar')).toBe(false);
      expect(byEquality.match('foo')).toBe(true);

      const byRegex = UnorderedMatcher.byRegex('^foo', 'bar$');
      expect(byRegex.match('foobar')).toBe(false);
      expect(byRegex.match('foobar')).toBe(true);
    });

    it('throws once exhausted', () => {
      const matcher = UnorderedMatcher.byEquality('foo');

      expect(matcher.match('foo')).toBe(true);
      expect(() => matcher.match('foo')).toThrow(MatcherExhaustedError);
    });
  });
});
