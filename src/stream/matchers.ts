/**
 * @fileoverview Composable, stateful predicates over log lines
 * @module stream/matchers
 */

import { MatcherExhaustedError } from './errors';

/**
 * Anything the wait engine can feed lines into.
 *
 * `toString()` should describe the matcher's current state; it ends up in
 * timeout and not-found messages.
 */
export interface LogMatcher {
  match(line: string): boolean;
  toString(): string;
}

/**
 * Base class for log matchers
 */
export abstract class StreamMatcher implements LogMatcher {
  /**
   * Return `true` if the matcher matches the line
   */
  abstract match(line: string): boolean;

  /**
   * Arguments rendered inside `Name(...)`
   */
  protected abstract argsString(): string;

  /**
   * Bound predicate, for APIs that take a plain function
   */
  asPredicate(): (line: string) => boolean {
    return (line) => this.match(line);
  }

  toString(): string {
    return `${this.constructor.name}(${this.argsString()})`;
  }
}

/**
 * Matches a line exactly
 */
export class EqualsMatcher extends StreamMatcher {
  constructor(private readonly expected: string) {
    super();
  }

  match(line: string): boolean {
    return line === this.expected;
  }

  protected argsString(): string {
    return quote(this.expected);
  }
}

/**
 * Matches a line if the pattern is found anywhere in it
 */
export class RegexMatcher extends StreamMatcher {
  private readonly regex: RegExp;

  constructor(pattern: string | RegExp) {
    super();
    // `g` and `y` make `test` stateful through `lastIndex`.
    this.regex =
      typeof pattern === 'string' ? new RegExp(pattern) : new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  }

  match(line: string): boolean {
    return this.regex.test(line);
  }

  protected argsString(): string {
    return quote(this.regex.source);
  }
}

/**
 * Turn a raw value into a matcher unless it already is one
 */
export function toMatcher<T>(factory: (value: T) => StreamMatcher, value: T | StreamMatcher): StreamMatcher {
  return value instanceof StreamMatcher ? value : factory(value);
}

/**
 * State of a single-use combination matcher
 */
export type CombinationState =
  | { status: 'in-progress'; matched: StreamMatcher[]; remaining: StreamMatcher[] }
  | { status: 'exhausted'; matched: StreamMatcher[] };

type CombinationConstructor<T> = new (...matchers: StreamMatcher[]) => T;

/**
 * Matcher built from several child matchers.
 *
 * Stateful and single-use: once it reports a full match, further calls throw
 * {@link MatcherExhaustedError}.
 */
export abstract class CombinationMatcher extends StreamMatcher {
  protected state: CombinationState;

  constructor(...matchers: StreamMatcher[]) {
    super();
    this.state =
      matchers.length === 0
        ? { status: 'exhausted', matched: [] }
        : { status: 'in-progress', matched: [], remaining: [...matchers] };
  }

  /**
   * Build from expected lines and/or prebuilt matchers
   */
  static byEquality<T extends CombinationMatcher>(
    this: CombinationConstructor<T>,
    ...expected: Array<string | StreamMatcher>
  ): T {
    return new this(...expected.map((item) => toMatcher((value: string) => new EqualsMatcher(value), item)));
  }

  /**
   * Build from regex patterns and/or prebuilt matchers
   */
  static byRegex<T extends CombinationMatcher>(
    this: CombinationConstructor<T>,
    ...patterns: Array<string | RegExp | StreamMatcher>
  ): T {
    return new this(
      ...patterns.map((item) => toMatcher((value: string | RegExp) => new RegexMatcher(value), item))
    );
  }

  get isExhausted(): boolean {
    return this.state.status === 'exhausted';
  }

  match(line: string): boolean {
    const state = this.state;
    if (state.status === 'exhausted') {
      throw new MatcherExhaustedError(this.toString());
    }

    const index = this.select(state.remaining, line);
    if (index === -1) {
      return false;
    }

    const matched = [...state.matched, ...state.remaining.slice(index, index + 1)];
    const remaining = state.remaining.filter((_, i) => i !== index);
    this.state = remaining.length === 0 ? { status: 'exhausted', matched } : { status: 'in-progress', matched, remaining };

    return this.state.status === 'exhausted';
  }

  /**
   * Index of the remaining child that consumes this line, or -1
   */
  protected abstract select(remaining: StreamMatcher[], line: string): number;

  protected argsString(): string {
    const remaining = this.state.status === 'in-progress' ? this.state.remaining : [];
    return `matched=[${this.state.matched.join(', ')}], unmatched=[${remaining.join(', ')}]`;
  }
}

/**
 * Uses each child in turn, moving on only after the current one matches.
 * Reports a match when the last child matches.
 *
 * @example
 * ```typescript
 * const ready = OrderedMatcher.byRegex(/database system is ready/, /listening on/);
 * await waitForLogsMatching(source, ready);
 * ```
 */
export class OrderedMatcher extends CombinationMatcher {
  protected select(remaining: StreamMatcher[], line: string): number {
    const next = remaining[0];
    return next && next.match(line) ? 0 : -1;
  }
}

/**
 * Tries each line against every unmatched child in construction order and
 * retires the first that matches. Reports a match once every child has
 * matched, in any order.
 */
export class UnorderedMatcher extends CombinationMatcher {
  protected select(remaining: StreamMatcher[], line: string): number {
    return remaining.findIndex((matcher) => matcher.match(line));
  }
}

function quote(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}
