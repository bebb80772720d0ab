// pattern: Functional Core
// Predicate trees over conversations and direct messages.
//
// A comparison pairs an operand (which value to read from the target) with a
// right-hand side normalised when the filter is built, so a bad date string
// fails at construction rather than halfway through a listing.

import { InvalidFilterValueError } from '../errors';

export type Comparable = number | string | Date;

export type ComparisonOp = 'gt' | 'lt' | 'eq' | 'neq';

/** What a conversation filter can read. `Convo` satisfies it. */
export interface ConvoTarget {
  readonly participant: string | undefined;
  readonly unreadCount: number;
  readonly lastMessageTime: Date | undefined;
}

/** What a message filter can read. `DirectMessage` satisfies it. */
export interface MessageTarget {
  readonly sentAt: Date;
}

export interface Operand<T, In, V extends Comparable> {
  readonly name: string;
  extract(target: T): V | undefined;
  normalize(value: In): V;
}

export type Filter<T> =
  | {
      readonly kind: 'compare';
      readonly op: ComparisonOp;
      readonly operand: string;
      readonly extract: (target: T) => Comparable | undefined;
      readonly value: Comparable;
    }
  | { readonly kind: 'and'; readonly filters: readonly Filter<T>[] }
  | { readonly kind: 'or'; readonly filters: readonly Filter<T>[] }
  | { readonly kind: 'not'; readonly filter: Filter<T> };

export type TimeValue = Date | string;

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Normalise a time filter value. Strings are 'YYYY-MM-DD' or
 * 'YYYY-MM-DD HH:MM:SS' and are read as UTC.
 * @throws InvalidFilterValueError for any other string or an invalid Date
 */
export function parseFilterTime(operand: string, value: TimeValue): Date {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) throw new InvalidFilterValueError(operand, value);
    return value;
  }

  const match = DATE_TIME.exec(value) ?? DATE_ONLY.exec(value);
  if (!match) throw new InvalidFilterValueError(operand, value);

  const [year, month, day, hour = 0, minute = 0, second = 0] = match.slice(1).map(Number);
  if (year === undefined || month === undefined || day === undefined) {
    throw new InvalidFilterValueError(operand, value);
  }
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));

  // Date.UTC rolls 2024-02-30 over into March; reject instead.
  if (
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    throw new InvalidFilterValueError(operand, value);
  }
  return date;
}

const identity = <V>(value: V): V => value;

export const UnreadCount: Operand<ConvoTarget, number, number> = {
  name: 'UnreadCount',
  extract: (convo) => convo.unreadCount,
  normalize: identity,
};

/** Handle of the other member of the conversation. */
export const Participant: Operand<ConvoTarget, string, string> = {
  name: 'Participant',
  extract: (convo) => convo.participant,
  normalize: identity,
};

export const LastMessageTime: Operand<ConvoTarget, TimeValue, Date> = {
  name: 'LastMessageTime',
  extract: (convo) => convo.lastMessageTime,
  normalize: (value) => parseFilterTime('LastMessageTime', value),
};

export const SentAt: Operand<MessageTarget, TimeValue, Date> = {
  name: 'SentAt',
  extract: (message) => message.sentAt,
  normalize: (value) => parseFilterTime('SentAt', value),
};

function compare<T, In, V extends Comparable>(
  op: ComparisonOp,
  operand: Operand<T, In, V>,
  value: In
): Filter<T> {
  return {
    kind: 'compare',
    op,
    operand: operand.name,
    extract: (target) => operand.extract(target),
    value: operand.normalize(value),
  };
}

export function gt<T, In, V extends Comparable>(operand: Operand<T, In, V>, value: In): Filter<T> {
  return compare('gt', operand, value);
}

export function lt<T, In, V extends Comparable>(operand: Operand<T, In, V>, value: In): Filter<T> {
  return compare('lt', operand, value);
}

export function eq<T, In, V extends Comparable>(operand: Operand<T, In, V>, value: In): Filter<T> {
  return compare('eq', operand, value);
}

export function neq<T, In, V extends Comparable>(operand: Operand<T, In, V>, value: In): Filter<T> {
  return compare('neq', operand, value);
}

export function and<T>(...filters: readonly Filter<T>[]): Filter<T> {
  return { kind: 'and', filters };
}

export function or<T>(...filters: readonly Filter<T>[]): Filter<T> {
  return { kind: 'or', filters };
}

export function not<T>(filter: Filter<T>): Filter<T> {
  return { kind: 'not', filter };
}

function toPrimitive(value: Comparable): number | string {
  return value instanceof Date ? value.getTime() : value;
}

function evaluateComparison(op: ComparisonOp, actual: Comparable | undefined, expected: Comparable): boolean {
  // A missing value (no last message, no other member) only satisfies neq.
  if (actual === undefined) return op === 'neq';

  const lhs = toPrimitive(actual);
  const rhs = toPrimitive(expected);
  switch (op) {
    case 'gt':
      return lhs > rhs;
    case 'lt':
      return lhs < rhs;
    case 'eq':
      return lhs === rhs;
    case 'neq':
      return lhs !== rhs;
  }
}

/** Evaluate a filter tree. An empty `and` is true, an empty `or` is false. */
export function evaluateFilter<T>(filter: Filter<T>, target: T): boolean {
  switch (filter.kind) {
    case 'compare':
      return evaluateComparison(filter.op, filter.extract(target), filter.value);
    case 'and':
      return filter.filters.every((f) => evaluateFilter(f, target));
    case 'or':
      return filter.filters.some((f) => evaluateFilter(f, target));
    case 'not':
      return !evaluateFilter(filter.filter, target);
  }
}

/** Human-readable form, used in log lines. */
export function describeFilter<T>(filter: Filter<T>): string {
  switch (filter.kind) {
    case 'compare': {
      const value = filter.value instanceof Date ? filter.value.toISOString() : JSON.stringify(filter.value);
      return `${filter.operand} ${filter.op} ${value}`;
    }
    case 'and':
      return `(${filter.filters.map(describeFilter).join(' and ')})`;
    case 'or':
      return `(${filter.filters.map(describeFilter).join(' or ')})`;
    case 'not':
      return `not ${describeFilter(filter.filter)}`;
  }
}
