import { describe, it, expect } from 'vitest';
import {
  LastMessageTime,
  Participant,
  SentAt,
  UnreadCount,
  and,
  describeFilter,
  eq,
  evaluateFilter,
  gt,
  lt,
  neq,
  not,
  or,
  parseFilterTime,
} from './convo-filters';
import type { ConvoTarget, MessageTarget } from './convo-filters';
import { InvalidFilterValueError } from '../errors';

function convo(overrides: Partial<ConvoTarget> = {}): ConvoTarget {
  return {
    participant: 'bob.test',
    unreadCount: 3,
    lastMessageTime: new Date('2024-06-15T10:30:00.000Z'),
    ...overrides,
  };
}

const message = (sentAt: string): MessageTarget => ({ sentAt: new Date(sentAt) });

describe('parseFilterTime', () => {
  it('reads a date as midnight UTC', () => {
    expect(parseFilterTime('SentAt', '2024-06-15')).toEqual(new Date('2024-06-15T00:00:00.000Z'));
  });

  it('reads a date and time as UTC', () => {
    expect(parseFilterTime('SentAt', '2024-06-15 10:30:05')).toEqual(
      new Date('2024-06-15T10:30:05.000Z')
    );
  });

  it('passes Date values through', () => {
    const date = new Date('2024-01-01T00:00:00Z');
    expect(parseFilterTime('SentAt', date)).toBe(date);
  });

  it.each(['15/06/2024', '2024-06-15T10:30:05', '2024-02-30', '2024-06-15 25:00:00', ''])(
    'rejects %j',
    (value) => {
      expect(() => parseFilterTime('LastMessageTime', value)).toThrow(InvalidFilterValueError);
    }
  );

  it('rejects an invalid Date', () => {
    expect(() => parseFilterTime('SentAt', new Date('nope'))).toThrow(
      'Invalid value for SentAt filter: Invalid Date'
    );
  });
});

describe('comparisons', () => {
  it('compares unread counts', () => {
    expect(evaluateFilter(gt(UnreadCount, 2), convo())).toBe(true);
    expect(evaluateFilter(gt(UnreadCount, 3), convo())).toBe(false);
    expect(evaluateFilter(lt(UnreadCount, 4), convo())).toBe(true);
    expect(evaluateFilter(eq(UnreadCount, 3), convo())).toBe(true);
    expect(evaluateFilter(neq(UnreadCount, 3), convo())).toBe(false);
  });

  it('compares the participant handle', () => {
    expect(evaluateFilter(eq(Participant, 'bob.test'), convo())).toBe(true);
    expect(evaluateFilter(neq(Participant, 'carol.test'), convo())).toBe(true);
  });

  it('compares the last message time against a date string', () => {
    expect(evaluateFilter(gt(LastMessageTime, '2024-06-15'), convo())).toBe(true);
    expect(evaluateFilter(lt(LastMessageTime, '2024-06-15 10:30:00'), convo())).toBe(false);
    expect(evaluateFilter(eq(LastMessageTime, '2024-06-15 10:30:00'), convo())).toBe(true);
  });

  it('compares message send times', () => {
    const filter = lt(SentAt, new Date('2024-01-02T00:00:00Z'));
    expect(evaluateFilter(filter, message('2024-01-01T23:59:59.000Z'))).toBe(true);
    expect(evaluateFilter(filter, message('2024-01-02T00:00:00.000Z'))).toBe(false);
  });

  it('lets only neq match a conversation without messages', () => {
    const empty = convo({ lastMessageTime: undefined });
    expect(evaluateFilter(gt(LastMessageTime, '2000-01-01'), empty)).toBe(false);
    expect(evaluateFilter(lt(LastMessageTime, '2100-01-01'), empty)).toBe(false);
    expect(evaluateFilter(neq(LastMessageTime, '2000-01-01'), empty)).toBe(true);
  });

  it('validates time values when the filter is built', () => {
    expect(() => gt(LastMessageTime, 'yesterday')).toThrow(InvalidFilterValueError);
  });
});

describe('combinators', () => {
  const busy = gt(UnreadCount, 2);
  const fromBob = eq(Participant, 'bob.test');

  it('and requires every filter', () => {
    expect(evaluateFilter(and(busy, fromBob), convo())).toBe(true);
    expect(evaluateFilter(and(busy, fromBob), convo({ unreadCount: 0 }))).toBe(false);
  });

  it('or requires any filter', () => {
    expect(evaluateFilter(or(busy, fromBob), convo({ unreadCount: 0 }))).toBe(true);
    expect(evaluateFilter(or(busy, fromBob), convo({ unreadCount: 0, participant: 'x.test' }))).toBe(
      false
    );
  });

  it('not inverts', () => {
    expect(evaluateFilter(not(busy), convo())).toBe(false);
  });

  it('treats empty and as true and empty or as false', () => {
    expect(evaluateFilter(and<ConvoTarget>(), convo())).toBe(true);
    expect(evaluateFilter(or<ConvoTarget>(), convo())).toBe(false);
  });

  it('nests', () => {
    const filter = or(and(busy, not(fromBob)), eq(UnreadCount, 0));
    expect(evaluateFilter(filter, convo({ participant: 'carol.test' }))).toBe(true);
    expect(evaluateFilter(filter, convo())).toBe(false);
    expect(evaluateFilter(filter, convo({ unreadCount: 0 }))).toBe(true);
  });
});

describe('describeFilter', () => {
  it('renders the tree', () => {
    const filter = and(gt(UnreadCount, 2), not(eq(LastMessageTime, '2024-06-15')));
    expect(describeFilter(filter)).toBe(
      '(UnreadCount gt 2 and not LastMessageTime eq 2024-06-15T00:00:00.000Z)'
    );
  });
});
