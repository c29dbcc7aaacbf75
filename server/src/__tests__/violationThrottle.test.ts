import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ViolationThrottle, normalizeViolationKind } from '../enforcement/violationThrottle.js';
import type { ViolationReport } from '../types.js';

const T0 = 1_700_000_000_000;

function makeThrottle() {
  const throttle = new ViolationThrottle({ intervalMs: 5_000, retentionMs: 60_000, sweepIntervalMs: 60_000 });
  const reports: ViolationReport[] = [];
  throttle.on('report', (report) => reports.push(report));
  return { throttle, reports };
}

function violation(kind: string, participantId = 'p-1', detail = '') {
  return { participantId, kind, detail, timestamp: Date.now() };
}

describe('ViolationThrottle', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('reports the first event at once and the burst total when the window closes', () => {
    const { throttle, reports } = makeThrottle();

    throttle.record(violation('focus-lost', 'p-1', 'alt-tab'));
    expect(reports).toEqual([
      {
        participantId: 'p-1',
        kind: 'focus-lost',
        windowStart: T0,
        windowEnd: T0,
        occurrenceCount: 1,
        representativeDetail: 'alt-tab',
      },
    ]);

    vi.advanceTimersByTime(1_000);
    expect(throttle.record(violation('focus-lost'))).toBeUndefined();
    vi.advanceTimersByTime(1_000);
    throttle.record(violation('focus-lost'));
    expect(reports).toHaveLength(1);

    vi.advanceTimersByTime(3_000);
    expect(reports).toHaveLength(2);
    expect(reports[1]).toEqual({
      participantId: 'p-1',
      kind: 'focus-lost',
      windowStart: T0,
      windowEnd: T0 + 5_000,
      occurrenceCount: 3,
      representativeDetail: 'alt-tab',
    });
    throttle.dispose();
  });

  it('opens a fresh window for events further apart than the interval', () => {
    const { throttle, reports } = makeThrottle();

    throttle.record(violation('window-switch'));
    vi.advanceTimersByTime(6_000);
    throttle.record(violation('window-switch'));

    expect(reports.map((report) => [report.windowStart, report.occurrenceCount])).toEqual([
      [T0, 1],
      [T0 + 6_000, 1],
    ]);
    throttle.dispose();
  });

  it('keeps an independent window per kind', () => {
    const { throttle, reports } = makeThrottle();

    throttle.record(violation('focus-lost'));
    throttle.record(violation('low-battery'));
    throttle.record(violation('focus-lost'));

    expect(reports.map((report) => report.kind)).toEqual(['focus-lost', 'low-battery']);
    expect(throttle.size).toBe(2);
    throttle.dispose();
  });

  it('keeps an independent window per participant', () => {
    const { throttle, reports } = makeThrottle();

    throttle.record(violation('focus-lost', 'p-1'));
    throttle.record(violation('focus-lost', 'p-2'));

    expect(reports.map((report) => report.participantId)).toEqual(['p-1', 'p-2']);
    throttle.dispose();
  });

  it('buckets unrecognised kinds as unknown', () => {
    const { throttle, reports } = makeThrottle();

    throttle.record(violation('screen-recorder'));
    throttle.record(violation('another-detector'));

    expect(reports).toHaveLength(1);
    expect(reports[0]?.kind).toBe('unknown');
    throttle.dispose();
  });

  it('normalizes kind spelling', () => {
    expect(normalizeViolationKind(' Focus-Lost ')).toBe('focus-lost');
    expect(normalizeViolationKind('')).toBe('unknown');
  });

  it('evicts closed windows after the retention interval', () => {
    const { throttle } = makeThrottle();

    throttle.record(violation('focus-lost'));
    vi.advanceTimersByTime(5_000);

    expect(throttle.sweep(T0 + 5_000 + 60_000)).toBe(0);
    expect(throttle.sweep(T0 + 5_000 + 60_001)).toBe(1);
    expect(throttle.size).toBe(0);
    throttle.dispose();
  });

  it('runs the sweep in the background once started', () => {
    const { throttle } = makeThrottle();
    throttle.start();

    throttle.record(violation('focus-lost'));
    vi.advanceTimersByTime(60_000);
    expect(throttle.size).toBe(1);

    vi.advanceTimersByTime(60_000);
    expect(throttle.size).toBe(0);
    throttle.dispose();
  });

  it('never evicts an open window', () => {
    const { throttle } = makeThrottle();

    throttle.record(violation('focus-lost'));

    expect(throttle.sweep(T0 + 1_000_000)).toBe(0);
    throttle.dispose();
  });

  it('flushes pending counts when a participant is forgotten', () => {
    const { throttle, reports } = makeThrottle();

    throttle.record(violation('focus-lost'));
    vi.advanceTimersByTime(1_000);
    throttle.record(violation('focus-lost'));
    throttle.forgetParticipant('p-1');

    expect(reports.map((report) => report.occurrenceCount)).toEqual([1, 2]);
    expect(reports[1]?.windowEnd).toBe(T0 + 1_000);
    expect(throttle.size).toBe(0);

    vi.advanceTimersByTime(10_000);
    expect(reports).toHaveLength(2);
    throttle.dispose();
  });
});
