import { EventEmitter } from 'node:events';
import { config } from '../config.js';
import { VIOLATION_KINDS } from '../types.js';
import type { ViolationEvent, ViolationKind, ViolationReport } from '../types.js';

export interface ThrottleOptions {
  /** Length of one aggregation window. */
  intervalMs: number;
  /** How long a closed window is kept before the sweep evicts it. */
  retentionMs: number;
  sweepIntervalMs: number;
}

const DEFAULT_THROTTLE_OPTIONS: ThrottleOptions = {
  intervalMs: config.throttleIntervalMs,
  retentionMs: config.throttleRetentionMs,
  sweepIntervalMs: config.throttleRetentionMs,
};

export type ThrottleEvents = {
  report: [report: ViolationReport];
};

interface ThrottleWindow {
  participantId: string;
  kind: ViolationKind;
  windowStart: number;
  occurrenceCount: number;
  /** occurrenceCount carried by the last report sent for this window. */
  emittedCount: number;
  representativeDetail: string;
  closedAt?: number;
  timer?: NodeJS.Timeout;
}

export function normalizeViolationKind(kind: string): ViolationKind {
  const normalized = kind.trim().toLowerCase();
  return VIOLATION_KINDS.find((known) => known === normalized) ?? 'unknown';
}

/**
 * First event of a window reports at once; the window reports again on
 * close only if its count grew.
 */
export class ViolationThrottle extends EventEmitter<ThrottleEvents> {
  private readonly windows = new Map<string, ThrottleWindow>();
  private readonly options: ThrottleOptions;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: Partial<ThrottleOptions> = {}) {
    super();
    this.options = { ...DEFAULT_THROTTLE_OPTIONS, ...options };
  }

  get size(): number {
    return this.windows.size;
  }

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.options.sweepIntervalMs);
  }

  record(event: ViolationEvent): ViolationReport | undefined {
    const kind = normalizeViolationKind(event.kind);
    const key = windowKey(event.participantId, kind);
    const now = Date.now();
    const current = this.windows.get(key);

    if (current && !this.isExpired(current, now)) {
      current.occurrenceCount += 1;
      return undefined;
    }
    if (current) {
      this.closeWindow(current, now);
    }

    const window: ThrottleWindow = {
      participantId: event.participantId,
      kind,
      windowStart: now,
      occurrenceCount: 1,
      emittedCount: 0,
      representativeDetail: event.detail,
    };
    window.timer = setTimeout(() => this.closeWindow(window, Date.now()), this.options.intervalMs);
    this.windows.set(key, window);
    return this.emitReport(window, now);
  }

  sweep(now = Date.now()): number {
    let evicted = 0;
    for (const [key, window] of this.windows) {
      if (window.closedAt !== undefined && now - window.closedAt > this.options.retentionMs) {
        this.windows.delete(key);
        evicted += 1;
      }
    }
    return evicted;
  }

  /** Flushes pending counts before dropping the windows. */
  forgetParticipant(participantId: string): void {
    const now = Date.now();
    for (const [key, window] of this.windows) {
      if (window.participantId !== participantId) continue;
      this.closeWindow(window, now);
      this.windows.delete(key);
    }
  }

  dispose(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    for (const window of this.windows.values()) {
      if (window.timer) clearTimeout(window.timer);
    }
    this.windows.clear();
  }

  private isExpired(window: ThrottleWindow, now: number): boolean {
    return window.closedAt !== undefined || now - window.windowStart > this.options.intervalMs;
  }

  private closeWindow(window: ThrottleWindow, now: number): void {
    if (window.closedAt !== undefined) return;
    if (window.timer) {
      clearTimeout(window.timer);
      window.timer = undefined;
    }
    window.closedAt = now;
    if (window.occurrenceCount > window.emittedCount) {
      this.emitReport(window, Math.min(now, window.windowStart + this.options.intervalMs));
    }
  }

  private emitReport(window: ThrottleWindow, windowEnd: number): ViolationReport {
    const report: ViolationReport = {
      participantId: window.participantId,
      kind: window.kind,
      windowStart: window.windowStart,
      windowEnd,
      occurrenceCount: window.occurrenceCount,
      representativeDetail: window.representativeDetail,
    };
    window.emittedCount = window.occurrenceCount;
    this.emit('report', report);
    return report;
  }
}

function windowKey(participantId: string, kind: ViolationKind): string {
  return `${participantId}\u0000${kind}`;
}
