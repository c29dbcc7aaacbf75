import { EventEmitter } from 'node:events';
import type { QualityName, QualityTier } from '../config.js';
import { CaptureUnavailableError } from '../lib/errors.js';

/**
 * Producer of encoded screen images for one stream.
 */
export interface CaptureSource {
  /** Fails with `CaptureUnavailableError` when the display cannot be used. */
  open(monitorIndex: number, quality: QualityName, tier: QualityTier): Promise<void>;
  /** Latest encoded image, or undefined when nothing new was captured. */
  grab(): Promise<Buffer | undefined>;
  close(): void;
}

export interface CaptureConfigureRequest extends QualityTier {
  monitorIndex: number;
  quality: QualityName;
}

export type CaptureFeedEvents = {
  configure: [request: CaptureConfigureRequest];
  /** The stream's monitor can no longer be fed. */
  lost: [reason: string];
};

/**
 * Capture source fed by the authority console, which grabs the display on
 * its side and uploads encoded images. Only the newest image is kept.
 *
 * Several consoles may attach; the earliest one still attached is the feeder
 * and images from the others are ignored.
 */
export class ConsoleCaptureFeed extends EventEmitter<CaptureFeedEvents> implements CaptureSource {
  private readonly consoles = new Map<string, number>();
  private feeder: string | null = null;
  private active: CaptureConfigureRequest | null = null;
  private latest: Buffer | undefined;
  private consumed = true;

  get isAttached(): boolean {
    return this.feeder !== null;
  }

  get consoleCount(): number {
    return this.consoles.size;
  }

  attach(consoleId: string, monitors: number): void {
    this.consoles.set(consoleId, monitors);
    if (this.feeder === null) {
      this.feeder = consoleId;
    }
  }

  detach(consoleId: string): void {
    if (!this.consoles.delete(consoleId) || this.feeder !== consoleId) return;

    const next = this.consoles.keys().next();
    this.feeder = next.done ? null : next.value;
    this.latest = undefined;
    this.consumed = true;
    if (!this.active) return;

    if (this.feeder === null) {
      this.emit('lost', 'Capture feed detached');
    } else if (this.active.monitorIndex >= this.monitors) {
      this.emit('lost', `Monitor ${this.active.monitorIndex} is not available`);
    } else {
      this.emit('configure', { ...this.active });
    }
  }

  /**
   * Returns false when the image is not from the feeder or not for the
   * monitor being streamed.
   */
  push(consoleId: string, monitorIndex: number, data: Buffer): boolean {
    if (consoleId !== this.feeder || monitorIndex !== this.active?.monitorIndex) return false;
    this.latest = data;
    this.consumed = false;
    return true;
  }

  async open(monitorIndex: number, quality: QualityName, tier: QualityTier): Promise<void> {
    if (this.feeder === null) {
      throw new CaptureUnavailableError('No capture feed is attached');
    }
    if (monitorIndex >= this.monitors) {
      throw new CaptureUnavailableError(`Monitor ${monitorIndex} is not available`);
    }
    this.active = { monitorIndex, quality, ...tier };
    this.latest = undefined;
    this.consumed = true;
    this.emit('configure', { ...this.active });
  }

  async grab(): Promise<Buffer | undefined> {
    if (this.consumed || !this.latest) return undefined;
    this.consumed = true;
    return this.latest;
  }

  close(): void {
    this.active = null;
    this.latest = undefined;
    this.consumed = true;
  }

  private get monitors(): number {
    return this.feeder === null ? 0 : this.consoles.get(this.feeder) ?? 0;
  }
}
