import { EventEmitter } from 'node:events';
import { config, qualityTiers } from '../config.js';
import type { QualityName, QualityTier } from '../config.js';
import type { ConnectionHub } from '../hub/connectionHub.js';
import { CaptureUnavailableError, UnknownParticipantError, toError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import type { Frame, StreamSettings, StreamStats } from '../types.js';
import type { CaptureSource } from './captureSource.js';

export interface StreamOptions {
  /** Sent-but-unacknowledged frames allowed per recipient. */
  maxOutstandingFrames: number;
  tiers: Readonly<Record<QualityName, QualityTier>>;
}

export type StreamEvents = {
  frame: [frame: Frame];
  dropped: [participantId: string, sequenceNumber: number];
};

type FrameTransport = Pick<ConnectionHub, 'send' | 'participantIds' | 'has'>;

interface RecipientState {
  outstanding: number[];
  lastSent: number;
}

interface EncodedFrame {
  frame: Frame;
  base64: string;
}

/**
 * A recipient at its outstanding-frame limit misses new frames; nothing is
 * queued for it.
 */
export class ScreenStreamPipeline extends EventEmitter<StreamEvents> {
  private readonly recipients = new Map<string, RecipientState>();
  private readonly options: StreamOptions;
  private readonly log: Logger;
  private settings: StreamSettings | null = null;
  private timer: NodeJS.Timeout | null = null;
  private capturing = false;
  private generation = 0;
  private sequence = 0;
  private latest: EncodedFrame | undefined;
  private framesCaptured = 0;
  private framesSent = 0;
  private framesDropped = 0;

  constructor(
    private readonly transport: FrameTransport,
    private readonly source: CaptureSource,
    options: Partial<StreamOptions> & { sessionCode?: string } = {},
  ) {
    super();
    this.options = {
      maxOutstandingFrames: options.maxOutstandingFrames ?? config.maxOutstandingFrames,
      tiers: options.tiers ?? qualityTiers,
    };
    this.log = createLogger({ module: 'stream', sessionCode: options.sessionCode });
  }

  get isActive(): boolean {
    return this.settings !== null;
  }

  get currentSettings(): StreamSettings | null {
    return this.settings ? { ...this.settings } : null;
  }

  /**
   * (Re)starts the capture loop. Monitor and quality are fixed for the
   * lifetime of one loop; changing them means calling start again.
   */
  async start(settings: StreamSettings): Promise<void> {
    this.stop();
    const generation = this.generation;
    const tier = this.options.tiers[settings.quality];

    try {
      await this.source.open(settings.monitorIndex, settings.quality, tier);
    } catch (error) {
      const failure =
        error instanceof CaptureUnavailableError ? error : new CaptureUnavailableError(toError(error).message);
      this.log.warn({ monitorIndex: settings.monitorIndex, reason: failure.message }, 'capture_unavailable');
      throw failure;
    }

    if (generation !== this.generation) {
      // A stop or another start won the race while the source was opening.
      return;
    }

    this.settings = { ...settings };
    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        this.log.error({ err: toError(error) }, 'stream_tick_failed');
      });
    }, tier.frameIntervalMs);
    this.log.info(
      { quality: settings.quality, monitorIndex: settings.monitorIndex, target: settings.participantId ?? 'all' },
      'stream_started',
    );
  }

  stop(): void {
    this.generation += 1;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.settings) {
      this.source.close();
      this.settings = null;
      this.log.info({ framesSent: this.framesSent, framesDropped: this.framesDropped }, 'stream_stopped');
    }
    this.recipients.clear();
    this.latest = undefined;
  }

  /**
   * One capture beat. Skipped while the previous capture is still running.
   */
  async tick(): Promise<void> {
    const settings = this.settings;
    if (!settings || this.capturing) return;
    const generation = this.generation;

    this.capturing = true;
    let image: Buffer | undefined;
    try {
      image = await this.source.grab();
    } catch (error) {
      this.log.warn({ err: toError(error) }, 'capture_failed');
      return;
    } finally {
      this.capturing = false;
    }
    if (!image || generation !== this.generation) return;

    this.sequence += 1;
    const frame: Frame = {
      sequenceNumber: this.sequence,
      capturedAt: Date.now(),
      quality: settings.quality,
      payload: image,
      monitorIndex: settings.monitorIndex,
    };
    const encoded: EncodedFrame = { frame, base64: image.toString('base64') };
    this.latest = encoded;
    this.framesCaptured += 1;
    this.emit('frame', frame);

    for (const participantId of this.targets(settings)) {
      this.deliver(participantId, encoded);
    }
  }

  /**
   * Cumulative: acknowledges every frame up to and including the sequence
   * number. Freed capacity is used at once for the newest unsent frame.
   */
  acknowledge(participantId: string, sequenceNumber: number): void {
    const state = this.recipients.get(participantId);
    if (!state || sequenceNumber > state.lastSent) return;
    state.outstanding = state.outstanding.filter((sent) => sent > sequenceNumber);

    const latest = this.latest;
    const settings = this.settings;
    if (
      latest &&
      settings &&
      latest.frame.sequenceNumber > state.lastSent &&
      this.isTarget(settings, participantId)
    ) {
      this.deliver(participantId, latest);
    }
  }

  outstandingFor(participantId: string): number {
    return this.recipients.get(participantId)?.outstanding.length ?? 0;
  }

  removeRecipient(participantId: string): void {
    this.recipients.delete(participantId);
  }

  stats(): StreamStats {
    return {
      active: this.isActive,
      framesCaptured: this.framesCaptured,
      framesSent: this.framesSent,
      framesDropped: this.framesDropped,
    };
  }

  private deliver(participantId: string, encoded: EncodedFrame): boolean {
    let state = this.recipients.get(participantId);
    if (!state) {
      state = { outstanding: [], lastSent: 0 };
      this.recipients.set(participantId, state);
    }

    const { frame } = encoded;
    if (state.outstanding.length >= this.options.maxOutstandingFrames) {
      this.framesDropped += 1;
      this.emit('dropped', participantId, frame.sequenceNumber);
      return false;
    }

    try {
      this.transport.send(participantId, {
        type: 'FrameData',
        payload: {
          sequenceNumber: frame.sequenceNumber,
          quality: frame.quality,
          monitorIndex: frame.monitorIndex,
          capturedAt: frame.capturedAt,
          payload: encoded.base64,
        },
      });
    } catch (error) {
      if (error instanceof UnknownParticipantError) {
        this.recipients.delete(participantId);
      } else {
        this.log.warn({ participantId, err: toError(error) }, 'frame_delivery_failed');
      }
      return false;
    }

    state.outstanding.push(frame.sequenceNumber);
    state.lastSent = frame.sequenceNumber;
    this.framesSent += 1;
    return true;
  }

  private targets(settings: StreamSettings): string[] {
    if (settings.participantId === undefined) {
      return this.transport.participantIds();
    }
    return this.transport.has(settings.participantId) ? [settings.participantId] : [];
  }

  private isTarget(settings: StreamSettings, participantId: string): boolean {
    return settings.participantId === undefined || settings.participantId === participantId;
  }
}
