/**
 * RenderLoop - Fixed-rate frame composition and transmission
 *
 * Every `frameIntervalMs` the loop reads one snapshot of the editor,
 * composes a frame and hands it to the device. Transmission is not awaited:
 * a slow or failing device never delays the next tick or key handling, and
 * a failed frame is simply replaced by the next one.
 */

import type { EditorConfig } from '../config/defaults';
import type { GridDevice } from '../device/types';
import { debug } from '../utils/debug';
import { composeFrame, type FrameSource } from './composeFrame';
import { FrameBuffer } from './FrameBuffer';

export interface RenderLoopOptions {
  device: GridDevice;
  source: () => FrameSource;
  config: EditorConfig;
  now?: () => number;
}

export class RenderLoop {
  private readonly device: GridDevice;
  private readonly source: () => FrameSource;
  private readonly config: EditorConfig;
  private readonly now: () => number;

  private interval: ReturnType<typeof setInterval> | null = null;
  private stopped = true;

  /** Transmissions that rejected or threw */
  failedFrames = 0;

  constructor(options: RenderLoopOptions) {
    this.device = options.device;
    this.source = options.source;
    this.config = options.config;
    this.now = options.now ?? Date.now;
  }

  get isRunning(): boolean {
    return !this.stopped;
  }

  start(): void {
    if (this.interval) return;
    this.stopped = false;
    this.interval = setInterval(() => this.tick(), this.config.frameIntervalMs);
  }

  stop(): void {
    this.stopped = true;
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
  }

  /**
   * Compose and send one frame. Does nothing once stopped.
   * Each tick hands the device a new frame it may keep.
   */
  tick(): void {
    if (this.stopped) return;
    this.transmit(composeFrame(this.source(), this.config, this.now()));
  }

  /**
   * Push one all-dark frame
   */
  clearDevice(): void {
    this.transmit(new FrameBuffer(this.device.width, this.device.height));
  }

  private transmit(frame: FrameBuffer): void {
    try {
      const pending = this.device.render(frame);
      if (pending instanceof Promise) {
        pending.catch((err: unknown) => this.recordFailure(err));
      }
    } catch (err) {
      this.recordFailure(err);
    }
  }

  private recordFailure(err: unknown): void {
    this.failedFrames++;
    debug('render', `Frame transmission failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}
