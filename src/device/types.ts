/**
 * Grid Device collaborator
 *
 * Whatever connects to the physical grid (serial, OSC, a simulator) is seen
 * by the editor only through this interface.
 */

import type { GridKeyEvent } from '../types';
import type { FrameBuffer } from '../render/FrameBuffer';

export type Unsubscribe = () => void;

export interface GridDevice {
  // Valid once ready has fired; fixed for the session
  readonly width: number;
  readonly height: number;
  readonly connected: boolean;

  onReady(listener: () => void): Unsubscribe;
  onDisconnect(listener: () => void): Unsubscribe;
  onKey(listener: (event: GridKeyEvent) => void): Unsubscribe;

  /**
   * Transmit a complete frame. May resolve later or reject; callers do not
   * wait on it. The frame is never written to after the call, so it may be
   * read asynchronously.
   */
  render(frame: FrameBuffer): void | Promise<void>;
}
