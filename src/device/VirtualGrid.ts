/**
 * VirtualGrid - In-process grid device
 *
 * Behaves like a connected hardware grid: lifecycle callbacks, key events,
 * and a record of what was last rendered. Used by tests and by the
 * terminal simulator.
 */

import type { GridKeyEvent } from '../types';
import type { FrameBuffer } from '../render/FrameBuffer';
import type { GridDevice, Unsubscribe } from './types';

export class VirtualGrid implements GridDevice {
  width = 0;
  height = 0;
  connected = false;

  /** Copy of the most recently transmitted frame */
  lastFrame: FrameBuffer | null = null;
  /** Frames transmitted since construction */
  frameCount = 0;
  /** When set, render() rejects with this error instead of storing the frame */
  failWith: Error | null = null;

  private readyListeners = new Set<() => void>();
  private disconnectListeners = new Set<() => void>();
  private keyListeners = new Set<(event: GridKeyEvent) => void>();

  onReady(listener: () => void): Unsubscribe {
    this.readyListeners.add(listener);
    return () => this.readyListeners.delete(listener);
  }

  onDisconnect(listener: () => void): Unsubscribe {
    this.disconnectListeners.add(listener);
    return () => this.disconnectListeners.delete(listener);
  }

  onKey(listener: (event: GridKeyEvent) => void): Unsubscribe {
    this.keyListeners.add(listener);
    return () => this.keyListeners.delete(listener);
  }

  render(frame: FrameBuffer): Promise<void> {
    if (this.failWith) {
      return Promise.reject(this.failWith);
    }
    this.lastFrame = frame.copy();
    this.frameCount++;
    return Promise.resolve();
  }

  // ===========================================================================
  // Simulation controls
  // ===========================================================================

  connect(width: number, height: number): void {
    this.width = width;
    this.height = height;
    this.connected = true;
    this.readyListeners.forEach(cb => cb());
  }

  disconnect(): void {
    if (!this.connected) return;
    this.connected = false;
    this.disconnectListeners.forEach(cb => cb());
  }

  key(x: number, y: number, pressed: boolean): void {
    if (!this.connected) return;
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) return;
    const event: GridKeyEvent = { x, y, pressed };
    this.keyListeners.forEach(cb => cb(event));
  }

  press(x: number, y: number): void {
    this.key(x, y, true);
  }

  release(x: number, y: number): void {
    this.key(x, y, false);
  }

  tap(x: number, y: number): void {
    this.press(x, y);
    this.release(x, y);
  }
}
