/**
 * GridSession - Binds one grid device to an editor store and a render loop
 *
 * Lifecycle:
 * - ready: take the device's size, start from a clean editor, start rendering
 * - disconnect: stop rendering, reset the editor, wait for the next ready
 * - dispose: stop rendering, leave a connected grid dark, detach
 *
 * The clipboard is the only editor state that survives a reconnect.
 */

import { resolveConfig, type EditorConfig, type EditorConfigOverrides } from '../config/defaults';
import type { GridDevice, Unsubscribe } from '../device/types';
import { RenderLoop } from '../render/RenderLoop';
import { createEditorStore, type EditorStore } from '../store/editorStore';
import type { RandomSource } from '../utils/controlIds';
import { debug } from '../utils/debug';

export interface GridSessionOptions {
  config?: EditorConfig | EditorConfigOverrides;
  now?: () => number;
  random?: RandomSource;
}

export class GridSession {
  readonly store: EditorStore;
  readonly config: EditorConfig;
  private readonly device: GridDevice;
  private readonly loop: RenderLoop;
  private subscriptions: Unsubscribe[] = [];
  private disposed = false;

  constructor(device: GridDevice, options: GridSessionOptions = {}) {
    this.device = device;
    this.config = resolveConfig(options.config);
    const now = options.now ?? Date.now;

    this.store = createEditorStore({
      grid: { width: device.width, height: device.height },
      config: this.config,
      now,
      random: options.random,
    });
    this.loop = new RenderLoop({
      device,
      config: this.config,
      now,
      source: () => this.store.getState(),
    });

    this.subscriptions = [
      device.onReady(() => this.handleReady()),
      device.onDisconnect(() => this.handleDisconnect()),
      device.onKey((event) => {
        if (this.device.connected && !this.disposed) {
          this.store.getState().handleKey(event);
        }
      }),
    ];

    // Attaching to an already connected device counts as ready
    if (device.connected) {
      this.handleReady();
    }
  }

  get rendering(): boolean {
    return this.loop.isRunning;
  }

  get failedFrames(): number {
    return this.loop.failedFrames;
  }

  /**
   * Render immediately instead of waiting for the next tick
   */
  renderNow(): void {
    this.loop.tick();
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.loop.stop();
    if (this.device.connected) {
      this.loop.clearDevice();
    }
    this.subscriptions.forEach(unsubscribe => unsubscribe());
    this.subscriptions = [];
    debug('session', 'Session disposed');
  }

  private handleReady(): void {
    if (this.disposed) return;
    const { width, height } = this.device;
    debug('session', `Grid ready: ${width}x${height}`);
    const state = this.store.getState();
    state.setGrid({ width, height });
    state.reset();
    this.loop.start();
    this.loop.tick();
  }

  private handleDisconnect(): void {
    debug('session', 'Grid disconnected');
    this.loop.stop();
    this.store.getState().reset();
  }
}
