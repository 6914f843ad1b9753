/**
 * Grid session lifecycle
 *
 * A virtual grid drives a session end to end: ready, editing through key
 * events, disconnect, reconnect and disposal.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { GridSession } from '../../../src/engine/GridSession';
import { VirtualGrid } from '../../../src/device/VirtualGrid';
import { renderFrameHex } from '../../../src/device/ascii';

describe('GridSession', () => {
  let grid: VirtualGrid;
  let session: GridSession;
  let clock: number;

  const state = () => session.store.getState();

  beforeEach(() => {
    clock = 0;
    let draws = 0;
    grid = new VirtualGrid();
    session = new GridSession(grid, {
      // Long interval: frames in these tests come from ready and renderNow
      config: { frameIntervalMs: 60_000 },
      now: () => clock,
      random: () => (draws++ % 36) / 36,
    });
  });

  afterEach(() => {
    session.dispose();
  });

  it('waits for the grid before rendering', () => {
    expect(session.rendering).toBe(false);
    expect(grid.frameCount).toBe(0);

    grid.connect(8, 8);
    expect(session.rendering).toBe(true);
    expect(state().grid).toEqual({ width: 8, height: 8 });
    expect(grid.frameCount).toBe(1);
    expect(grid.lastFrame?.getLevel(0, 7)).toBe(4);
  });

  it('edits from key events and shows the result', () => {
    grid.connect(8, 8);
    grid.press(1, 1);
    grid.press(2, 2);
    grid.release(2, 2);
    grid.release(1, 1);
    session.renderNow();

    expect(state().controls.size).toBe(1);
    const frame = grid.lastFrame;
    expect(frame).not.toBeNull();
    if (frame) {
      expect(renderFrameHex(frame)).toEqual([
        '00000000',
        '03300000',
        '03300000',
        '00000000',
        '00000000',
        '00000000',
        '00000000',
        '40000000',
      ]);
    }
  });

  it('resets on disconnect but keeps the clipboard for the next grid', () => {
    grid.connect(8, 8);
    grid.press(0, 7);
    grid.tap(2, 2);
    grid.tap(3, 3);
    const copied = state().clipboard;
    expect(copied).not.toBeNull();

    grid.disconnect();
    expect(session.rendering).toBe(false);
    expect(state().controls.size).toBe(0);
    expect(state().mode).toBe('normal');
    expect(state().clipboard).toBe(copied);

    grid.connect(16, 8);
    expect(session.rendering).toBe(true);
    expect(state().grid).toEqual({ width: 16, height: 8 });
    expect(state().clipboard).toBe(copied);
    expect(state().pasteAt(10, 3).ok).toBe(true);
  });

  it('ignores keys while disconnected', () => {
    grid.connect(8, 8);
    grid.disconnect();
    grid.press(4, 4);
    expect(state().pendingPoints).toEqual([]);

    grid.connect(8, 8);
    grid.press(4, 4);
    expect(state().pendingPoints).toEqual([{ x: 4, y: 4 }]);
  });

  it('leaves the grid dark and detached after dispose', () => {
    grid.connect(8, 8);
    grid.press(0, 7);
    grid.tap(2, 2);
    grid.release(0, 7);
    session.renderNow();
    expect(grid.lastFrame?.isDark()).toBe(false);

    session.dispose();
    expect(session.rendering).toBe(false);
    expect(grid.lastFrame?.isDark()).toBe(true);

    const frames = grid.frameCount;
    grid.tap(5, 5);
    session.renderNow();
    expect(grid.frameCount).toBe(frames);
    expect(state().pendingPoints).toEqual([]);
  });

  it('starts at once on a grid that is already connected', () => {
    session.dispose();
    grid.connect(16, 8);
    session = new GridSession(grid, { config: { frameIntervalMs: 60_000 } });

    expect(session.rendering).toBe(true);
    expect(state().grid).toEqual({ width: 16, height: 8 });
  });

  it('keeps handling keys while frames fail', async () => {
    grid.connect(8, 8);
    grid.failWith = new Error('link down');
    session.renderNow();
    await Promise.resolve();
    await Promise.resolve();
    expect(session.failedFrames).toBe(1);

    grid.press(0, 7);
    grid.tap(4, 4);
    expect(state().controls.size).toBe(1);
  });
});
