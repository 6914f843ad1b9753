import { describe, it, expect } from 'vitest';
import { FrameBuffer } from '../../../src/render/FrameBuffer';
import { composeFrame, type FrameSource } from '../../../src/render/composeFrame';
import { resolveConfig } from '../../../src/config/defaults';
import { createControl } from '../../../src/engine/controls';
import { createPointShape, createRectangleShape } from '../../../src/utils/shapes';
import { renderFrameHex } from '../../../src/device/ascii';
import type { Control } from '../../../src/types';

const grid = { width: 8, height: 8 };
const config = resolveConfig();

const source = (controls: Control[], overrides: Partial<FrameSource> = {}): FrameSource => ({
  grid,
  controls: new Map(controls.map((c) => [c.id, c])),
  pendingPoints: [],
  mode: 'normal',
  selectedControlId: null,
  ...overrides,
});

describe('FrameBuffer', () => {
  it('clamps and rounds levels', () => {
    const frame = new FrameBuffer(4, 2);
    frame.setLevel(0, 0, 20);
    frame.setLevel(1, 0, -3);
    frame.setLevel(2, 0, 6.6);
    expect(frame.toRows()).toEqual([
      [15, 0, 7, 0],
      [0, 0, 0, 0],
    ]);
  });

  it('ignores writes outside the grid', () => {
    const frame = new FrameBuffer(2, 2);
    frame.setLevel(2, 0, 9);
    frame.setLevel(0, -1, 9);
    frame.setLevel(0.5, 0, 9);
    expect(frame.isDark()).toBe(true);
    expect(frame.getLevel(5, 5)).toBe(0);
  });

  it('copies independently', () => {
    const frame = new FrameBuffer(2, 1);
    frame.fill(5);
    const copy = frame.copy();
    frame.clear();
    expect(copy.toRows()).toEqual([[5, 5]]);
    expect(frame.isDark()).toBe(true);
  });
});

describe('composeFrame', () => {
  it('draws an idle rectangle at its base level and the idle meta key', () => {
    const rect = createControl('RECT01', createRectangleShape({ x: 1, y: 1 }, { x: 2, y: 2 }));
    const frame = composeFrame(source([rect]), config, 0);
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
  });

  it('draws an active control at its peak under the static policy', () => {
    const point = { ...createControl('PT0001', createPointShape({ x: 6, y: 0 })), state: 1, lastTouch: 0 };
    const frame = composeFrame(source([point]), config, 60_000);
    expect(frame.getLevel(6, 0)).toBe(15);
  });

  it('fills a slider up to its value column', () => {
    const slider = {
      ...createControl('SLIDE1', createRectangleShape({ x: 0, y: 0 }, { x: 4, y: 1 }), { variant: 'slider' }),
      state: 0.5,
    };
    const frame = composeFrame(source([slider]), config, 0);
    expect(renderFrameHex(frame).slice(0, 2)).toEqual(['fff33000', 'fff33000']);
  });

  it('steps a flash down from peak and settles at base', () => {
    const flashConfig = resolveConfig({ brightnessPolicy: 'flash' });
    const point = { ...createControl('PT0001', createPointShape({ x: 3, y: 3 })), state: 1, lastTouch: 1000 };
    const at = (now: number) => composeFrame(source([point]), flashConfig, now).getLevel(3, 3);

    expect(at(1000)).toBe(15);
    expect(at(1150)).toBe(11);
    expect(at(1399)).toBe(3);
    expect(at(1500)).toBe(3);
  });

  it('draws pending points over controls', () => {
    const rect = createControl('RECT01', createRectangleShape({ x: 1, y: 1 }, { x: 2, y: 2 }));
    const frame = composeFrame(source([rect], { pendingPoints: [{ x: 2, y: 2 }, { x: 5, y: 5 }] }), config, 0);
    expect(frame.getLevel(1, 1)).toBe(3);
    expect(frame.getLevel(2, 2)).toBe(15);
    expect(frame.getLevel(5, 5)).toBe(15);
  });

  it('shows the affordances beside the selection in meta mode', () => {
    const rect = createControl('RECT01', createRectangleShape({ x: 1, y: 1 }, { x: 2, y: 2 }));
    const frame = composeFrame(source([rect], { mode: 'meta', selectedControlId: 'RECT01' }), config, 0);
    expect(renderFrameHex(frame).slice(0, 3)).toEqual(['00000000', '033c6000', '03390000']);
    expect(frame.getLevel(0, 7)).toBe(15);
  });

  it('hides the affordances without a resolvable selection', () => {
    const rect = createControl('RECT01', createRectangleShape({ x: 1, y: 1 }, { x: 2, y: 2 }));
    const frame = composeFrame(source([rect], { mode: 'meta', selectedControlId: 'GONE00' }), config, 0);
    expect(frame.getLevel(3, 1)).toBe(0);
    expect(frame.getLevel(0, 7)).toBe(15);
  });

  it('overwrites every cell of a reused frame', () => {
    const frame = FrameBuffer.forGrid(grid);
    frame.fill(9);
    composeFrame(source([]), config, 0, frame);
    expect(frame.getLevel(7, 0)).toBe(0);
    expect(frame.getLevel(0, 7)).toBe(4);
  });
});
