/**
 * Drive a virtual grid through a short editing session and print each
 * frame as text.
 *
 * Usage:
 *   npx tsx scripts/simulate-grid.ts [width] [height]
 *
 * Environment:
 *   GRID_FRAME_INTERVAL_MS, GRID_DOUBLE_PRESS_MS, GRID_BRIGHTNESS_POLICY
 *   GRID_DEBUG_TAGS=edit,touch,mode,session,render
 */

import { configFromEnv, debugTagsFromEnv, type EditorConfig } from '../src/config/defaults';
import { renderFrameAscii } from '../src/device/ascii';
import { VirtualGrid } from '../src/device/VirtualGrid';
import { GridSession } from '../src/engine/GridSession';
import { setDebugSink, setDebugTags } from '../src/utils/debug';

const width = Number(process.argv[2] ?? 16);
const height = Number(process.argv[3] ?? 8);
if (!Number.isInteger(width) || !Number.isInteger(height) || width < 16 || height < 8) {
  console.error('Usage: npx tsx scripts/simulate-grid.ts [width >= 16] [height >= 8]');
  process.exit(1);
}

function loadConfig(): EditorConfig {
  try {
    return configFromEnv(process.env);
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  }
}

const config = loadConfig();

setDebugTags(debugTagsFromEnv(process.env));
setDebugSink((line) => console.log(line));

const grid = new VirtualGrid();
const session = new GridSession(grid, { config });
grid.connect(width, height);

const metaKey = { x: 0, y: height - 1 };

const steps: Array<[string, () => void]> = [
  ['rectangle (1,1)-(3,3)', () => {
    grid.press(1, 1);
    grid.press(3, 3);
    grid.release(3, 3);
    grid.release(1, 1);
  }],
  ['tap inside the rectangle', () => grid.tap(2, 2)],
  ['triangle (6,0) (9,0) (6,3)', () => {
    grid.press(6, 0);
    grid.press(9, 0);
    grid.press(6, 3);
    grid.release(6, 3);
    grid.release(9, 0);
    grid.release(6, 0);
  }],
  ['meta: create a point at (12,0) and copy it', () => {
    grid.press(metaKey.x, metaKey.y);
    grid.tap(12, 0);
    // increment (13,0), decrement (14,0), copy/delete (13,1)
    grid.tap(13, 0);
    grid.tap(13, 1);
  }],
  ['meta: paste at (12,4), release meta', () => {
    grid.tap(12, 4);
    grid.release(metaKey.x, metaKey.y);
  }],
];

for (const [label, run] of steps) {
  run();
  session.renderNow();
  console.log(`\n# ${label}`);
  console.log(grid.lastFrame ? renderFrameAscii(grid.lastFrame) : '(no frame)');
}

const controls = [...session.store.getState().controls.values()];
console.log(`\n${controls.length} controls: ${controls.map((c) => `${c.id} ${c.variant} ${c.shape.kind}`).join(', ')}`);

session.dispose();
