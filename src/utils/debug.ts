/**
 * Tagged debug system
 *
 * Usage:
 *   debug('edit', `Created ${id}`);
 *   debug('touch', `${id} pressed`);
 *
 * Control active tags:
 *   enableDebugTag('edit');
 *   disableDebugTag('edit');
 *   setDebugTags(['edit', 'touch']);
 *   getDebugTags(); // returns current active tags
 *
 * Only messages with active tags are recorded. A sink (e.g. console.log)
 * receives every recorded line as it is written.
 */

export type DebugSink = (line: string) => void;

let debugContent: string = '';
let sink: DebugSink | null = null;
const activeTags = new Set<string>();

// Internal: append a line to debug content
const appendLine = (line: string): void => {
  if (debugContent) {
    debugContent += '\n' + line;
  } else {
    debugContent = line;
  }
  sink?.(line);
};

/**
 * Log a debug message with a tag. Only outputs if the tag is active.
 */
export const debug = (tag: string, content: string): void => {
  if (!activeTags.has(tag)) return;

  const timestamp = new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
  appendLine(`[${timestamp}] [${tag}] ${content}`);
};

/**
 * Enable a debug tag
 */
export const enableDebugTag = (tag: string): void => {
  activeTags.add(tag);
};

/**
 * Disable a debug tag
 */
export const disableDebugTag = (tag: string): void => {
  activeTags.delete(tag);
};

/**
 * Set all active debug tags (replaces existing)
 */
export const setDebugTags = (tags: string[]): void => {
  activeTags.clear();
  tags.forEach(tag => activeTags.add(tag));
};

export const getDebugTags = (): string[] => {
  return Array.from(activeTags);
};

export const isDebugTagActive = (tag: string): boolean => {
  return activeTags.has(tag);
};

/**
 * Forward recorded lines somewhere (pass null to stop forwarding)
 */
export const setDebugSink = (next: DebugSink | null): void => {
  sink = next;
};

/**
 * Append untagged debug content (always outputs, no filtering)
 */
export const appendDebug = (content: string): void => {
  appendLine(content);
};

export const getDebug = (): string => debugContent;

export const hasDebug = (): boolean => debugContent.length > 0;

export const clearDebug = (): void => {
  debugContent = '';
};
