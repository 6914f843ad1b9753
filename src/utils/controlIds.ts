/**
 * Control ID Utilities
 *
 * Control IDs are short uppercase codes (e.g. `Q7K2ZD`) drawn uniformly at
 * random from A-Z and 0-9. A draw that collides with a live ID is rejected
 * and redrawn.
 */

export const CONTROL_ID_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

export const DEFAULT_CONTROL_ID_LENGTH = 6;

export type RandomSource = () => number;

function drawId(length: number, random: RandomSource): string {
  let id = '';
  for (let i = 0; i < length; i++) {
    const index = Math.floor(random() * CONTROL_ID_ALPHABET.length);
    id += CONTROL_ID_ALPHABET[Math.min(index, CONTROL_ID_ALPHABET.length - 1)];
  }
  return id;
}

/**
 * Draw a fresh ID that is not in `existing`
 */
export function generateUniqueId(
  existing: Iterable<string>,
  length: number = DEFAULT_CONTROL_ID_LENGTH,
  random: RandomSource = Math.random
): string {
  const taken = new Set(existing);
  for (;;) {
    const id = drawId(length, random);
    if (!taken.has(id)) {
      return id;
    }
  }
}

/**
 * Check that a string has the shape of a control ID
 */
export function isControlId(value: string, length: number = DEFAULT_CONTROL_ID_LENGTH): boolean {
  if (value.length !== length) {
    return false;
  }
  return [...value].every((ch) => CONTROL_ID_ALPHABET.includes(ch));
}
