/**
 * Menu Answer Parsing
 */

const INTEGER_PATTERN = /^[+-]?\d+$/;

export const FILE_CANCEL_KEYWORDS: readonly string[] = ['cancel', 'back', 'q', 'quit', 'exit'];

/**
 * Parse a whole-number answer; null when the text is not an integer
 */
export function parseInteger(answer: string): number | null {
  const text = answer.trim();
  return INTEGER_PATTERN.test(text) ? Number.parseInt(text, 10) : null;
}

/**
 * Whether the answer is one of the given keywords, ignoring case and surrounding spaces
 */
export function isKeyword(answer: string, keywords: readonly string[]): boolean {
  return keywords.includes(answer.trim().toLowerCase());
}

/**
 * File selection, with 1-based indices
 */
export type FileSelection =
  | { kind: 'cancel'; rejected?: number[] }
  | { kind: 'all' }
  | { kind: 'single'; index: number }
  | { kind: 'list'; indices: number[]; rejected: number[] }
  | { kind: 'invalid' }
  | { kind: 'malformed' };

/**
 * Interpret an answer to the file menu for `count` listed files.
 *
 * Lists are comma-separated and read in order. A 0 cancels the whole list
 * (indices rejected before it are still reported), while an out-of-range
 * index is only rejected on its own.
 */
export function parseFileSelection(answer: string, count: number): FileSelection {
  if (isKeyword(answer, FILE_CANCEL_KEYWORDS)) {
    return { kind: 'cancel' };
  }

  const inRange = (index: number) => index >= 1 && index <= count;

  if (answer.includes(',')) {
    const values: number[] = [];
    for (const piece of answer.split(',')) {
      const value = parseInteger(piece);
      if (value === null) {
        return { kind: 'malformed' };
      }
      values.push(value);
    }

    const indices: number[] = [];
    const rejected: number[] = [];
    for (const value of values) {
      if (value === 0) {
        return { kind: 'cancel', rejected };
      }
      (inRange(value) ? indices : rejected).push(value);
    }

    return { kind: 'list', indices, rejected };
  }

  const value = parseInteger(answer);
  if (value === null) {
    return { kind: 'malformed' };
  }
  if (value === -1) {
    return { kind: 'all' };
  }
  if (value === 0) {
    return { kind: 'cancel' };
  }
  return inRange(value) ? { kind: 'single', index: value } : { kind: 'invalid' };
}
