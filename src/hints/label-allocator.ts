/**
 * Label Allocator
 *
 * Assigns short, unique hint labels to scanned elements. Labels are base-k
 * numerals over the configured alphabet, all of the same length, so no label
 * is a prefix of another.
 */

import { AllocationError, ErrorCode } from '../shared/errors/index.js';
import type { Element, Point } from '../shared/types/index.js';
import { centerOf } from '../shared/types/index.js';

export interface AllocatorOptions {
  /** Ordered label characters; order defines label order */
  alphabet: string;
  /** Shortest label length to use (default: 1) */
  minLength?: number;
  /** Longest label length allowed before allocation fails (default: 4) */
  maxLength?: number;
}

export const DEFAULT_MIN_LABEL_LENGTH = 1;
export const DEFAULT_MAX_LABEL_LENGTH = 4;

/**
 * Why a character cannot appear in a label, or null if it can.
 *
 * Label characters must reach the matcher as plain label keys: digits are
 * read as a repeat count and uppercase letters as Shift.
 */
export function labelCharacterProblem(ch: string): string | null {
  if (ch.length !== 1) {
    return `"${ch}", which is not a single key`;
  }
  if (ch >= '0' && ch <= '9') {
    return `the repeat-count digit "${ch}"`;
  }
  if (ch !== ch.toLowerCase()) {
    return `the Shift-typed letter "${ch}"`;
  }
  if (ch === ' ') {
    return 'a space';
  }
  const code = ch.charCodeAt(0);
  if (code < 0x20 || code === 0x7f) {
    return `the non-printable character ${code}`;
  }
  return null;
}

/**
 * Validate an alphabet and split it into characters
 *
 * @throws AllocationError with INVALID_ALPHABET if empty, containing
 * duplicates or containing characters that cannot be typed as labels
 */
export function alphabetCharacters(alphabet: string): string[] {
  const chars = Array.from(alphabet);
  if (chars.length === 0) {
    throw new AllocationError('Label alphabet must not be empty', ErrorCode.INVALID_ALPHABET);
  }

  const seen = new Set<string>();
  for (const ch of chars) {
    const problem = labelCharacterProblem(ch);
    if (problem) {
      throw new AllocationError(
        `Label alphabet cannot contain ${problem}`,
        ErrorCode.INVALID_ALPHABET,
        { alphabet },
      );
    }
    if (seen.has(ch)) {
      throw new AllocationError(
        `Label alphabet contains "${ch}" more than once`,
        ErrorCode.INVALID_ALPHABET,
        { alphabet },
      );
    }
    seen.add(ch);
  }

  return chars;
}

/**
 * Number of distinct labels of exactly `length` characters
 */
export function labelCapacity(radix: number, length: number): number {
  return radix ** length;
}

/**
 * Minimal label length L >= minLength such that radix^L >= count
 */
export function labelLengthFor(count: number, radix: number, minLength: number): number {
  let length = Math.max(1, minLength);
  if (radix === 1) {
    return length;
  }
  while (labelCapacity(radix, length) < count) {
    length++;
  }
  return length;
}

/**
 * Render `index` as a base-k numeral of exactly `length` digits
 */
function numeral(index: number, chars: readonly string[], length: number): string {
  const radix = chars.length;
  const digits: string[] = new Array<string>(length);
  let n = index;
  for (let pos = length - 1; pos >= 0; pos--) {
    digits[pos] = chars[n % radix];
    n = Math.floor(n / radix);
  }
  return digits.join('');
}

/**
 * Allocate `count` labels.
 *
 * Deterministic: the same inputs always produce the same mapping. The
 * returned map iterates in label order and maps each label to the index of
 * the element it names.
 *
 * @throws AllocationError with TOO_MANY_ELEMENTS when count exceeds alphabet^maxLength
 */
export function allocateLabels(count: number, options: AllocatorOptions): Map<string, number> {
  const chars = alphabetCharacters(options.alphabet);
  const minLength = options.minLength ?? DEFAULT_MIN_LABEL_LENGTH;
  const maxLength = Math.max(options.maxLength ?? DEFAULT_MAX_LABEL_LENGTH, minLength);
  const labels = new Map<string, number>();

  if (count <= 0) {
    return labels;
  }

  const radix = chars.length;
  const capacity = labelCapacity(radix, maxLength);
  const length = labelLengthFor(count, radix, minLength);

  if (count > capacity || length > maxLength) {
    throw AllocationError.tooManyElements(count, capacity, maxLength);
  }

  for (let index = 0; index < count; index++) {
    labels.set(numeral(index, chars, length), index);
  }

  return labels;
}

/**
 * Keep at most `limit` elements, preferring those whose centre lies closest
 * to `origin`. Ties keep scan order; survivors keep their original relative order.
 */
export function truncateByDistance<T extends Element>(
  elements: readonly T[],
  limit: number,
  origin: Point,
): T[] {
  if (elements.length <= limit) {
    return [...elements];
  }

  const ranked = elements
    .map((element, index) => {
      const center = centerOf(element.boundingBox);
      const distance = Math.hypot(center.x - origin.x, center.y - origin.y);
      return { index, distance };
    })
    .sort((a, b) => a.distance - b.distance || a.index - b.index)
    .slice(0, Math.max(0, limit))
    .map((entry) => entry.index)
    .sort((a, b) => a - b);

  return ranked.map((index) => elements[index]);
}

/**
 * Result of labelling a scan
 */
export interface LabelledElements<T extends Element = Element> {
  /** Label -> element, in label order */
  labels: Map<string, T>;
  /** Number of scanned elements dropped to fit the label space */
  truncated: number;
}

/**
 * Label a scan result, truncating the candidates deterministically when they
 * do not fit into alphabet^maxLength labels.
 */
export function labelElements<T extends Element>(
  elements: readonly T[],
  options: AllocatorOptions,
  origin: Point,
): LabelledElements<T> {
  let candidates: readonly T[] = elements;
  let indices: Map<string, number>;

  try {
    indices = allocateLabels(candidates.length, options);
  } catch (error) {
    if (!(error instanceof AllocationError) || error.code !== ErrorCode.TOO_MANY_ELEMENTS) {
      throw error;
    }
    const radix = alphabetCharacters(options.alphabet).length;
    const maxLength = Math.max(
      options.maxLength ?? DEFAULT_MAX_LABEL_LENGTH,
      options.minLength ?? DEFAULT_MIN_LABEL_LENGTH,
    );
    candidates = truncateByDistance(elements, labelCapacity(radix, maxLength), origin);
    indices = allocateLabels(candidates.length, options);
  }

  const labels = new Map<string, T>();
  for (const [label, index] of indices) {
    labels.set(label, candidates[index]);
  }

  return { labels, truncated: elements.length - candidates.length };
}
