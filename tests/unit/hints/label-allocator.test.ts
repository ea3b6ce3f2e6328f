/**
 * Label Allocator Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  allocateLabels,
  alphabetCharacters,
  labelElements,
  labelLengthFor,
  truncateByDistance,
} from '../../../src/hints/label-allocator.js';
import { AllocationError, ErrorCode } from '../../../src/shared/errors/index.js';
import { catchError, makeElement } from '../../helpers/test-utils.js';

describe('alphabetCharacters', () => {
  it('should split the alphabet in order', () => {
    expect(alphabetCharacters('asdf')).toEqual(['a', 's', 'd', 'f']);
  });

  it('should reject an empty alphabet', () => {
    const error = catchError(() => alphabetCharacters(''));
    expect(error).toBeInstanceOf(AllocationError);
    if (error instanceof AllocationError) {
      expect(error.code).toBe(ErrorCode.INVALID_ALPHABET);
    }
  });

  it('should reject repeated characters', () => {
    expect(() => alphabetCharacters('abca')).toThrow('Label alphabet contains "a" more than once');
  });

  it('should reject characters that cannot be typed as label keys', () => {
    expect(() => alphabetCharacters('a12')).toThrow(
      'Label alphabet cannot contain the repeat-count digit "1"'
    );
    expect(() => alphabetCharacters('AB')).toThrow('Label alphabet cannot contain the Shift-typed letter "A"');
    expect(() => alphabetCharacters('a\u{1F600}')).toThrow('which is not a single key');
    expect(() => alphabetCharacters('a b')).toThrow('Label alphabet cannot contain a space');
    expect(() => alphabetCharacters('a\tb')).toThrow('the non-printable character 9');
  });

  it('should report an untypable alphabet as INVALID_ALPHABET', () => {
    const error = catchError(() => alphabetCharacters('12'));
    expect(error).toBeInstanceOf(AllocationError);
    if (error instanceof AllocationError) {
      expect(error.code).toBe(ErrorCode.INVALID_ALPHABET);
    }
  });
});

describe('labelLengthFor', () => {
  it('should choose the shortest length that fits', () => {
    expect(labelLengthFor(3, 3, 1)).toBe(1);
    expect(labelLengthFor(4, 3, 1)).toBe(2);
    expect(labelLengthFor(9, 3, 1)).toBe(2);
    expect(labelLengthFor(10, 3, 1)).toBe(3);
  });

  it('should never go below the minimum length', () => {
    expect(labelLengthFor(2, 26, 2)).toBe(2);
  });
});

describe('allocateLabels', () => {
  it('should give single-character labels when they suffice', () => {
    const labels = allocateLabels(3, { alphabet: 'abc' });
    expect([...labels.entries()]).toEqual([
      ['a', 0],
      ['b', 1],
      ['c', 2],
    ]);
  });

  it('should enumerate fixed-length numerals in alphabet order', () => {
    const labels = allocateLabels(4, { alphabet: 'ab' });
    expect([...labels.keys()]).toEqual(['aa', 'ab', 'ba', 'bb']);
  });

  it('should stop after the requested count', () => {
    const labels = allocateLabels(5, { alphabet: 'abc' });
    expect([...labels.keys()]).toEqual(['aa', 'ab', 'ac', 'ba', 'bb']);
  });

  it('should respect the minimum label length', () => {
    const labels = allocateLabels(2, { alphabet: 'abc', minLength: 2 });
    expect([...labels.keys()]).toEqual(['aa', 'ab']);
  });

  it('should return no labels for no elements', () => {
    expect(allocateLabels(0, { alphabet: 'abc' }).size).toBe(0);
  });

  it('should be deterministic', () => {
    const first = allocateLabels(40, { alphabet: 'asdf' });
    const second = allocateLabels(40, { alphabet: 'asdf' });
    expect([...first.entries()]).toEqual([...second.entries()]);
  });

  it('should produce unique labels where none is a prefix of another', () => {
    const labels = [...allocateLabels(30, { alphabet: 'asdf' }).keys()];

    expect(new Set(labels).size).toBe(30);
    expect(labels.every((label) => label.length === 3)).toBe(true);
    for (const a of labels) {
      for (const b of labels) {
        if (a !== b) {
          expect(b.startsWith(a)).toBe(false);
        }
      }
    }
  });

  it('should fail with TOO_MANY_ELEMENTS beyond alphabet^maxLength', () => {
    const error = catchError(() => allocateLabels(17, { alphabet: 'ab', maxLength: 4 }));

    expect(error).toBeInstanceOf(AllocationError);
    if (error instanceof AllocationError) {
      expect(error.code).toBe(ErrorCode.TOO_MANY_ELEMENTS);
      expect(error.details).toEqual({ count: 17, capacity: 16, maxLength: 4 });
    }
  });

  it('should allow exactly alphabet^maxLength elements', () => {
    expect(allocateLabels(16, { alphabet: 'ab', maxLength: 4 }).size).toBe(16);
  });

  it('should fail for more than one element with a one-character alphabet', () => {
    expect(() => allocateLabels(2, { alphabet: 'a' })).toThrow(AllocationError);
    expect([...allocateLabels(1, { alphabet: 'a' }).keys()]).toEqual(['a']);
  });
});

describe('truncateByDistance', () => {
  const elements = [
    makeElement('far', 990, 990),
    makeElement('near', 0, 0),
    makeElement('middle', 100, 100),
  ];

  it('should keep the closest elements in their original order', () => {
    const kept = truncateByDistance(elements, 2, { x: 0, y: 0 });
    expect(kept.map((element) => element.id)).toEqual(['near', 'middle']);
  });

  it('should measure from the element centre', () => {
    const kept = truncateByDistance(elements, 1, { x: 995, y: 995 });
    expect(kept.map((element) => element.id)).toEqual(['far']);
  });

  it('should keep scan order on ties', () => {
    const tied = [makeElement('one', 0, 10), makeElement('two', 10, 0), makeElement('three', 0, 0)];
    const kept = truncateByDistance(tied, 2, { x: 10, y: 10 });
    expect(kept.map((element) => element.id)).toEqual(['one', 'two']);
  });

  it('should return everything when under the limit', () => {
    expect(truncateByDistance(elements, 5, { x: 0, y: 0 })).toHaveLength(3);
  });
});

describe('labelElements', () => {
  it('should map labels to elements', () => {
    const elements = [makeElement('1', 0, 0), makeElement('2', 20, 0), makeElement('3', 40, 0)];
    const { labels, truncated } = labelElements(elements, { alphabet: 'abc' }, { x: 0, y: 0 });

    expect(truncated).toBe(0);
    expect(labels.get('a')?.id).toBe('1');
    expect(labels.get('b')?.id).toBe('2');
    expect(labels.get('c')?.id).toBe('3');
  });

  it('should truncate the farthest elements when labels run out', () => {
    const elements = [
      makeElement('1', 0, 0),
      makeElement('2', 500, 500),
      makeElement('3', 20, 0),
      makeElement('4', 40, 0),
      makeElement('5', 60, 0),
    ];
    const { labels, truncated } = labelElements(
      elements,
      { alphabet: 'ab', maxLength: 2 },
      { x: 0, y: 0 }
    );

    expect(truncated).toBe(1);
    expect([...labels.entries()].map(([label, element]) => [label, element.id])).toEqual([
      ['aa', '1'],
      ['ab', '3'],
      ['ba', '4'],
      ['bb', '5'],
    ]);
  });

  it('should propagate alphabet errors', () => {
    expect(() => labelElements([makeElement('1', 0, 0)], { alphabet: '' }, { x: 0, y: 0 })).toThrow(
      AllocationError
    );
  });
});
