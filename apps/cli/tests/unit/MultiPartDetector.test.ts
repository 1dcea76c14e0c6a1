import { describe, it, expect } from 'vitest';
import {
  baseName,
  findSiblingParts,
  isAnyPart,
  isFirstPart,
} from '../../src/utils/MultiPartDetector';
import { createCandidate, createEntry } from '../helpers';

describe('isFirstPart', () => {
  it('should recognize every marker word case-insensitively', () => {
    expect(isFirstPart('Game (USA) (Disc 1)')).toBe(true);
    expect(isFirstPart('Game (USA) (disk  1)')).toBe(true);
    expect(isFirstPart('Game (Side 1)')).toBe(true);
    expect(isFirstPart('Game (TAPE 1)')).toBe(true);
  });

  it('should reject later parts', () => {
    expect(isFirstPart('Game (Disc 2)')).toBe(false);
    expect(isFirstPart('Game (Disc 10)')).toBe(false);
    expect(isFirstPart('Game (USA)')).toBe(false);
  });
});

describe('isAnyPart', () => {
  it('should accept any positive part number', () => {
    expect(isAnyPart('Game (Disc 2)')).toBe(true);
    expect(isAnyPart('Game (Side 12)')).toBe(true);
    expect(isAnyPart('Game (Disc 0)')).toBe(false);
    expect(isAnyPart('Game (Disco 1)')).toBe(false);
  });
});

describe('baseName', () => {
  it('should remove a trailing marker', () => {
    expect(baseName('Game (USA) (Disc 2)')).toBe('Game (USA)');
  });

  it('should leave names without a trailing marker unchanged', () => {
    expect(baseName('Game (Disc 1) (USA)')).toBe('Game (Disc 1) (USA)');
    expect(baseName('Game (USA)')).toBe('Game (USA)');
  });
});

describe('findSiblingParts', () => {
  const disc1 = createCandidate(createEntry('Epic Quest (USA) (Disc 1)', 0));
  const disc2 = createCandidate(createEntry('Epic Quest (USA) (Disc 2)', 1));
  const disc3 = createCandidate(createEntry('Epic Quest (USA) (Disc 3)', 2));
  const otherRegion = createCandidate(createEntry('Epic Quest (Europe) (Disc 2)', 3));
  const single = createCandidate(createEntry('Epic Quest (USA)', 4));

  it('should collect the other parts of the same release', () => {
    expect(findSiblingParts(disc1, [disc1, disc2, otherRegion, disc3, single])).toEqual([disc2, disc3]);
  });

  it('should return nothing when the primary is not a first part', () => {
    expect(findSiblingParts(disc2, [disc1, disc3])).toEqual([]);
    expect(findSiblingParts(single, [disc1, disc2])).toEqual([]);
  });
});
