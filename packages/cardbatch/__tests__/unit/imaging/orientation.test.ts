import { describe, expect, test } from 'vitest';
import {
  OrientationCode,
  classifyImage,
  isOrientationCandidate,
  isOrientationCode,
  toImageFile,
} from '../../../src/imaging/orientation';

describe('classifyImage', () => {
  test('names containing "front" are fronts, in any case', () => {
    expect(classifyImage('card_front.jpg')).toBe('front');
    expect(classifyImage('CARD_FRONT.JPG')).toBe('front');
    expect(classifyImage('FrontSide.png')).toBe('front');
  });

  test('names containing "back" are backs', () => {
    expect(classifyImage('card_back.jpg')).toBe('back');
    expect(classifyImage('Back-001.tif')).toBe('back');
  });

  test('a name containing both resolves to front', () => {
    expect(classifyImage('front_and_back.jpg')).toBe('front');
    expect(classifyImage('back_then_front.jpg')).toBe('front');
  });

  test('anything else is unclassified', () => {
    expect(classifyImage('scan_001.jpg')).toBe('unclassified');
    expect(classifyImage('')).toBe('unclassified');
  });
});

describe('isOrientationCandidate', () => {
  test('accepts the supported extensions case-insensitively', () => {
    for (const name of ['a.jpg', 'a.JPEG', 'a.png', 'a.tiff', 'a.TIF', 'a.bmp']) {
      expect(isOrientationCandidate(name)).toBe(true);
    }
  });

  test('rejects other files', () => {
    expect(isOrientationCandidate('notes.txt')).toBe(false);
    expect(isOrientationCandidate('image.webp')).toBe(false);
    expect(isOrientationCandidate('jpg')).toBe(false);
  });
});

describe('toImageFile', () => {
  test('fronts target Rotate270CW and backs Rotate90CW', () => {
    expect(toImageFile('/cards/x_front.jpg')).toEqual({
      path: '/cards/x_front.jpg',
      category: 'front',
      targetOrientation: 8,
    });
    expect(toImageFile('/cards/x_back.jpg')).toEqual({
      path: '/cards/x_back.jpg',
      category: 'back',
      targetOrientation: 6,
    });
  });

  test('unclassified files carry no target', () => {
    const image = toImageFile('/cards/other.jpg');
    expect(image.category).toBe('unclassified');
    expect(image.targetOrientation).toBeUndefined();
  });

  test('classification uses the file name, not the directory', () => {
    expect(toImageFile('/fronts/scan.jpg').category).toBe('unclassified');
  });
});

describe('isOrientationCode', () => {
  test('accepts 1 through 8', () => {
    expect(isOrientationCode(OrientationCode.Normal)).toBe(true);
    expect(isOrientationCode(OrientationCode.Rotate270CW)).toBe(true);
  });

  test('rejects everything else', () => {
    expect(isOrientationCode(0)).toBe(false);
    expect(isOrientationCode(9)).toBe(false);
    expect(isOrientationCode(6.5)).toBe(false);
    expect(isOrientationCode('6')).toBe(false);
    expect(isOrientationCode(undefined)).toBe(false);
  });
});
