import { describe, it, expect } from 'vitest';
import { InvalidGeometryError } from './SectionErrors';
import { parseSectionGeometry, sectionFromInput } from './SectionGeometryInput';

describe('parseSectionGeometry', () => {
  it('accepts object and tuple points', () => {
    const geometry = parseSectionGeometry({
      outer: [[0, 0], { x: 4, y: 0 }, [4, 4], { x: 0, y: 4 }],
      holes: [[[1, 1], [1, 3], [3, 3], [3, 1]]],
    });
    expect(geometry.outer).toEqual([
      { x: 0, y: 0 },
      { x: 4, y: 0 },
      { x: 4, y: 4 },
      { x: 0, y: 4 },
    ]);
    expect(geometry.holes).toHaveLength(1);
    expect(geometry.holes?.[0][2]).toEqual({ x: 3, y: 3 });
  });

  it('leaves holes out when none are given', () => {
    const geometry = parseSectionGeometry({ outer: [[0, 0], [1, 0], [0, 1]] });
    expect('holes' in geometry).toBe(false);
  });

  it('reports the path of the first problem', () => {
    expect(() => parseSectionGeometry({ outer: [[0, 0], [1, 0]] })).toThrow(
      'Invalid section geometry at outer: a ring needs at least 3 points'
    );
  });

  it('rejects non-finite coordinates', () => {
    try {
      parseSectionGeometry({ outer: [[0, 0], [1, 0], { x: Infinity, y: 1 }] });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidGeometryError);
      if (!(err instanceof InvalidGeometryError)) return;
      expect(err.code).toBe('INVALID_GEOMETRY');
      expect(err.message.startsWith('Invalid section geometry at outer.2')).toBe(true);
      expect(Array.isArray(err.details)).toBe(true);
    }
  });

  it('rejects input that is not an object', () => {
    expect(() => parseSectionGeometry('square')).toThrow(InvalidGeometryError);
    expect(() => parseSectionGeometry(null)).toThrow(InvalidGeometryError);
  });
});

describe('sectionFromInput', () => {
  it('builds a section from parsed input', () => {
    const section = sectionFromInput({
      outer: [[0, 0], [4, 0], [4, 4], [0, 4]],
      holes: [[[1, 1], [3, 1], [3, 3], [1, 3]]],
    });
    const p = section.properties();
    expect(p.area).toBeCloseTo(12, 12);
    expect(p.Ixx).toBeCloseTo(20, 10);
  });
});
