import { describe, it, expect } from 'vitest';
import {
  calculatePrincipalMoments,
  calculateSignedArea,
  centroidalMoments,
  computeProperties,
  rotatePoint,
  rotateSecondMoments,
  shiftSecondMoments,
  type Point2D,
} from './SectionProperties';
import { DegenerateGeometryError, InvalidGeometryError } from './SectionErrors';

const unitSquare: Point2D[] = [
  { x: 0, y: 0 },
  { x: 1, y: 0 },
  { x: 1, y: 1 },
  { x: 0, y: 1 },
];

// Equal-leg angle 4 × 4 × 1 with the heel at the origin
const angle: Point2D[] = [
  { x: 0, y: 0 },
  { x: 4, y: 0 },
  { x: 4, y: 1 },
  { x: 1, y: 1 },
  { x: 1, y: 4 },
  { x: 0, y: 4 },
];

function rectangle(b: number, h: number, x0 = 0, y0 = 0): Point2D[] {
  return [
    { x: x0, y: y0 },
    { x: x0 + b, y: y0 },
    { x: x0 + b, y: y0 + h },
    { x: x0, y: y0 + h },
  ];
}

describe('computeProperties', () => {
  it('unit square', () => {
    const p = computeProperties({ outer: unitSquare });
    expect(p.area).toBeCloseTo(1, 12);
    expect(p.centroid.x).toBeCloseTo(0.5, 12);
    expect(p.centroid.y).toBeCloseTo(0.5, 12);
    expect(p.Ixx).toBeCloseTo(1 / 12, 12);
    expect(p.Iyy).toBeCloseTo(1 / 12, 12);
    expect(p.Ixy).toBeCloseTo(0, 12);
    expect(p.reference).toEqual(p.centroid);
  });

  it('gives the same result for a clockwise outer ring', () => {
    const p = computeProperties({ outer: [...unitSquare].reverse() });
    expect(p.area).toBeCloseTo(1, 12);
    expect(p.Ixx).toBeCloseTo(1 / 12, 12);
    expect(p.Iyy).toBeCloseTo(1 / 12, 12);
  });

  it('rectangle 50 wide, 100 high', () => {
    const p = computeProperties({ outer: rectangle(50, 100, -25, -50) });
    expect(p.area).toBeCloseTo(5000, 8);
    expect(p.Ixx).toBeCloseTo((50 * 100 ** 3) / 12, 4);
    expect(p.Iyy).toBeCloseTo((100 * 50 ** 3) / 12, 4);
    expect(p.rx).toBeCloseTo(Math.sqrt(100 ** 2 / 12), 8);
    expect(p.polarMoment).toBeCloseTo(p.Ixx + p.Iyy, 4);
  });

  it('subtracts holes regardless of their winding', () => {
    const hole = rectangle(2, 2, 1, 1);
    for (const h of [hole, [...hole].reverse()]) {
      const p = computeProperties({ outer: rectangle(4, 4), holes: [h] });
      expect(p.area).toBeCloseTo(12, 12);
      expect(p.centroid.x).toBeCloseTo(2, 12);
      expect(p.Ixx).toBeCloseTo(20, 10);
      expect(p.Iyy).toBeCloseTo(20, 10);
    }
  });

  it('angle section has a product of inertia and principal axes at 45°', () => {
    const p = computeProperties({ outer: angle });
    expect(p.area).toBeCloseTo(7, 12);
    expect(p.centroid.x).toBeCloseTo(9.5 / 7, 12);
    expect(p.centroid.y).toBeCloseTo(9.5 / 7, 12);
    expect(p.Ixx).toBeCloseTo(9.440476190476, 9);
    expect(p.Ixy).toBeCloseTo(-5.142857142857, 9);
    expect(p.I11).toBeCloseTo(14.583333333333, 9);
    expect(p.I22).toBeCloseTo(4.297619047619, 9);
    expect(p.phi).toBeCloseTo(-Math.PI / 4, 12);
  });

  it('keeps precision far from the origin', () => {
    const p = computeProperties({ outer: rectangle(1, 1, 1e6, 1e6) });
    expect(p.area).toBeCloseTo(1, 9);
    expect(p.centroid.x).toBeCloseTo(1e6 + 0.5, 6);
    expect(p.Ixx).toBeCloseTo(1 / 12, 9);
  });

  it('rejects rings with fewer than 3 points', () => {
    expect(() => computeProperties({ outer: unitSquare.slice(0, 2) })).toThrow(InvalidGeometryError);
    expect(() => computeProperties({ outer: unitSquare, holes: [unitSquare.slice(0, 2)] })).toThrow(
      InvalidGeometryError
    );
  });

  it('rejects non-finite coordinates', () => {
    expect(() => computeProperties({ outer: [...unitSquare.slice(0, 3), { x: NaN, y: 1 }] })).toThrow(
      InvalidGeometryError
    );
  });

  it('fails on a collinear outer ring', () => {
    const line = [{ x: 0, y: 0 }, { x: 1, y: 1 }, { x: 2, y: 2 }];
    expect(() => computeProperties({ outer: line })).toThrow(DegenerateGeometryError);
  });

  it('fails on a hole that encloses no area', () => {
    const flat = [{ x: 0.2, y: 0.5 }, { x: 0.5, y: 0.5 }, { x: 0.8, y: 0.5 }];
    expect(() => computeProperties({ outer: unitSquare, holes: [flat] })).toThrow(InvalidGeometryError);
  });

  it('fails when the holes remove everything', () => {
    expect(() => computeProperties({ outer: unitSquare, holes: [unitSquare] })).toThrow(DegenerateGeometryError);
  });
});

describe('calculateSignedArea', () => {
  it('is positive counter-clockwise and negative clockwise', () => {
    expect(calculateSignedArea(unitSquare)).toBe(1);
    expect(calculateSignedArea([...unitSquare].reverse())).toBe(-1);
  });
});

describe('calculatePrincipalMoments', () => {
  it('returns phi = 0 for an isotropic tensor', () => {
    expect(calculatePrincipalMoments(5, 5, 0)).toEqual({ I11: 5, I22: 5, phi: 0 });
  });

  it('orders the principal moments', () => {
    const { I11, I22, phi } = calculatePrincipalMoments(2, 8, 0);
    expect(I11).toBe(8);
    expect(I22).toBe(2);
    expect(phi).toBeCloseTo(Math.PI / 2, 12);
  });
});

describe('tensor transforms', () => {
  it('quarter turn swaps Ixx and Iyy and negates Ixy', () => {
    const r = rotateSecondMoments({ Ixx: 3, Iyy: 7, Ixy: 2 }, Math.PI / 2);
    expect(r.Ixx).toBeCloseTo(7, 12);
    expect(r.Iyy).toBeCloseTo(3, 12);
    expect(r.Ixy).toBeCloseTo(-2, 12);
  });

  it('rotating by phi removes the product of inertia', () => {
    const p = computeProperties({ outer: angle });
    const r = rotateSecondMoments(p, p.phi);
    expect(r.Ixy).toBeCloseTo(0, 9);
    expect(r.Ixx).toBeCloseTo(p.I11, 9);
    expect(r.Iyy).toBeCloseTo(p.I22, 9);
  });

  it('parallel axis shift and its inverse', () => {
    const shifted = shiftSecondMoments({ Ixx: 1, Iyy: 2, Ixy: 0.5 }, 3, 2, -1);
    expect(shifted).toEqual({ Ixx: 4, Iyy: 14, Ixy: -5.5 });
  });

  it('centroidalMoments undoes a shift to another reference', () => {
    const p = computeProperties({ outer: unitSquare });
    const aboutOrigin = { ...p, reference: { x: 0, y: 0 }, ...shiftSecondMoments(p, p.area, 0.5, 0.5) };
    const back = centroidalMoments(aboutOrigin);
    expect(aboutOrigin.Ixx).toBeCloseTo(1 / 3, 12);
    expect(back.Ixx).toBeCloseTo(1 / 12, 12);
    expect(back.Ixy).toBeCloseTo(0, 12);
  });

  it('rotatePoint turns about a given point', () => {
    const p = rotatePoint({ x: 2, y: 1 }, Math.PI, { x: 1, y: 1 });
    expect(p.x).toBeCloseTo(0, 12);
    expect(p.y).toBeCloseTo(1, 12);
  });
});
