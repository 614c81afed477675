/**
 * SectionProperties - Geometry kernel for cross-section properties
 *
 * Calculates geometric properties of arbitrary cross-sections defined by polygon contours.
 * Supports solid sections and hollow sections (with holes/voids).
 *
 * Uses Green's theorem / shoelace formula for efficient polygon calculations.
 *
 * Properties calculated:
 * - Area (A)
 * - Centroid (xc, yc)
 * - Second moments of area about the centroid (Ixx, Iyy, Ixy)
 * - Principal moments of inertia (I11, I22) and principal axis angle (phi)
 * - Polar moment (Ip)
 * - Radii of gyration (rx, ry, r11, r22)
 *
 * Conventions: Ixx = ∫y² dA, Iyy = ∫x² dA, Ixy = ∫xy dA.
 * Angles are radians, counter-clockwise positive.
 */

import { DEFAULT_SECTION_CONFIG, type SectionConfig } from './SectionConfig';
import { DegenerateGeometryError, InvalidGeometryError } from './SectionErrors';

/** 2D Point */
export interface Point2D {
  x: number;
  y: number;
}

/** Complete section geometry with outer boundary and optional holes */
export interface SectionGeometry {
  outer: Point2D[];
  holes?: Point2D[][];
}

/** Second moment tensor components */
export interface SecondMoments {
  Ixx: number;
  Iyy: number;
  Ixy: number;
}

export interface BoundingBox {
  xmin: number;
  xmax: number;
  ymin: number;
  ymax: number;
}

/**
 * Geometric properties of a section. Second moments and everything derived from them
 * are taken about `reference`.
 */
export interface GeometricProperties {
  reference: Point2D;     // Point the second moments are taken about
  area: number;           // [unit²]
  centroid: Point2D;      // [unit]

  Ixx: number;            // Moment of inertia about x-axis through reference [unit⁴]
  Iyy: number;            // Moment of inertia about y-axis through reference [unit⁴]
  Ixy: number;            // Product of inertia [unit⁴]

  I11: number;            // Maximum principal moment [unit⁴]
  I22: number;            // Minimum principal moment [unit⁴]
  phi: number;            // Rotation aligning the major principal axis with x [radians]
  polarMoment: number;    // Ixx + Iyy [unit⁴]

  rx: number;             // Radius of gyration about x [unit]
  ry: number;             // Radius of gyration about y [unit]
  r11: number;            // Radius of gyration about the major principal axis [unit]
  r22: number;            // Radius of gyration about the minor principal axis [unit]
}

/**
 * Calculate the signed area of a polygon using the shoelace formula.
 * Positive for counter-clockwise, negative for clockwise.
 */
export function calculateSignedArea(points: readonly Point2D[]): number {
  const n = points.length;
  if (n < 3) return 0;

  let area = 0;
  for (let i = 0; i < n; i++) {
    const j = (i + 1) % n;
    area += points[i].x * points[j].y;
    area -= points[j].x * points[i].y;
  }

  return area / 2;
}

/**
 * Calculate the area of a polygon (absolute value).
 */
export function calculateArea(points: readonly Point2D[]): number {
  return Math.abs(calculateSignedArea(points));
}

/**
 * Calculate first moments of area (static moments) about the origin.
 * Qx = ∫y dA (first moment about x-axis)
 * Qy = ∫x dA (first moment about y-axis)
 */
export function calculateFirstMoments(points: readonly Point2D[]): { Qx: number; Qy: number } {
  const n = points.length;
  if (n < 3) return { Qx: 0, Qy: 0 };

  let Qx = 0;
  let Qy = 0;

  for (let i = 0; i < n; i++) {
    const j = (i + 1) % n;
    const cross = points[i].x * points[j].y - points[j].x * points[i].y;

    Qx += (points[i].y + points[j].y) * cross;
    Qy += (points[i].x + points[j].x) * cross;
  }

  return {
    Qx: Qx / 6,
    Qy: Qy / 6
  };
}

/**
 * Calculate second moments of area about the origin.
 * Signed like the area: a clockwise ring yields negated moments.
 *
 * Ixx = ∫y² dA
 * Iyy = ∫x² dA
 * Ixy = ∫xy dA
 */
export function calculateSecondMoments(points: readonly Point2D[]): SecondMoments {
  const n = points.length;
  if (n < 3) return { Ixx: 0, Iyy: 0, Ixy: 0 };

  let Ixx = 0;
  let Iyy = 0;
  let Ixy = 0;

  for (let i = 0; i < n; i++) {
    const j = (i + 1) % n;
    const xi = points[i].x;
    const yi = points[i].y;
    const xj = points[j].x;
    const yj = points[j].y;

    const cross = xi * yj - xj * yi;

    // Ixx = (1/12) * Σ(yi² + yi*yj + yj²) * (xi*yj - xj*yi)
    Ixx += (yi * yi + yi * yj + yj * yj) * cross;

    // Iyy = (1/12) * Σ(xi² + xi*xj + xj²) * (xi*yj - xj*yi)
    Iyy += (xi * xi + xi * xj + xj * xj) * cross;

    // Ixy = (1/24) * Σ(xi*yj + 2*xi*yi + 2*xj*yj + xj*yi) * (xi*yj - xj*yi)
    Ixy += (xi * yj + 2 * xi * yi + 2 * xj * yj + xj * yi) * cross;
  }

  return {
    Ixx: Ixx / 12,
    Iyy: Iyy / 12,
    Ixy: Ixy / 24
  };
}

/**
 * Calculate principal moments of inertia and principal axis angle.
 *
 * I11 = (Ixx + Iyy)/2 + sqrt(((Ixx - Iyy)/2)² + Ixy²)
 * I22 = (Ixx + Iyy)/2 - sqrt(((Ixx - Iyy)/2)² + Ixy²)
 * phi = 0.5 * atan2(2*Ixy, Ixx - Iyy)
 *
 * Rotating the section by phi brings the major principal axis onto x.
 */
export function calculatePrincipalMoments(
  Ixx: number,
  Iyy: number,
  Ixy: number
): { I11: number; I22: number; phi: number } {
  const avg = (Ixx + Iyy) / 2;
  const diff = (Ixx - Iyy) / 2;
  const delta = Math.sqrt(diff * diff + Ixy * Ixy);

  const I11 = avg + delta;
  const I22 = avg - delta;

  // Isotropic tensor: every axis is principal
  let phi = 0;
  if (delta > 1e-12 * Math.abs(avg)) {
    phi = 0.5 * Math.atan2(2 * Ixy, Ixx - Iyy);
  }

  return { I11, I22, phi };
}

/**
 * Rotate a second moment tensor with its section by theta (counter-clockwise).
 */
export function rotateSecondMoments(moments: SecondMoments, theta: number): SecondMoments {
  if (theta === 0) return { ...moments };

  const c = Math.cos(theta);
  const s = Math.sin(theta);
  const { Ixx, Iyy, Ixy } = moments;

  return {
    Ixx: Ixx * c * c + Iyy * s * s + 2 * Ixy * s * c,
    Iyy: Ixx * s * s + Iyy * c * c - 2 * Ixy * s * c,
    Ixy: (Iyy - Ixx) * s * c + Ixy * (c * c - s * s),
  };
}

/**
 * Parallel axis theorem: shift centroidal moments to axes through a point
 * offset (dx, dy) from the centroid.
 */
export function shiftSecondMoments(
  centroidal: SecondMoments,
  area: number,
  dx: number,
  dy: number
): SecondMoments {
  return {
    Ixx: centroidal.Ixx + area * dy * dy,
    Iyy: centroidal.Iyy + area * dx * dx,
    Ixy: centroidal.Ixy + area * dx * dy,
  };
}

/**
 * Centroidal tensor of a property record, whatever point it was stated about.
 */
export function centroidalMoments(props: GeometricProperties): SecondMoments {
  const { area, centroid, reference } = props;
  return shiftSecondMoments(
    { Ixx: props.Ixx, Iyy: props.Iyy, Ixy: props.Ixy },
    -area,
    centroid.x - reference.x,
    centroid.y - reference.y
  );
}

/**
 * Get bounding box of polygon points.
 */
export function getBoundingBox(points: readonly Point2D[]): BoundingBox {
  if (points.length === 0) {
    return { xmin: 0, xmax: 0, ymin: 0, ymax: 0 };
  }

  let xmin = Infinity, xmax = -Infinity;
  let ymin = Infinity, ymax = -Infinity;

  for (const p of points) {
    if (p.x < xmin) xmin = p.x;
    if (p.x > xmax) xmax = p.x;
    if (p.y < ymin) ymin = p.y;
    if (p.y > ymax) ymax = p.y;
  }

  return { xmin, xmax, ymin, ymax };
}

/**
 * Translate polygon points by offset.
 */
export function translatePoints(points: readonly Point2D[], dx: number, dy: number): Point2D[] {
  return points.map(p => ({ x: p.x + dx, y: p.y + dy }));
}

/** Rotate a point counter-clockwise by theta about `about` */
export function rotatePoint(p: Point2D, theta: number, about: Point2D = { x: 0, y: 0 }): Point2D {
  if (theta === 0) return { x: p.x, y: p.y };
  const c = Math.cos(theta);
  const s = Math.sin(theta);
  const x = p.x - about.x;
  const y = p.y - about.y;
  return {
    x: about.x + x * c - y * s,
    y: about.y + x * s + y * c,
  };
}

/**
 * Rotate polygon points counter-clockwise by theta about `about`.
 */
export function rotatePoints(points: readonly Point2D[], theta: number, about?: Point2D): Point2D[] {
  return points.map(p => rotatePoint(p, theta, about));
}

/**
 * Assemble a property record from area, centroid and the tensor about `reference`.
 */
export function buildProperties(
  area: number,
  centroid: Point2D,
  reference: Point2D,
  moments: SecondMoments
): GeometricProperties {
  const { Ixx, Iyy, Ixy } = moments;
  const { I11, I22, phi } = calculatePrincipalMoments(Ixx, Iyy, Ixy);

  const gyration = (I: number) => (area > 0 && I > 0 ? Math.sqrt(I / area) : 0);

  return Object.freeze({
    reference: Object.freeze({ x: reference.x, y: reference.y }),
    area,
    centroid: Object.freeze({ x: centroid.x, y: centroid.y }),
    Ixx, Iyy, Ixy,
    I11, I22, phi,
    polarMoment: Ixx + Iyy,
    rx: gyration(Ixx),
    ry: gyration(Iyy),
    r11: gyration(I11),
    r22: gyration(I22),
  });
}

function assertRing(points: readonly Point2D[], label: string): void {
  if (points.length < 3) {
    throw new InvalidGeometryError(`${label} needs at least 3 points, got ${points.length}`);
  }
  for (const p of points) {
    if (!Number.isFinite(p.x) || !Number.isFinite(p.y)) {
      throw new InvalidGeometryError(`${label} contains a non-finite coordinate`, p);
    }
  }
}

function boxArea(box: BoundingBox): number {
  return (box.xmax - box.xmin) * (box.ymax - box.ymin);
}

/**
 * Calculate the geometric properties of a polygon with optional holes.
 *
 * Rings may be wound either way; the outer ring counts positive and each hole
 * negative. Integration runs about the first outer vertex and the result is
 * shifted to the centroid.
 *
 * Self-intersecting rings and holes outside the outer boundary are not detected.
 */
export function computeProperties(
  geometry: SectionGeometry,
  config: Pick<SectionConfig, 'areaTolerance'> = DEFAULT_SECTION_CONFIG
): GeometricProperties {
  const { outer, holes = [] } = geometry;

  assertRing(outer, 'Outer ring');
  holes.forEach((hole, i) => assertRing(hole, `Hole ${i}`));

  const origin = outer[0];
  const local = (ring: readonly Point2D[]) => translatePoints(ring, -origin.x, -origin.y);

  const outerLocal = local(outer);
  const outerSigned = calculateSignedArea(outerLocal);
  const outerBox = boxArea(getBoundingBox(outer));
  if (Math.abs(outerSigned) <= config.areaTolerance * outerBox) {
    throw new DegenerateGeometryError('Outer ring encloses no area', { area: outerSigned });
  }

  // Ensure outer is counter-clockwise (positive area)
  const outerSign = Math.sign(outerSigned);
  let A = Math.abs(outerSigned);
  let { Qx, Qy } = calculateFirstMoments(outerLocal);
  let { Ixx, Iyy, Ixy } = calculateSecondMoments(outerLocal);
  Qx *= outerSign;
  Qy *= outerSign;
  Ixx *= outerSign;
  Iyy *= outerSign;
  Ixy *= outerSign;

  // Subtract hole contributions
  holes.forEach((hole, i) => {
    const holeLocal = local(hole);
    const holeSigned = calculateSignedArea(holeLocal);
    if (Math.abs(holeSigned) <= config.areaTolerance * boxArea(getBoundingBox(hole))) {
      throw new InvalidGeometryError(`Hole ${i} encloses no area`, { area: holeSigned });
    }

    const holeSign = Math.sign(holeSigned);
    const holeFirst = calculateFirstMoments(holeLocal);
    const holeSecond = calculateSecondMoments(holeLocal);

    A -= Math.abs(holeSigned);
    Qx -= holeFirst.Qx * holeSign;
    Qy -= holeFirst.Qy * holeSign;
    Ixx -= holeSecond.Ixx * holeSign;
    Iyy -= holeSecond.Iyy * holeSign;
    Ixy -= holeSecond.Ixy * holeSign;
  });

  if (A <= config.areaTolerance * outerBox) {
    throw new DegenerateGeometryError('Holes remove the entire section area', { area: A });
  }

  // Centroid in the local frame
  const xl = Qy / A;
  const yl = Qx / A;

  // Centroidal moments of inertia (parallel axis theorem)
  const centroidal = shiftSecondMoments({ Ixx, Iyy, Ixy }, -A, xl, yl);

  const centroid = { x: origin.x + xl, y: origin.y + yl };
  return buildProperties(A, centroid, centroid, centroidal);
}
