/**
 * GenericSection - polygon section with optional holes
 *
 * Rings are normalised on construction (outer counter-clockwise, holes clockwise)
 * and the properties are computed eagerly, so an instance never changes after
 * construction.
 */

import { SectionConsole } from '../console/ConsoleService';
import { DEFAULT_SECTION_CONFIG, type SectionConfig } from './SectionConfig';
import { InvalidGeometryError } from './SectionErrors';
import {
  calculateSignedArea,
  computeProperties,
  getBoundingBox,
  rotatePoints,
  translatePoints,
  type BoundingBox,
  type GeometricProperties,
  type Point2D,
  type SectionGeometry,
} from './SectionProperties';
import type { HasGeometricProperties, SectionModuli } from './types';

type Ring = readonly Readonly<Point2D>[];

function freezeRing(points: readonly Point2D[]): Ring {
  return Object.freeze(points.map(p => Object.freeze({ x: p.x, y: p.y })));
}

function orient(points: readonly Point2D[], counterClockwise: boolean, label: string): Point2D[] {
  const signed = calculateSignedArea(points);
  if (signed === 0 || (signed > 0) === counterClockwise) return [...points];
  SectionConsole.debug('GenericSection', `${label} re-wound ${counterClockwise ? 'counter-clockwise' : 'clockwise'}`);
  return [...points].reverse();
}

function encloses(outer: BoundingBox, inner: BoundingBox): boolean {
  return inner.xmin >= outer.xmin && inner.xmax <= outer.xmax
    && inner.ymin >= outer.ymin && inner.ymax <= outer.ymax;
}

export class GenericSection implements HasGeometricProperties {
  readonly outer: Ring;
  readonly holes: readonly Ring[];
  private readonly props: GeometricProperties;
  private readonly box: BoundingBox;

  constructor(
    outer: readonly Point2D[],
    holes: readonly (readonly Point2D[])[] = [],
    private readonly config: Pick<SectionConfig, 'areaTolerance'> = DEFAULT_SECTION_CONFIG
  ) {
    if (outer.length < 3) {
      throw new InvalidGeometryError(`Outer ring needs at least 3 points, got ${outer.length}`);
    }

    const box = getBoundingBox(outer);
    holes.forEach((hole, i) => {
      if (hole.length < 3) {
        throw new InvalidGeometryError(`Hole ${i} needs at least 3 points, got ${hole.length}`);
      }
      // Bounding boxes only; exact containment is not checked
      if (!encloses(box, getBoundingBox(hole))) {
        throw new InvalidGeometryError(`Hole ${i} extends beyond the outer boundary`, {
          outer: box,
          hole: getBoundingBox(hole),
        });
      }
    });

    this.outer = freezeRing(orient(outer, true, 'Outer ring'));
    this.holes = Object.freeze(holes.map((hole, i) => freezeRing(orient(hole, false, `Hole ${i}`))));
    this.box = Object.freeze(box);
    this.props = computeProperties(this.geometry(), config);
  }

  static fromGeometry(geometry: SectionGeometry, config?: Pick<SectionConfig, 'areaTolerance'>): GenericSection {
    return new GenericSection(geometry.outer, geometry.holes, config);
  }

  properties(): GeometricProperties {
    return this.props;
  }

  bounds(): BoundingBox {
    return this.box;
  }

  /** Copy of the normalised rings */
  geometry(): SectionGeometry {
    return {
      outer: this.outer.map(p => ({ x: p.x, y: p.y })),
      holes: this.holes.map(hole => hole.map(p => ({ x: p.x, y: p.y }))),
    };
  }

  translated(dx: number, dy: number): GenericSection {
    return new GenericSection(
      translatePoints(this.outer, dx, dy),
      this.holes.map(hole => translatePoints(hole, dx, dy)),
      this.config
    );
  }

  rotated(theta: number, about: Point2D = { x: 0, y: 0 }): GenericSection {
    return new GenericSection(
      rotatePoints(this.outer, theta, about),
      this.holes.map(hole => rotatePoints(hole, theta, about)),
      this.config
    );
  }

  /** Same section moved so its centroid lies on the origin */
  centred(): GenericSection {
    const { centroid } = this.props;
    return this.translated(-centroid.x, -centroid.y);
  }

  /** Same section rotated about its centroid onto its principal axes */
  principal(): GenericSection {
    return this.rotated(this.props.phi, this.props.centroid);
  }
}

/**
 * Elastic section moduli from a section's centroidal moments and extreme fibres.
 */
export function sectionModuli(section: HasGeometricProperties): SectionModuli {
  const { centroid, Ixx, Iyy } = section.properties();
  const box = section.bounds();

  const xmin = box.xmin - centroid.x;
  const xmax = box.xmax - centroid.x;
  const ymin = box.ymin - centroid.y;
  const ymax = box.ymax - centroid.y;

  const modulus = (I: number, fibre: number) => (Math.abs(fibre) > 1e-12 ? Math.abs(I / fibre) : Infinity);

  const Wx_pos = modulus(Ixx, ymax);
  const Wx_neg = modulus(Ixx, ymin);
  const Wy_pos = modulus(Iyy, xmax);
  const Wy_neg = modulus(Iyy, xmin);

  return {
    Wx_pos, Wx_neg, Wy_pos, Wy_neg,
    Wx: Math.min(Wx_pos, Wx_neg),
    Wy: Math.min(Wy_pos, Wy_neg),
    height: box.ymax - box.ymin,
    width: box.xmax - box.xmin,
  };
}
