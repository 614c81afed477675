/**
 * RingSection - annulus with closed-form properties
 *
 * A = π(Ro² − Ri²), Ixx = Iyy = π/4·(Ro⁴ − Ri⁴), Ixy = 0 about the centre.
 */

import { InvalidGeometryError } from './SectionErrors';
import {
  buildProperties,
  rotatePoint,
  type BoundingBox,
  type GeometricProperties,
  type Point2D,
} from './SectionProperties';
import type { HasGeometricProperties } from './types';

export class RingSection implements HasGeometricProperties {
  readonly center: Readonly<Point2D>;
  private readonly props: GeometricProperties;

  constructor(
    readonly outerRadius: number,
    readonly innerRadius: number = 0,
    center: Point2D = { x: 0, y: 0 }
  ) {
    if (!Number.isFinite(outerRadius) || outerRadius <= 0) {
      throw new InvalidGeometryError(`Outer radius must be positive, got ${outerRadius}`);
    }
    if (!Number.isFinite(innerRadius) || innerRadius < 0) {
      throw new InvalidGeometryError(`Inner radius must be non-negative, got ${innerRadius}`);
    }
    if (innerRadius >= outerRadius) {
      throw new InvalidGeometryError(
        `Inner radius ${innerRadius} must be smaller than outer radius ${outerRadius}`
      );
    }
    if (!Number.isFinite(center.x) || !Number.isFinite(center.y)) {
      throw new InvalidGeometryError('Ring centre contains a non-finite coordinate', center);
    }

    this.center = Object.freeze({ x: center.x, y: center.y });

    const ro2 = outerRadius * outerRadius;
    const ri2 = innerRadius * innerRadius;
    const A = Math.PI * (ro2 - ri2);
    const I = (Math.PI / 4) * (ro2 * ro2 - ri2 * ri2);

    this.props = buildProperties(A, this.center, this.center, { Ixx: I, Iyy: I, Ixy: 0 });
  }

  /**
   * Create a circular hollow section from outer diameter and wall thickness.
   */
  static fromDiameter(outerDiameter: number, wallThickness: number, center?: Point2D): RingSection {
    return new RingSection(outerDiameter / 2, outerDiameter / 2 - wallThickness, center);
  }

  get wallThickness(): number {
    return this.outerRadius - this.innerRadius;
  }

  properties(): GeometricProperties {
    return this.props;
  }

  bounds(): BoundingBox {
    const { x, y } = this.center;
    const r = this.outerRadius;
    return { xmin: x - r, xmax: x + r, ymin: y - r, ymax: y + r };
  }

  translated(dx: number, dy: number): RingSection {
    return new RingSection(this.outerRadius, this.innerRadius, {
      x: this.center.x + dx,
      y: this.center.y + dy,
    });
  }

  /** The tensor is isotropic, so only the centre moves */
  rotated(theta: number, about: Point2D = { x: 0, y: 0 }): RingSection {
    return new RingSection(this.outerRadius, this.innerRadius, rotatePoint(this.center, theta, about));
  }
}
