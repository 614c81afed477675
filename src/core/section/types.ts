import type { BoundingBox, GeometricProperties, Point2D } from './SectionProperties';

/**
 * Property-access surface shared by every section variant.
 * Implementations are immutable: transforms return new instances.
 */
export interface HasGeometricProperties {
  properties(): GeometricProperties;
  bounds(): BoundingBox;
  translated(dx: number, dy: number): HasGeometricProperties;
  rotated(theta: number, about?: Point2D): HasGeometricProperties;
}

/**
 * Rigid placement of a section in a composite frame: rotate by theta about the
 * section's local origin, then translate by (dx, dy). A void placement subtracts
 * the section.
 */
export interface Placement {
  dx: number;
  dy: number;
  theta: number;
  void?: boolean;
}

export const IDENTITY_PLACEMENT: Readonly<Placement> = Object.freeze({ dx: 0, dy: 0, theta: 0 });

export interface Material {
  name?: string;
  density: number;          // [mass / unit³]
  elasticModulus: number;   // [force / unit²]
}

/** Elastic section moduli from the extreme fibres, about the centroidal axes */
export interface SectionModuli {
  Wx_pos: number;         // Section modulus about x, positive y [unit³]
  Wx_neg: number;         // Section modulus about x, negative y [unit³]
  Wy_pos: number;         // Section modulus about y, positive x [unit³]
  Wy_neg: number;         // Section modulus about y, negative x [unit³]
  Wx: number;             // Minimum section modulus about x [unit³]
  Wy: number;             // Minimum section modulus about y [unit³]
  height: number;
  width: number;
}
