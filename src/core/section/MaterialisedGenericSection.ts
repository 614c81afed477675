/**
 * MaterialisedGenericSection - a section paired with a material
 *
 * Holds any HasGeometricProperties (polygon or ring) rather than extending it,
 * and scales the geometric quantities by density or elastic modulus.
 */

import { validateMaterial } from '../materials/Material';
import type { BoundingBox, GeometricProperties, Point2D } from './SectionProperties';
import type { HasGeometricProperties, Material } from './types';

export interface WeightedProperties {
  mass: number;                 // A·ρ, per unit length
  axialStiffness: number;       // E·A
  bendingStiffnessXx: number;   // E·Ixx about the centroid
  bendingStiffnessYy: number;   // E·Iyy about the centroid
  bendingStiffnessXy: number;   // E·Ixy about the centroid
}

export class MaterialisedGenericSection implements HasGeometricProperties {
  readonly material: Material;
  private readonly weighted: WeightedProperties;

  constructor(readonly section: HasGeometricProperties, material: Material) {
    this.material = validateMaterial(material);

    const { area, Ixx, Iyy, Ixy } = section.properties();
    const { density, elasticModulus: E } = this.material;
    this.weighted = Object.freeze({
      mass: area * density,
      axialStiffness: area * E,
      bendingStiffnessXx: Ixx * E,
      bendingStiffnessYy: Iyy * E,
      bendingStiffnessXy: Ixy * E,
    });
  }

  geometricProperties(): GeometricProperties {
    return this.section.properties();
  }

  properties(): GeometricProperties {
    return this.geometricProperties();
  }

  weightedProperties(): WeightedProperties {
    return this.weighted;
  }

  bounds(): BoundingBox {
    return this.section.bounds();
  }

  translated(dx: number, dy: number): MaterialisedGenericSection {
    return new MaterialisedGenericSection(this.section.translated(dx, dy), this.material);
  }

  rotated(theta: number, about?: Point2D): MaterialisedGenericSection {
    return new MaterialisedGenericSection(this.section.rotated(theta, about), this.material);
  }
}

export function isMaterialised(section: HasGeometricProperties): section is MaterialisedGenericSection {
  return section instanceof MaterialisedGenericSection;
}
