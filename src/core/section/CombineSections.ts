/**
 * Composite sections
 *
 * Each item is placed in the composite frame (rotate about its local origin, then
 * translate), its centroidal tensor is rotated with it, and every contribution is
 * shifted with the parallel axis theorem to the composite reference point.
 * Void placements count with negative area.
 */

import { SectionConsole, formatValue } from '../console/ConsoleService';
import { isMaterialised } from './MaterialisedGenericSection';
import { resolveSectionConfig, type SectionConfig } from './SectionConfig';
import { DegenerateCompositeError, MixedSectionTypeError } from './SectionErrors';
import {
  buildProperties,
  centroidalMoments,
  rotatePoint,
  rotateSecondMoments,
  shiftSecondMoments,
  type GeometricProperties,
  type Point2D,
  type SecondMoments,
} from './SectionProperties';
import { IDENTITY_PLACEMENT, type HasGeometricProperties, type Material, type Placement } from './types';

export interface CompositeItem {
  section: HasGeometricProperties;
  placement?: Placement;
}

export interface WeightedCompositeProperties {
  mass: number;
  centreOfMass: Point2D;
  axialStiffness: number;
  elasticCentroid: Point2D;
  /** Point the bending stiffnesses are taken about */
  reference: Point2D;
  bendingStiffnessXx: number;
  bendingStiffnessYy: number;
  bendingStiffnessXy: number;
}

export interface CompositeProperties extends GeometricProperties {
  itemCount: number;
  /** Present when every item carries a material */
  weighted?: WeightedCompositeProperties;
}

export interface CombineOptions {
  /** Point the composite moments are taken about; defaults to the composite centroid */
  reference?: Point2D;
  config?: Partial<SectionConfig>;
}

/** A section's contribution expressed in the composite frame */
export interface PlacedContribution {
  area: number;
  centroid: Point2D;
  /** About the placed centroid */
  moments: SecondMoments;
  material?: Material;
}

export function placeSection(
  section: HasGeometricProperties,
  placement: Placement = IDENTITY_PLACEMENT
): PlacedContribution {
  const props = section.properties();
  const sign = placement.void ? -1 : 1;

  const rotated = rotateSecondMoments(centroidalMoments(props), placement.theta);
  const c = rotatePoint(props.centroid, placement.theta);

  return {
    area: sign * props.area,
    centroid: { x: c.x + placement.dx, y: c.y + placement.dy },
    moments: { Ixx: sign * rotated.Ixx, Iyy: sign * rotated.Iyy, Ixy: sign * rotated.Ixy },
    material: isMaterialised(section) ? section.material : undefined,
  };
}

/**
 * Weighted mean of the placed centroids, summed as offsets from the first one so
 * that coincident centroids come back unchanged. Undefined when the weights cancel.
 */
export function weightedCentroid(
  parts: readonly PlacedContribution[],
  weight: (p: PlacedContribution) => number
): Point2D | undefined {
  if (parts.length === 0) return undefined;
  const origin = parts[0].centroid;

  let total = 0;
  let sx = 0;
  let sy = 0;
  for (const p of parts) {
    const w = weight(p);
    total += w;
    sx += w * (p.centroid.x - origin.x);
    sy += w * (p.centroid.y - origin.y);
  }
  return total !== 0 ? { x: origin.x + sx / total, y: origin.y + sy / total } : undefined;
}

/** Parallel-axis sum about `reference`, each contribution scaled by `factor` */
export function sumMoments(
  parts: readonly PlacedContribution[],
  reference: Point2D,
  factor: (p: PlacedContribution) => number
): SecondMoments {
  const sum = { Ixx: 0, Iyy: 0, Ixy: 0 };
  for (const p of parts) {
    const k = factor(p);
    const shifted = shiftSecondMoments(p.moments, p.area, p.centroid.x - reference.x, p.centroid.y - reference.y);
    sum.Ixx += k * shifted.Ixx;
    sum.Iyy += k * shifted.Iyy;
    sum.Ixy += k * shifted.Ixy;
  }
  return sum;
}

function weightedComposite(
  parts: PlacedContribution[],
  centroid: Point2D,
  reference: Point2D | undefined
): WeightedCompositeProperties {
  const density = (p: PlacedContribution) => p.material?.density ?? 0;
  const modulus = (p: PlacedContribution) => p.material?.elasticModulus ?? 0;

  let mass = 0;
  let axialStiffness = 0;
  for (const p of parts) {
    mass += p.area * density(p);
    axialStiffness += p.area * modulus(p);
  }

  const centreOfMass = weightedCentroid(parts, p => p.area * density(p)) ?? centroid;
  const elasticCentroid = weightedCentroid(parts, p => p.area * modulus(p)) ?? centroid;
  const about = reference ?? elasticCentroid;
  const EI = sumMoments(parts, about, modulus);

  return {
    mass,
    centreOfMass,
    axialStiffness,
    elasticCentroid,
    reference: { x: about.x, y: about.y },
    bendingStiffnessXx: EI.Ixx,
    bendingStiffnessYy: EI.Iyy,
    bendingStiffnessXy: EI.Ixy,
  };
}

/**
 * Calculate the properties of placed sections acting together.
 *
 * Items are summed in the order given.
 */
export function combineSections(
  items: readonly CompositeItem[],
  options: CombineOptions = {}
): CompositeProperties {
  const config = resolveSectionConfig(options.config);

  if (items.length === 0) {
    throw new DegenerateCompositeError('Cannot combine an empty list of sections');
  }

  const materialisedCount = items.filter(item => isMaterialised(item.section)).length;
  if (materialisedCount > 0 && materialisedCount < items.length) {
    throw new MixedSectionTypeError(
      `${materialisedCount} of ${items.length} sections carry a material; combine all or none`,
      { materialised: materialisedCount, total: items.length }
    );
  }

  const parts = items.map(item => placeSection(item.section, item.placement));

  let total = 0;
  let scale = 0;
  parts.forEach((p, i) => {
    total += p.area;
    scale += Math.abs(p.area);
    if (p.area === 0) {
      SectionConsole.warn('combineSections', `item ${i} has zero area and contributes nothing`);
    }
  });

  if (!(total > config.areaTolerance * scale)) {
    throw new DegenerateCompositeError(
      total < 0
        ? `Composite area is negative (${formatValue(total)}): voids exceed solids`
        : 'Composite area is zero; centroid and moments are undefined',
      { area: total }
    );
  }

  const centroid = weightedCentroid(parts, p => p.area) ?? { x: 0, y: 0 };
  const reference = options.reference ?? centroid;
  const moments = sumMoments(parts, reference, () => 1);

  SectionConsole.debug(
    'combineSections',
    `${items.length} sections: A=${formatValue(total)} C=(${formatValue(centroid.x)}, ${formatValue(centroid.y)})`
  );

  const weighted = materialisedCount > 0 ? weightedComposite(parts, centroid, options.reference) : undefined;

  return Object.freeze({
    ...buildProperties(total, centroid, reference, moments),
    itemCount: items.length,
    ...(weighted ? { weighted: Object.freeze(weighted) } : {}),
  });
}
