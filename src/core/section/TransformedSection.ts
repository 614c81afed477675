/**
 * Transformed section (modular ratio method)
 *
 * Converts materialised sections into an equivalent section of a single reference
 * material: every contribution is scaled by n = E / E_ref before summation.
 */

import { SectionConsole, formatValue } from '../console/ConsoleService';
import {
  placeSection,
  sumMoments,
  weightedCentroid,
  type CompositeItem,
  type PlacedContribution,
} from './CombineSections';
import { isMaterialised } from './MaterialisedGenericSection';
import { resolveSectionConfig, type SectionConfig } from './SectionConfig';
import { DegenerateCompositeError, InvalidMaterialError, MixedSectionTypeError } from './SectionErrors';
import { buildProperties, type GeometricProperties, type Point2D } from './SectionProperties';

export interface TransformedSectionResult {
  referenceModulus: number;
  /** E / E_ref per item, in input order */
  modularRatios: number[];
  /** Properties of the equivalent section in the reference material */
  properties: GeometricProperties;
}

export function transformedSection(
  items: readonly CompositeItem[],
  referenceModulus: number,
  options: { reference?: Point2D; config?: Partial<SectionConfig> } = {}
): TransformedSectionResult {
  const config = resolveSectionConfig(options.config);

  if (!Number.isFinite(referenceModulus) || referenceModulus <= 0) {
    throw new InvalidMaterialError(`Reference modulus must be positive, got ${referenceModulus}`);
  }

  const parts = items.map((item, i) => {
    const { section } = item;
    if (!isMaterialised(section)) {
      throw new MixedSectionTypeError(`Item ${i} has no material; every item needs an elastic modulus`);
    }
    return placeSection(section, item.placement);
  });

  const ratio = (p: PlacedContribution) => (p.material?.elasticModulus ?? 0) / referenceModulus;

  let area = 0;
  let scale = 0;
  for (const p of parts) {
    const Ai = ratio(p) * p.area;
    area += Ai;
    scale += Math.abs(Ai);
  }

  const centroid = weightedCentroid(parts, p => ratio(p) * p.area);
  if (!centroid || !(area > config.areaTolerance * scale)) {
    throw new DegenerateCompositeError('Transformed section has no stiffness-weighted area', { area });
  }

  const reference = options.reference ?? centroid;
  const moments = sumMoments(parts, reference, ratio);

  SectionConsole.debug(
    'transformedSection',
    `${parts.length} sections transformed to E=${formatValue(referenceModulus)}: A=${formatValue(area)}`
  );

  return {
    referenceModulus,
    modularRatios: parts.map(ratio),
    properties: buildProperties(area, centroid, reference, moments),
  };
}
