/**
 * Section Properties Module
 *
 * Geometric and material-weighted cross-section properties, composite sections
 * and idealisation.
 */

export {
  // Geometry kernel
  computeProperties,
  buildProperties,
  calculateArea,
  calculateSignedArea,
  calculateFirstMoments,
  calculateSecondMoments,
  calculatePrincipalMoments,
  centroidalMoments,
  rotateSecondMoments,
  shiftSecondMoments,
  getBoundingBox,
  translatePoints,
  rotatePoint,
  rotatePoints,

  // Types
  type Point2D,
  type SectionGeometry,
  type SecondMoments,
  type BoundingBox,
  type GeometricProperties,
} from './SectionProperties';

export {
  IDENTITY_PLACEMENT,
  type HasGeometricProperties,
  type Placement,
  type Material,
  type SectionModuli,
} from './types';

export { GenericSection, sectionModuli } from './GenericSection';
export { RingSection } from './RingSection';
export {
  MaterialisedGenericSection,
  isMaterialised,
  type WeightedProperties,
} from './MaterialisedGenericSection';

export {
  combineSections,
  placeSection,
  type CompositeItem,
  type CompositeProperties,
  type WeightedCompositeProperties,
  type CombineOptions,
  type PlacedContribution,
} from './CombineSections';

export {
  idealisedSection,
  idealisedShape,
  shapeInvariants,
  type IdealisationTarget,
  type IdealisationOptions,
  type IdealisedSection,
  type IdealisedShape,
  type InvariantDeviation,
  type InvariantValues,
  type PreservedInvariant,
  type ReportedInvariant,
} from './IdealisedSection';

export { transformedSection, type TransformedSectionResult } from './TransformedSection';

export {
  parseSectionGeometry,
  sectionFromInput,
  sectionGeometrySchema,
  type SectionGeometryInput,
} from './SectionGeometryInput';

export {
  DEFAULT_SECTION_CONFIG,
  resolveSectionConfig,
  type SectionConfig,
} from './SectionConfig';

export {
  SectionError,
  InvalidGeometryError,
  DegenerateGeometryError,
  InvalidMaterialError,
  DegenerateCompositeError,
  MixedSectionTypeError,
  UnderdeterminedIdealisationError,
  type SectionErrorCode,
} from './SectionErrors';
