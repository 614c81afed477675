/**
 * Error taxonomy for section calculations.
 *
 * All errors are thrown at the point of detection; nothing is retried and no
 * partial result is returned.
 */

export type SectionErrorCode =
  | 'INVALID_GEOMETRY'
  | 'DEGENERATE_GEOMETRY'
  | 'INVALID_MATERIAL'
  | 'DEGENERATE_COMPOSITE'
  | 'MIXED_SECTION_TYPE'
  | 'UNDERDETERMINED_IDEALISATION';

export class SectionError extends Error {
  override name = 'SectionError';

  constructor(
    public readonly code: SectionErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
  }
}

/** Malformed polygon or shape parameters */
export class InvalidGeometryError extends SectionError {
  override name = 'InvalidGeometryError';

  constructor(message: string, details?: unknown) {
    super('INVALID_GEOMETRY', message, details);
  }
}

/** Zero or negative area after integration */
export class DegenerateGeometryError extends SectionError {
  override name = 'DegenerateGeometryError';

  constructor(message: string, details?: unknown) {
    super('DEGENERATE_GEOMETRY', message, details);
  }
}

export class InvalidMaterialError extends SectionError {
  override name = 'InvalidMaterialError';

  constructor(message: string, details?: unknown) {
    super('INVALID_MATERIAL', message, details);
  }
}

/** Composite whose total area vanishes, so centroid and moments are undefined */
export class DegenerateCompositeError extends SectionError {
  override name = 'DegenerateCompositeError';

  constructor(message: string, details?: unknown) {
    super('DEGENERATE_COMPOSITE', message, details);
  }
}

/** Materialised and purely geometric sections mixed in one aggregation */
export class MixedSectionTypeError extends SectionError {
  override name = 'MixedSectionTypeError';

  constructor(message: string, details?: unknown) {
    super('MIXED_SECTION_TYPE', message, details);
  }
}

/** Invariant set incompatible with the target shape's degrees of freedom */
export class UnderdeterminedIdealisationError extends SectionError {
  override name = 'UnderdeterminedIdealisationError';

  constructor(message: string, details?: unknown) {
    super('UNDERDETERMINED_IDEALISATION', message, details);
  }
}
