/**
 * SectionConfig - numerical tolerances and idealisation defaults
 */

export interface SectionConfig {
  /** Relative tolerance for a vanishing polygon or composite area */
  areaTolerance: number;
  /** Relative tolerance when comparing invariants (idealisation checks and deviations) */
  invariantTolerance: number;
  /** Height / width assumed when a rectangle idealisation has a free parameter */
  defaultAspectRatio: number;
  /** Inner / outer radius assumed when a ring idealisation has a free parameter */
  defaultRadiusRatio: number;
}

export const DEFAULT_SECTION_CONFIG: Readonly<SectionConfig> = Object.freeze({
  areaTolerance: 1e-12,
  invariantTolerance: 1e-9,
  defaultAspectRatio: 1,
  defaultRadiusRatio: 0,
});

export function resolveSectionConfig(overrides?: Partial<SectionConfig>): SectionConfig {
  return { ...DEFAULT_SECTION_CONFIG, ...overrides };
}
