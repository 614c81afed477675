/**
 * Idealised sections
 *
 * Replaces a (composite) section by a rectangle or ring whose closed-form
 * properties reproduce a chosen set of invariants about the centroid.
 *
 *   Rectangle b × h:  A = b·h,        Ixx = b·h³/12,       Iyy = h·b³/12
 *   Ring Ro, Ri:      A = π(Ro²−Ri²), Ixx = Iyy = π/4·(Ro⁴−Ri⁴)
 *
 * Both shapes have two free parameters. A single preserved invariant is completed
 * with a default ratio (aspect h/b, or radius Ri/Ro) which the result reports.
 */

import { SectionConsole, formatValue } from '../console/ConsoleService';
import { GenericSection } from './GenericSection';
import { RingSection } from './RingSection';
import { resolveSectionConfig, type SectionConfig } from './SectionConfig';
import { InvalidGeometryError, UnderdeterminedIdealisationError } from './SectionErrors';
import { centroidalMoments, type GeometricProperties, type Point2D } from './SectionProperties';

export type IdealisationTarget = 'rectangle' | 'ring';

export type PreservedInvariant = 'area' | 'Ixx' | 'Iyy';

export type ReportedInvariant = PreservedInvariant | 'Ixy';

export type IdealisedShape =
  | { kind: 'rectangle'; width: number; height: number }
  | { kind: 'ring'; outerRadius: number; innerRadius: number };

export interface InvariantValues {
  area: number;
  Ixx: number;
  Iyy: number;
  Ixy: number;
}

export interface InvariantDeviation {
  invariant: ReportedInvariant;
  source: number;
  achieved: number;
  relativeError: number;
}

export type IdealisedSection = IdealisedShape & {
  /** Centroid of the source section; the idealised shape is centred here */
  centroid: Point2D;
  preserved: PreservedInvariant[];
  /** Default policy values used to fix free parameters */
  defaults: { aspectRatio?: number; radiusRatio?: number };
  /** The idealised shape's own centroidal properties */
  achieved: InvariantValues;
  /** Every invariant not preserved, with how far the shape is off */
  deviations: InvariantDeviation[];
};

export interface IdealisationOptions {
  /** Height / width for an under-determined rectangle */
  aspectRatio?: number;
  /** Inner / outer radius for an under-determined ring */
  radiusRatio?: number;
  config?: Partial<SectionConfig>;
}

const INVARIANT_ORDER: readonly PreservedInvariant[] = ['area', 'Ixx', 'Iyy'];

interface Solution {
  shape: IdealisedShape;
  defaults: IdealisedSection['defaults'];
}

function solveRectangle(want: Set<PreservedInvariant>, source: InvariantValues, aspect: number): Solution {
  const { area: A, Ixx, Iyy } = source;

  if (want.size === 3) {
    throw new UnderdeterminedIdealisationError(
      'A rectangle has two free parameters and cannot preserve area, Ixx and Iyy together',
      { target: 'rectangle', preserve: [...want] }
    );
  }

  if (want.size === 2) {
    let width: number;
    let height: number;
    if (want.has('area') && want.has('Ixx')) {
      height = Math.sqrt((12 * Ixx) / A);
      width = A / height;
    } else if (want.has('area')) {
      width = Math.sqrt((12 * Iyy) / A);
      height = A / width;
    } else {
      const k = Math.sqrt(Ixx / Iyy);
      width = Math.pow((12 * Iyy) / k, 0.25);
      height = k * width;
    }
    return { shape: { kind: 'rectangle', width, height }, defaults: {} };
  }

  if (!Number.isFinite(aspect) || aspect <= 0) {
    throw new InvalidGeometryError(`Aspect ratio must be positive, got ${aspect}`);
  }

  let width: number;
  if (want.has('area')) {
    width = Math.sqrt(A / aspect);
  } else if (want.has('Ixx')) {
    width = Math.pow((12 * Ixx) / (aspect * aspect * aspect), 0.25);
  } else {
    width = Math.pow((12 * Iyy) / aspect, 0.25);
  }
  return { shape: { kind: 'rectangle', width, height: aspect * width }, defaults: { aspectRatio: aspect } };
}

function solveRing(
  want: Set<PreservedInvariant>,
  source: InvariantValues,
  ratio: number,
  tolerance: number
): Solution {
  const wantsIxx = want.has('Ixx');
  const wantsIyy = want.has('Iyy');

  // Ixx ≡ Iyy for a ring, so asking for both is one invariant
  if (wantsIxx && wantsIyy) {
    const spread = Math.abs(source.Ixx - source.Iyy);
    if (spread > tolerance * Math.max(Math.abs(source.Ixx), Math.abs(source.Iyy))) {
      throw new UnderdeterminedIdealisationError(
        `A ring has Ixx = Iyy and cannot preserve Ixx=${formatValue(source.Ixx)} and Iyy=${formatValue(source.Iyy)}`,
        { target: 'ring', Ixx: source.Ixx, Iyy: source.Iyy }
      );
    }
  }

  const wantsI = wantsIxx || wantsIyy;
  const I = wantsIxx && wantsIyy ? (source.Ixx + source.Iyy) / 2 : wantsIxx ? source.Ixx : source.Iyy;
  const a = source.area / Math.PI;

  if (want.has('area') && wantsI) {
    const s = (4 * I) / (Math.PI * a);
    const ro2 = (s + a) / 2;
    let ri2 = (s - a) / 2;
    if (ri2 < 0) {
      if (ri2 < -tolerance * ro2) {
        throw new UnderdeterminedIdealisationError(
          'No ring has this area with so small a second moment; even a solid disc is stiffer',
          { target: 'ring', area: source.area, I }
        );
      }
      ri2 = 0;
    }
    return {
      shape: { kind: 'ring', outerRadius: Math.sqrt(ro2), innerRadius: Math.sqrt(ri2) },
      defaults: {},
    };
  }

  if (!Number.isFinite(ratio) || ratio < 0 || ratio >= 1) {
    throw new InvalidGeometryError(`Radius ratio must lie in [0, 1), got ${ratio}`);
  }

  const outerRadius = want.has('area')
    ? Math.sqrt(a / (1 - ratio * ratio))
    : Math.pow((4 * I) / (Math.PI * (1 - Math.pow(ratio, 4))), 0.25);

  return {
    shape: { kind: 'ring', outerRadius, innerRadius: ratio * outerRadius },
    defaults: { radiusRatio: ratio },
  };
}

/** Closed-form centroidal properties of an idealised shape */
export function shapeInvariants(shape: IdealisedShape): InvariantValues {
  if (shape.kind === 'rectangle') {
    const { width: b, height: h } = shape;
    return { area: b * h, Ixx: (b * h * h * h) / 12, Iyy: (h * b * b * b) / 12, Ixy: 0 };
  }
  const ro2 = shape.outerRadius * shape.outerRadius;
  const ri2 = shape.innerRadius * shape.innerRadius;
  const I = (Math.PI / 4) * (ro2 * ro2 - ri2 * ri2);
  return { area: Math.PI * (ro2 - ri2), Ixx: I, Iyy: I, Ixy: 0 };
}

/**
 * Relative deviation. Ixy is measured against the mean of Ixx and Iyy since it is
 * usually zero in the source.
 */
function deviation(
  invariant: ReportedInvariant,
  source: InvariantValues,
  achieved: InvariantValues
): InvariantDeviation {
  const s = source[invariant];
  const a = achieved[invariant];
  const scale = invariant === 'Ixy'
    ? (Math.abs(source.Ixx) + Math.abs(source.Iyy)) / 2
    : Math.max(Math.abs(s), Math.abs(a));
  return {
    invariant,
    source: s,
    achieved: a,
    relativeError: scale > 0 ? Math.abs(a - s) / scale : 0,
  };
}

export function idealisedSection(
  properties: GeometricProperties,
  targetKind: IdealisationTarget,
  preserve: Iterable<PreservedInvariant>,
  options: IdealisationOptions = {}
): IdealisedSection {
  const config = resolveSectionConfig(options.config);
  const want = new Set(preserve);

  if (want.size === 0) {
    throw new UnderdeterminedIdealisationError('At least one invariant must be preserved to fix the scale', {
      target: targetKind,
    });
  }

  const source: InvariantValues = { area: properties.area, ...centroidalMoments(properties) };
  for (const invariant of want) {
    const value = source[invariant];
    if (!Number.isFinite(value) || value <= 0) {
      throw new InvalidGeometryError(`Cannot preserve ${invariant}=${value}; it must be positive`, {
        invariant,
        value,
      });
    }
  }

  const solution = targetKind === 'rectangle'
    ? solveRectangle(want, source, options.aspectRatio ?? config.defaultAspectRatio)
    : solveRing(want, source, options.radiusRatio ?? config.defaultRadiusRatio, config.invariantTolerance);

  const achieved = shapeInvariants(solution.shape);
  const preserved = INVARIANT_ORDER.filter(inv => want.has(inv));
  const reported: ReportedInvariant[] = [...INVARIANT_ORDER.filter(inv => !want.has(inv)), 'Ixy'];
  const deviations = reported.map(inv => deviation(inv, source, achieved));

  for (const [name, value] of Object.entries(solution.defaults)) {
    SectionConsole.info('idealisedSection', `${targetKind}: free parameter fixed by default ${name}=${value}`);
  }
  for (const d of deviations) {
    if (d.relativeError > config.invariantTolerance) {
      SectionConsole.warn(
        'idealisedSection',
        `${targetKind}: ${d.invariant} not preserved (source ${formatValue(d.source)}, idealised ${formatValue(d.achieved)})`
      );
    }
  }

  return {
    ...solution.shape,
    centroid: { x: properties.centroid.x, y: properties.centroid.y },
    preserved,
    defaults: solution.defaults,
    achieved,
    deviations,
  };
}

/**
 * Build the section an idealisation describes, centred on the source centroid.
 */
export function idealisedShape(idealised: IdealisedSection): GenericSection | RingSection {
  const { x, y } = idealised.centroid;
  if (idealised.kind === 'ring') {
    return new RingSection(idealised.outerRadius, idealised.innerRadius, { x, y });
  }
  const hw = idealised.width / 2;
  const hh = idealised.height / 2;
  return new GenericSection([
    { x: x - hw, y: y - hh },
    { x: x + hw, y: y - hh },
    { x: x + hw, y: y + hh },
    { x: x - hw, y: y + hh },
  ]);
}
