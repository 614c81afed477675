/**
 * Validation of point data handed over by importers (DXF readers, point lists, JSON).
 */

import { z } from 'zod';
import { GenericSection } from './GenericSection';
import { InvalidGeometryError } from './SectionErrors';
import type { Point2D, SectionGeometry } from './SectionProperties';

const coordinate = z.number().finite();

const pointSchema = z.union([
  z.object({ x: coordinate, y: coordinate }),
  z.tuple([coordinate, coordinate]),
]).transform((p): Point2D => (Array.isArray(p) ? { x: p[0], y: p[1] } : { x: p.x, y: p.y }));

const ringSchema = z.array(pointSchema).min(3, 'a ring needs at least 3 points');

export const sectionGeometrySchema = z.object({
  outer: ringSchema,
  holes: z.array(ringSchema).optional(),
});

export type SectionGeometryInput = z.input<typeof sectionGeometrySchema>;

export function parseSectionGeometry(input: unknown): SectionGeometry {
  const result = sectionGeometrySchema.safeParse(input);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
    throw new InvalidGeometryError(
      `Invalid section geometry${where}: ${first ? first.message : 'unknown error'}`,
      result.error.issues
    );
  }
  const { outer, holes } = result.data;
  return holes ? { outer, holes } : { outer };
}

export function sectionFromInput(input: unknown): GenericSection {
  return GenericSection.fromGeometry(parseSectionGeometry(input));
}
