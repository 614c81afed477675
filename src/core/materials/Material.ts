import { InvalidMaterialError } from '../section/SectionErrors';
import type { Material } from '../section/types';

/** Typical values in SI base units (kg/m³, Pa) */
export const DEFAULT_MATERIALS: readonly Material[] = Object.freeze([
  {
    name: 'Steel',
    elasticModulus: 210e9,   // 210 GPa
    density: 7850,           // kg/m³
  },
  {
    name: 'Aluminium',
    elasticModulus: 70e9,    // 70 GPa
    density: 2700,
  },
  {
    name: 'Concrete',
    elasticModulus: 30e9,    // 30 GPa
    density: 2400,
  },
  {
    name: 'Timber',
    elasticModulus: 12e9,    // 12 GPa
    density: 600,
  },
]);

export function findMaterial(name: string): Material | undefined {
  const key = name.toLowerCase();
  return DEFAULT_MATERIALS.find(m => m.name?.toLowerCase() === key);
}

/**
 * Validate a material record. Density and modulus must be finite and non-negative.
 */
export function validateMaterial(material: Material): Material {
  const { density, elasticModulus } = material;
  if (!Number.isFinite(density) || density < 0) {
    throw new InvalidMaterialError(`Density must be a non-negative number, got ${density}`, material);
  }
  if (!Number.isFinite(elasticModulus) || elasticModulus < 0) {
    throw new InvalidMaterialError(
      `Elastic modulus must be a non-negative number, got ${elasticModulus}`,
      material
    );
  }
  return Object.freeze({ ...material });
}

export function createMaterial(density: number, elasticModulus: number, name?: string): Material {
  return validateMaterial(name === undefined ? { density, elasticModulus } : { name, density, elasticModulus });
}

export function formatModulus(E: number): string {
  if (E >= 1e9) {
    return `${(E / 1e9).toFixed(1)} GPa`;
  } else if (E >= 1e6) {
    return `${(E / 1e6).toFixed(1)} MPa`;
  }
  return `${E.toFixed(1)} Pa`;
}
