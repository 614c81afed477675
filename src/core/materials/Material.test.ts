import { describe, it, expect } from 'vitest';
import { InvalidMaterialError } from '../section/SectionErrors';
import { createMaterial, findMaterial, formatModulus, validateMaterial } from './Material';

describe('Material', () => {
  it('finds default materials by name, ignoring case', () => {
    expect(findMaterial('steel')?.elasticModulus).toBe(210e9);
    expect(findMaterial('TIMBER')?.density).toBe(600);
    expect(findMaterial('unobtainium')).toBeUndefined();
  });

  it('createMaterial returns a frozen record', () => {
    const m = createMaterial(1000, 5e9, 'test');
    expect(m).toEqual({ name: 'test', density: 1000, elasticModulus: 5e9 });
    expect(Object.isFrozen(m)).toBe(true);
    expect('name' in createMaterial(1, 1)).toBe(false);
  });

  it('rejects negative or non-finite values', () => {
    expect(() => createMaterial(-1, 1)).toThrow(InvalidMaterialError);
    expect(() => createMaterial(1, Number.POSITIVE_INFINITY)).toThrow(InvalidMaterialError);
    expect(() => validateMaterial({ density: Number.NaN, elasticModulus: 1 })).toThrow(
      'Density must be a non-negative number, got NaN'
    );
  });

  it('formats moduli', () => {
    expect(formatModulus(210e9)).toBe('210.0 GPa');
    expect(formatModulus(35e6)).toBe('35.0 MPa');
    expect(formatModulus(500)).toBe('500.0 Pa');
  });
});
