import { describe, it, expect } from 'vitest';
import { GenericSection } from './GenericSection';
import { MaterialisedGenericSection, isMaterialised } from './MaterialisedGenericSection';
import { RingSection } from './RingSection';
import { InvalidMaterialError } from './SectionErrors';

const square = new GenericSection([
  { x: 0, y: 0 },
  { x: 1, y: 0 },
  { x: 1, y: 1 },
  { x: 0, y: 1 },
]);

const testMaterial = { name: 'test', density: 2, elasticModulus: 10 };

describe('MaterialisedGenericSection', () => {
  it('delegates geometric properties unchanged', () => {
    const m = new MaterialisedGenericSection(square, testMaterial);
    expect(m.geometricProperties()).toBe(square.properties());
    expect(m.properties()).toBe(square.properties());
    expect(m.bounds()).toBe(square.bounds());
  });

  it('scales area and moments by density and modulus', () => {
    const w = new MaterialisedGenericSection(square, testMaterial).weightedProperties();
    expect(w.mass).toBeCloseTo(2, 12);
    expect(w.axialStiffness).toBeCloseTo(10, 12);
    expect(w.bendingStiffnessXx).toBeCloseTo(10 / 12, 12);
    expect(w.bendingStiffnessYy).toBeCloseTo(10 / 12, 12);
    expect(w.bendingStiffnessXy).toBeCloseTo(0, 12);
  });

  it('wraps a ring section', () => {
    const w = new MaterialisedGenericSection(new RingSection(2, 1), testMaterial).weightedProperties();
    expect(w.mass).toBeCloseTo(6 * Math.PI, 12);
    expect(w.bendingStiffnessXx).toBeCloseTo((150 * Math.PI) / 4, 12);
  });

  it('accepts zero density and modulus', () => {
    const w = new MaterialisedGenericSection(square, { density: 0, elasticModulus: 0 }).weightedProperties();
    expect(w.mass).toBe(0);
    expect(w.axialStiffness).toBe(0);
  });

  it('rejects negative density or modulus', () => {
    expect(() => new MaterialisedGenericSection(square, { density: -1, elasticModulus: 10 })).toThrow(
      InvalidMaterialError
    );
    expect(() => new MaterialisedGenericSection(square, { density: 1, elasticModulus: -10 })).toThrow(
      InvalidMaterialError
    );
  });

  it('keeps its material when moved', () => {
    const m = new MaterialisedGenericSection(square, testMaterial);
    const moved = m.translated(1, 1).rotated(Math.PI);
    expect(moved).toBeInstanceOf(MaterialisedGenericSection);
    expect(moved.material).toEqual(testMaterial);
    expect(moved.properties().centroid.x).toBeCloseTo(-1.5, 12);
    expect(moved.properties().centroid.y).toBeCloseTo(-1.5, 12);
    expect(moved.weightedProperties().mass).toBeCloseTo(2, 12);
  });

  it('isMaterialised distinguishes plain sections', () => {
    expect(isMaterialised(square)).toBe(false);
    expect(isMaterialised(new MaterialisedGenericSection(square, testMaterial))).toBe(true);
  });
});
