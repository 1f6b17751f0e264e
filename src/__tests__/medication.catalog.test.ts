import { describe, it, expect } from 'vitest';

import { MEDICATION_CATALOG, pickMedication } from '@services/booking/medication.catalog.js';

describe('pickMedication', () => {
  it.each([
    [0, 'Amoxicillin'],
    [0.2, 'Paracetamol'],
    [0.4, 'Ibuprofen'],
    [0.99, 'Ciprofloxacin'],
  ])('random %d picks %s', (r, medication) => {
    expect(pickMedication(() => r).medication).toBe(medication);
  });

  it('clamps an out-of-range source to the last entry', () => {
    expect(pickMedication(() => 1)).toEqual({ medication: 'Ciprofloxacin', dosage: '1-0-1', days: 10 });
  });

  it('returns a copy', () => {
    const item = pickMedication(() => 0);
    item.days = 99;
    expect(MEDICATION_CATALOG[0]?.days).toBe(7);
  });

  it('refuses an empty catalog', () => {
    expect(() => pickMedication(() => 0, [])).toThrow('Medication catalog is empty');
  });
});
