import type { MedicationItem, RandomSource } from '@core/interfaces/collaborators.types.js';

export const MEDICATION_CATALOG: readonly MedicationItem[] = Object.freeze([
  { medication: 'Amoxicillin', dosage: '1-0-1', days: 7 },
  { medication: 'Paracetamol', dosage: '1-1-1', days: 5 },
  { medication: 'Ibuprofen', dosage: '0-1-0', days: 3 },
  { medication: 'Azithromycin', dosage: '1-0-0', days: 5 },
  { medication: 'Ciprofloxacin', dosage: '1-0-1', days: 10 },
]);

/** Uniform pick; `random` must return a value in `[0, 1)` like `Math.random`. */
export function pickMedication(
  random: RandomSource,
  catalog: readonly MedicationItem[] = MEDICATION_CATALOG,
): MedicationItem {
  if (catalog.length === 0) throw new Error('Medication catalog is empty');
  const index = Math.min(Math.floor(random() * catalog.length), catalog.length - 1);
  const item = catalog[Math.max(index, 0)];
  if (!item) throw new Error(`No medication at index ${index}`);
  return { ...item };
}
