import { z } from "zod";

export const MedicationRecordSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  nameHe: z.string().min(1),
  description: z.string(),
  descriptionHe: z.string(),
  activeIngredient: z.string(),
  dosageForm: z.string(),
  standardDosage: z.string(),
  requiresPrescription: z.boolean(),
  price: z.number().nonnegative(),
});
export type MedicationRecord = z.infer<typeof MedicationRecordSchema>;

export const StockRecordSchema = z.object({
  medicationId: z.number().int().positive(),
  quantity: z.number().int().nonnegative(),
});
export type StockRecord = z.infer<typeof StockRecordSchema>;

export const UserRecordSchema = z.object({
  id: z.number().int().positive(),
  idNumber: z.string().regex(/^\d{9}$/),
  firstName: z.string(),
  lastName: z.string(),
});
export type UserRecord = z.infer<typeof UserRecordSchema>;

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, {
  message: "Expected a YYYY-MM-DD date",
});

export const PrescriptionRecordSchema = z.object({
  id: z.number().int().positive(),
  userId: z.number().int().positive(),
  medicationId: z.number().int().positive(),
  dosage: z.string(),
  refillsRemaining: z.number().int().nonnegative(),
  issuedDate: IsoDateSchema,
  expiryDate: IsoDateSchema,
  // informational only; validity is decided by expiryDate
  active: z.boolean(),
});
export type PrescriptionRecord = z.infer<typeof PrescriptionRecordSchema>;

/**
 * Read-only lookups the tools run against. Implementations must not mutate
 * records they hand out; callers only read and serialize them.
 */
export interface DatasetStore {
  /** Case-insensitive partial match on English or Hebrew name. First match wins. */
  findMedicationByName(text: string): MedicationRecord | undefined;
  getMedicationById(id: number): MedicationRecord | undefined;
  getStock(medicationId: number): StockRecord | undefined;
  findUserByIdNumber(idNumber: string): UserRecord | undefined;
  /** Most recently issued prescription for the pair, expired or not. */
  findPrescription(userId: number, medicationId: number): PrescriptionRecord | undefined;
}
