import type {
  DatasetStore,
  MedicationRecord,
  PrescriptionRecord,
  StockRecord,
  UserRecord,
} from '../src/interfaces/dataset-store.js';

export const medications: MedicationRecord[] = [
  {
    id: 1,
    name: 'Ibuprofen',
    nameHe: 'איבופרופן',
    description: 'Pain reliever and fever reducer',
    descriptionHe: 'משכך כאבים ומוריד חום',
    activeIngredient: 'Ibuprofen',
    dosageForm: 'Tablet',
    standardDosage: '200-400mg every 4-6 hours',
    requiresPrescription: false,
    price: 25.9,
  },
  {
    id: 2,
    name: 'Amoxicillin',
    nameHe: 'אמוקסיצילין',
    description: 'Penicillin antibiotic',
    descriptionHe: 'אנטיביוטיקה ממשפחת הפניצילין',
    activeIngredient: 'Amoxicillin trihydrate',
    dosageForm: 'Capsule',
    standardDosage: '500mg every 8 hours',
    requiresPrescription: true,
    price: 42,
  },
  {
    id: 3,
    name: 'Loratadine',
    nameHe: 'לורטדין',
    description: 'Non-drowsy antihistamine',
    descriptionHe: 'אנטיהיסטמין שאינו גורם לנמנום',
    activeIngredient: 'Loratadine',
    dosageForm: 'Tablet',
    standardDosage: '10mg once daily',
    requiresPrescription: false,
    price: 31.5,
  },
];

export const stock: StockRecord[] = [
  { medicationId: 1, quantity: 150 },
  { medicationId: 2, quantity: 40 },
  { medicationId: 3, quantity: 0 },
];

export const users: UserRecord[] = [
  { id: 1, idNumber: '123456789', firstName: 'Dana', lastName: 'Levi' },
  { id: 2, idNumber: '987654321', firstName: 'Yossi', lastName: 'Cohen' },
];

export const prescriptions: PrescriptionRecord[] = [
  {
    id: 1,
    userId: 1,
    medicationId: 2,
    dosage: '500mg three times daily',
    refillsRemaining: 2,
    issuedDate: '2026-09-01',
    expiryDate: '2027-03-01',
    active: true,
  },
  {
    id: 2,
    userId: 2,
    medicationId: 2,
    dosage: '250mg twice daily',
    refillsRemaining: 0,
    issuedDate: '2025-01-10',
    expiryDate: '2025-07-10',
    active: true,
  },
];

/** Minimal store over the arrays above. */
export class FakeDatasetStore implements DatasetStore {
  findMedicationByName(text: string): MedicationRecord | undefined {
    const needle = text.trim().toLowerCase();
    return medications.find(
      (m) => m.name.toLowerCase().includes(needle) || m.nameHe.includes(needle)
    );
  }

  getMedicationById(id: number): MedicationRecord | undefined {
    return medications.find((m) => m.id === id);
  }

  getStock(medicationId: number): StockRecord | undefined {
    return stock.find((s) => s.medicationId === medicationId);
  }

  findUserByIdNumber(idNumber: string): UserRecord | undefined {
    return users.find((u) => u.idNumber === idNumber);
  }

  findPrescription(userId: number, medicationId: number): PrescriptionRecord | undefined {
    return prescriptions.find((p) => p.userId === userId && p.medicationId === medicationId);
  }
}
