import { z } from "zod";
import {
  MedicationRecordSchema,
  PrescriptionRecordSchema,
  StockRecordSchema,
  UserRecordSchema,
  type DatasetStore,
  type MedicationRecord,
  type PrescriptionRecord,
  type StockRecord,
  type UserRecord,
} from "@pharmacy-agent/core";

export const DatasetContentsSchema = z.object({
  medications: z.array(MedicationRecordSchema),
  stock: z.array(StockRecordSchema),
  users: z.array(UserRecordSchema),
  prescriptions: z.array(PrescriptionRecordSchema),
});
export type DatasetContents = z.infer<typeof DatasetContentsSchema>;

export class DatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatasetError";
  }
}

/**
 * Read-only store over a validated snapshot of the pharmacy data. Built once
 * at startup and shared by every request; nothing mutates it afterwards.
 */
export class InMemoryDatasetStore implements DatasetStore {
  private readonly medications: readonly MedicationRecord[];
  private readonly medicationsById: ReadonlyMap<number, MedicationRecord>;
  private readonly stockByMedication: ReadonlyMap<number, StockRecord>;
  private readonly usersByIdNumber: ReadonlyMap<string, UserRecord>;
  private readonly prescriptions: readonly PrescriptionRecord[];

  constructor(raw: unknown) {
    const parsed = DatasetContentsSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ");
      throw new DatasetError(`Invalid dataset: ${issues}`);
    }
    const data = deepFreeze(parsed.data);

    this.medications = data.medications;
    this.medicationsById = indexUnique(data.medications, (m) => m.id, "medication id");
    this.stockByMedication = indexUnique(data.stock, (s) => s.medicationId, "stock medicationId");
    this.usersByIdNumber = indexUnique(data.users, (u) => u.idNumber, "user idNumber");
    indexUnique(data.prescriptions, (p) => p.id, "prescription id");
    this.prescriptions = data.prescriptions;

    const userIds = new Set(data.users.map((u) => u.id));
    for (const s of data.stock) {
      if (!this.medicationsById.has(s.medicationId)) {
        throw new DatasetError(`Stock entry refers to unknown medication ${s.medicationId}`);
      }
    }
    for (const p of data.prescriptions) {
      if (!this.medicationsById.has(p.medicationId)) {
        throw new DatasetError(`Prescription ${p.id} refers to unknown medication ${p.medicationId}`);
      }
      if (!userIds.has(p.userId)) {
        throw new DatasetError(`Prescription ${p.id} refers to unknown user ${p.userId}`);
      }
    }
  }

  findMedicationByName(text: string): MedicationRecord | undefined {
    const needle = text.trim().toLowerCase();
    if (needle === "") return undefined;
    return this.medications.find(
      (m) => m.name.toLowerCase().includes(needle) || m.nameHe.toLowerCase().includes(needle)
    );
  }

  getMedicationById(id: number): MedicationRecord | undefined {
    return this.medicationsById.get(id);
  }

  getStock(medicationId: number): StockRecord | undefined {
    return this.stockByMedication.get(medicationId);
  }

  findUserByIdNumber(idNumber: string): UserRecord | undefined {
    return this.usersByIdNumber.get(idNumber.trim());
  }

  findPrescription(userId: number, medicationId: number): PrescriptionRecord | undefined {
    let latest: PrescriptionRecord | undefined;
    for (const p of this.prescriptions) {
      if (p.userId !== userId || p.medicationId !== medicationId) continue;
      // ISO dates order lexically; ties go to the later record
      if (latest === undefined || p.issuedDate >= latest.issuedDate) latest = p;
    }
    return latest;
  }

  get counts(): { medications: number; users: number; prescriptions: number } {
    return {
      medications: this.medications.length,
      users: this.usersByIdNumber.size,
      prescriptions: this.prescriptions.length,
    };
  }
}

function indexUnique<T, K>(items: readonly T[], key: (item: T) => K, label: string): Map<K, T> {
  const index = new Map<K, T>();
  for (const item of items) {
    const k = key(item);
    if (index.has(k)) {
      throw new DatasetError(`Duplicate ${label}: ${String(k)}`);
    }
    index.set(k, item);
  }
  return index;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}
