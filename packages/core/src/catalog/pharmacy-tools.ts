import { z } from "zod";
import type { DatasetStore, MedicationRecord } from "../interfaces/dataset-store.js";
import type { Tool, ToolOutcome } from "../interfaces/tool.js";
import { defineTool } from "./define-tool.js";

export interface PharmacyToolOptions {
  /** Clock used for prescription expiry. Defaults to the system clock. */
  now?: () => Date;
}

const ok = (data: unknown): ToolOutcome => ({ status: "ok", data });
const notFound = (error: string): ToolOutcome => ({ status: "not_found", error });

function medicationPayload(med: MedicationRecord) {
  return {
    id: med.id,
    name: med.name,
    name_he: med.nameHe,
    description: med.description,
    description_he: med.descriptionHe,
    active_ingredient: med.activeIngredient,
    dosage_form: med.dosageForm,
    standard_dosage: med.standardDosage,
    requires_prescription: med.requiresPrescription,
    price: med.price,
  };
}

/** YYYY-MM-DD in local time, comparable with stored expiry dates. */
export function localIsoDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

const medicationName = z
  .string({ required_error: "medication_name is required" })
  .trim()
  .min(1, "medication_name must not be empty");

export function createPharmacyTools(
  store: DatasetStore,
  options: PharmacyToolOptions = {}
): Tool[] {
  const now = options.now ?? (() => new Date());

  const getMedicationByName = defineTool({
    name: "get_medication_by_name",
    description:
      "Look up a medication by name (English or Hebrew, partial names accepted). " +
      "Returns id, description, active ingredient, dosage form, standard dosage, " +
      "whether a prescription is required, and price. Only the first match is returned.",
    args: z.object({
      medication_name: medicationName.describe("Name of the medication, in English or Hebrew"),
    }),
    handler: ({ medication_name }) => {
      // first match wins: the store never ranks or returns several candidates
      const med = store.findMedicationByName(medication_name);
      return med ? ok(medicationPayload(med)) : notFound("Medication not found");
    },
  });

  const checkInventory = defineTool({
    name: "check_inventory",
    description:
      "Check whether a medication is in stock and how many units are available. " +
      "Requires the medication id returned by get_medication_by_name.",
    args: z.object({
      medication_id: z
        .preprocess(
          (value) => (typeof value === "string" && /^\s*\d+\s*$/.test(value) ? Number(value) : value),
          z
            .number({ invalid_type_error: "medication_id must be a number" })
            .int("medication_id must be an integer")
            .positive("medication_id must be positive")
        )
        .describe("Medication id from get_medication_by_name"),
    }),
    handler: ({ medication_id }) => {
      const med = store.getMedicationById(medication_id);
      if (!med) return notFound("Medication not found");

      const quantity = store.getStock(med.id)?.quantity ?? 0;
      return ok({
        medication_id: med.id,
        name: med.name,
        stock_quantity: quantity,
        in_stock: quantity > 0,
        price: med.price,
      });
    },
  });

  const verifyUserPrescription = defineTool({
    name: "verify_user_prescription",
    description:
      "Verify whether a customer holds a valid, unexpired prescription for a medication. " +
      "Use before dispensing prescription-only medications.",
    args: z.object({
      user_id: z.coerce
        .string()
        .trim()
        .regex(/^\d{9}$/, "user_id must be a 9-digit identifier")
        .describe("The customer's 9-digit ID number"),
      medication_name: medicationName.describe("Name of the medication to check"),
    }),
    handler: ({ user_id, medication_name }) => {
      const user = store.findUserByIdNumber(user_id);
      if (!user) return notFound("User not found");

      const med = store.findMedicationByName(medication_name);
      if (!med) return notFound("Medication not found");

      // Expiry decides validity at call time; the stored active flag does not.
      const rx = store.findPrescription(user.id, med.id);
      if (!rx || rx.expiryDate < localIsoDate(now())) {
        return ok({ has_prescription: false, medication: med.name });
      }

      return ok({
        has_prescription: true,
        medication: med.name,
        dosage: rx.dosage,
        refills_remaining: rx.refillsRemaining,
        expiry_date: rx.expiryDate,
      });
    },
  });

  return [getMedicationByName, checkInventory, verifyUserPrescription];
}
