import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { InMemoryDatasetStore } from "./in-memory-store.js";

const FILES = ["medications", "stock", "users", "prescriptions"] as const;

/** Directory holding the bundled sample data. */
export const DEFAULT_DATA_DIR = fileURLToPath(new URL("./data/", import.meta.url));

/**
 * Reads `medications.json`, `stock.json`, `users.json` and
 * `prescriptions.json` from `dataDir` and builds a validated store.
 */
export async function loadDataset(dataDir: string = DEFAULT_DATA_DIR): Promise<InMemoryDatasetStore> {
  const dir = resolve(dataDir);
  const entries = await Promise.all(
    FILES.map(async (name) => {
      const path = join(dir, `${name}.json`);
      let text: string;
      try {
        text = await readFile(path, "utf-8");
      } catch (err) {
        throw new Error(`Failed to read dataset file ${path}`, { cause: err });
      }
      try {
        return [name, JSON.parse(text) as unknown] as const;
      } catch (err) {
        throw new Error(`Dataset file ${path} is not valid JSON`, { cause: err });
      }
    })
  );
  return new InMemoryDatasetStore(Object.fromEntries(entries));
}
