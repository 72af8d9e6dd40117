export {
  InMemoryDatasetStore,
  DatasetContentsSchema,
  DatasetError,
} from "./in-memory-store.js";
export type { DatasetContents } from "./in-memory-store.js";

export { loadDataset, DEFAULT_DATA_DIR } from "./load-dataset.js";
