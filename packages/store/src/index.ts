/**
 * @exposure/store
 *
 * Persistence for the exposure reconciliation kit: observed identifiers,
 * own rolling keys and the reconciliation checkpoint.
 */

export { StoreError } from "./types.js";
export type { StoreErrorCode } from "./types.js";

export {
  InMemoryObservationStore,
  InMemoryOwnKeyStore,
  InMemoryCheckpointStore,
} from "./in-memory-store.js";

export { JsonlObservationStore, JsonlOwnKeyStore } from "./jsonl-store.js";
export type { JsonlStoreOptions } from "./jsonl-store.js";

export { FileCheckpointStore } from "./checkpoint-store.js";

export { readJsonl, appendJsonl } from "./jsonl-file.js";
export type { JsonlLoadResult } from "./jsonl-file.js";
