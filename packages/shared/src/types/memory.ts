/** A persisted topic → content record */
export interface MemoryEntry {
  topic: string;
  content: string;
  createdAt: string;
  updatedAt: string;
  /** Store-wide write counter; higher means more recent */
  revision: number;
}

/** What a remember call did to the store */
export type RememberAction = "stored" | "updated";

export interface RememberResult {
  action: RememberAction;
  entry: MemoryEntry;
  /** Oldest entries dropped to stay under the store's cap */
  pruned: number;
}

export interface ForgetResult {
  deleted: boolean;
}

/** Failure conditions a memory operation can report */
export type MemoryErrorCode = "INVALID_INPUT" | "STORAGE_UNAVAILABLE";

/** Query that matches every entry */
export const RECALL_WILDCARD = "*";
