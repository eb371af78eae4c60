import type { FulltextRecord } from "../types.js";

/**
 * Persistence for resolved full texts, keyed by (doi, url).
 */
export interface FulltextStore {
  /** DOIs that already have a full text stored without error */
  existingDois(): Promise<Set<string>>;
  /**
   * Insert a record. A record with the same (doi, url) already present is left
   * untouched and the call resolves to false.
   */
  insert(record: FulltextRecord): Promise<boolean>;
  /** All stored full texts without error, in insertion order */
  listFulltexts(): Promise<FulltextRecord[]>;
  close(): Promise<void>;
}
