/**
 * KeyValueStore
 *
 * Hash-shaped persistence used by the link store. Keys name a hash (one per
 * chat); fields inside it hold serialized records. Every call is one round trip.
 */
export interface KeyValueStore {
  getField(key: string, field: string): Promise<string | null>;
  setField(key: string, field: string, value: string): Promise<void>;
  /** Remove several fields in one call, returning how many existed */
  deleteFields(key: string, fields: readonly string[]): Promise<number>;
  getAllFields(key: string): Promise<Record<string, string>>;
  countFields(key: string): Promise<number>;
  /** Atomically add one to an integer key and return the new value */
  increment(key: string): Promise<number>;
  set(key: string, value: string): Promise<void>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}
