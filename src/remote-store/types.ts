/**
 * Remote Store - Type Definitions
 */

/**
 * Key-value store the profile layer persists into.
 *
 * Each key is written atomically on its own; nothing is atomic across keys.
 * Every call may fail transiently, callers wrap them with bounded retries.
 */
export interface RemoteStore {
  /**
   * Read the value stored under `key`, or undefined when the key does not exist
   */
  get(name: string, key: string): Promise<string | undefined>;

  /**
   * Write (overwrite) the value stored under `key`. Rejects on failure.
   */
  put(name: string, key: string, value: string): Promise<void>;

  /**
   * List up to `pageSize` keys stored under `name`, in numeric-aware order
   */
  listSorted(name: string, descending: boolean, pageSize: number): Promise<string[]>;
}

export type RemoteStoreOperation = 'get' | 'put' | 'listSorted';

/**
 * A single recorded store call (in-memory store only)
 */
export interface RemoteStoreCall {
  operation: RemoteStoreOperation;
  name: string;
  key?: string;
  timestamp: number;
}
