import { Readable } from "node:stream";

/**
 * Flat key/object store. `exists` must be metadata-only and must answer `false`
 * only for an authoritative "not found"; any other failure rejects with
 * StoreQueryError.
 */
export interface ObjectStore {
  exists(key: string): Promise<boolean>;
  put(key: string, body: Readable, contentType: string): Promise<void>;
  describe(): string;
}
