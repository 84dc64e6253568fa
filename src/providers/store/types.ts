/**
 * Key/value blob storage used for persisted indices and answers.
 * Values are opaque strings; serialization belongs to the caller.
 */
export interface BlobStore {
  get(key: string): Promise<string | undefined>;
  put(key: string, value: string): Promise<void>;
}
