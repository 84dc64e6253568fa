export { FileBlobStore, type FileBlobStoreOptions } from './file';
export { MemoryBlobStore, type MemoryBlobStoreOptions } from './memory';
export type { BlobStore } from './types';
