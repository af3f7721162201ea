export const MEMORY_STORAGE_ADAPTER = 'memory';
export const CUSTOM_STORAGE_ADAPTER = 'custom';

export type StorageAdapterType =
  | typeof MEMORY_STORAGE_ADAPTER
  | typeof CUSTOM_STORAGE_ADAPTER;
