export { MemoryInstanceCache, type MemoryInstanceCacheDeps } from "./adapters/memory/memory-instance-cache"
export { MemoryMetadataCache, type MemoryMetadataCacheDeps } from "./adapters/memory/memory-metadata-cache"
export { MemoryRecordStore } from "./adapters/memory/memory-record-store"
export { configKey } from "./core/config-key"
export { InvalidatingRecordStore, type InvalidatingRecordStoreDeps } from "./core/invalidating-record-store"
export { RecordNotFoundError } from "./core/record-not-found-error"
export { computeExistingIds, type SeedResult, seedMissing } from "./core/seed"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type { ConfigKey, ConfigKeyPart, KeyOf } from "./ports/config-key"
export type { InstanceCache, InstanceFactory } from "./ports/instance-cache"
export type { MetadataCache, MetadataInvalidator } from "./ports/metadata-cache"
export type { IdOf, RecordReader, RecordStore } from "./ports/record-store"
