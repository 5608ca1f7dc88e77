/**
 * Buffer allocation
 */

export * from "./types";
export { MemoryAllocator, type MemoryAllocatorOptions } from "./MemoryAllocator";
export { MemoryMetadataStore } from "./MemoryMetadataStore";
