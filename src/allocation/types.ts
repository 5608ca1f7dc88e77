/**
 * Buffer allocation interfaces
 *
 * A scene never owns GPU memory. It asks a shared allocator for space in two
 * steps: every scene first reserves the sizes it needs, the allocator then
 * commits (and may move every existing allocation), and only afterwards are
 * concrete handles handed out.
 */

import type { ErrorDetail, Result } from "../errors";

export type AllocErrorCode =
  | "ALLOC_COMMIT"
  | "ALLOC_BUFFER"
  | "ALLOC_METADATA"
  | "ALLOC_FLUSH"
  | "METADATA_WRITE"
  | "BUFFER_TOO_SMALL";

export type AllocError = ErrorDetail<AllocErrorCode>;

export type AllocResult<T> = Result<T, AllocError>;

/** A byte range of committed storage */
export interface BufferHandle {
  /** Backing storage; replaced by every commit */
  readonly buffer: ArrayBuffer;
  /** Byte offset into the storage (multiple of 4) */
  readonly offset: number;
  /** Size in bytes */
  readonly size: number;
}

/** Destination of staged writes */
export interface UploadQueue {
  writeBuffer(byteOffset: number, data: Uint8Array): void;
}

export interface BufferAllocator {
  /** Announce that `size` bytes will be requested after the next commit */
  reserve(size: number): void;
  /** Allocate physical storage for all reservations, invalidating earlier handles */
  commitReservations(): AllocResult<void>;
  /** Hand out committed space for the `(slot, scope)` key */
  allocateBuffer(slot: number, scope: string, size: number): AllocResult<BufferHandle>;
  /** Schedule a handle's bytes for upload on the next flush */
  markDirty(handle: BufferHandle): void;
  /** Upload every dirty range */
  flush(queue?: UploadQueue): AllocResult<void>;
}

export interface MetadataHandle {
  /** Byte offset in the metadata buffer */
  readonly offset: number;
  readonly size: number;
}

export interface MetadataService {
  allocateMetadata(size: number): AllocResult<MetadataHandle>;
  writeMetadata(handle: MetadataHandle, bytes: Uint8Array): AllocResult<void>;
  writeMetadataAt(handle: MetadataHandle, byteOffset: number, bytes: Uint8Array): AllocResult<void>;
}
