/**
 * Message file types
 *
 * The message file is a flat sequence of fixed-size pages. Each page has a
 * short header followed by fixed-width chunks, each chunk packing a fixed
 * number of 6-bit symbols.
 */

/** A 6-bit symbol ("nip"), 0-63 */
export type Nip = number

/** Packed chunk bytes (chunkWidth bytes) */
export type ChunkData = Uint8Array

export interface MessageFileFormat {
  /** Bytes per page */
  pageSize: number
  /** Bytes skipped at the start of every page */
  pageHeaderSize: number
  /** Fill byte written into page headers by the builder */
  pageHeaderFill: number
  /** Bytes per chunk */
  chunkWidth: number
  /** Symbols per chunk */
  chunkSymbols: number
  /** Chunks per page */
  chunksPerPage: number
}

/**
 * Random-access byte source backing the message store
 *
 * `read` may return fewer bytes than requested (end of source); the store
 * zero-fills the remainder.
 */
export interface ByteSource {
  /** Total size in bytes, when known */
  readonly size: number | undefined
  read(position: number, length: number): Uint8Array
}

export interface PageRef {
  readonly pageNumber: number
  readonly data: Uint8Array
}

export interface PageCacheStats {
  hits: number
  misses: number
  evictions: number
  shortReads: number
  cachedPages: number
}
