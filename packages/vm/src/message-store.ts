import { MESSAGE_FILE_FORMAT } from '@nipvm/codec'
import { logger, zeroPad } from '@nipvm/core'
import type {
  ByteSource,
  ChunkData,
  MessageFileFormat,
  PageCacheStats,
  PageRef,
} from '@nipvm/types'
import { STORE_ANOMALIES } from '@nipvm/types'
import { STORE_CONFIG } from './config'

export interface MessageStoreOptions {
  /** Pages kept before least-recently-used eviction */
  capacity?: number
  format?: MessageFileFormat
}

/**
 * Paged Message Store
 *
 * Virtual memory over the message file. Pages are loaded on first reference
 * and kept in a bounded map keyed by page number; when the map is full the
 * least recently used page is evicted. Pages are immutable for the life of
 * the store, so a reloaded page is bit-identical to the evicted copy.
 */
export class PagedMessageStore {
  readonly format: MessageFileFormat
  readonly capacity: number

  // Map iteration order doubles as recency order (oldest first)
  private readonly pages = new Map<number, PageRef>()
  private readonly counters = {
    hits: 0,
    misses: 0,
    evictions: 0,
    shortReads: 0,
  }

  constructor(
    private readonly source: ByteSource,
    options: MessageStoreOptions = {},
  ) {
    this.format = options.format ?? MESSAGE_FILE_FORMAT
    this.capacity = Math.max(1, options.capacity ?? STORE_CONFIG.DEFAULT_CAPACITY)
  }

  /**
   * Number of chunk records the source holds, when its size is known
   */
  get recordCount(): number | undefined {
    const size = this.source.size
    if (size === undefined) return undefined
    const { pageSize, pageHeaderSize, chunkWidth, chunksPerPage } = this.format
    const fullPages = Math.floor(size / pageSize)
    const tail = size % pageSize
    const tailRecords =
      tail > pageHeaderSize
        ? Math.min(chunksPerPage, Math.ceil((tail - pageHeaderSize) / chunkWidth))
        : 0
    return fullPages * chunksPerPage + tailRecords
  }

  /**
   * Null (0), negative, non-integer and past-the-end record addresses hold
   * no message
   */
  isValidAddress(address: number): boolean {
    if (!Number.isInteger(address) || address <= 0) return false
    const records = this.recordCount
    return records === undefined || address < records
  }

  get stats(): PageCacheStats {
    return { ...this.counters, cachedPages: this.pages.size }
  }

  isCached(pageNumber: number): boolean {
    return this.pages.has(pageNumber)
  }

  /**
   * Copy of a page; the cached bytes stay private to the store
   */
  getPage(pageNumber: number): PageRef {
    const page = this.cachedPage(pageNumber)
    return { pageNumber: page.pageNumber, data: page.data.slice() }
  }

  /**
   * Copy of the chunk bytes for a record index
   */
  readChunk(recordIndex: number): ChunkData {
    const { pageHeaderSize, chunkWidth, chunksPerPage } = this.format
    if (!Number.isInteger(recordIndex) || recordIndex < 0) {
      logger.warn('PagedMessageStore: invalid record index', { recordIndex })
      return new Uint8Array(chunkWidth)
    }
    const pageNumber = Math.floor(recordIndex / chunksPerPage)
    const byteOffset = pageHeaderSize + (recordIndex % chunksPerPage) * chunkWidth
    const page = this.cachedPage(pageNumber)
    return page.data.slice(byteOffset, byteOffset + chunkWidth)
  }

  private cachedPage(pageNumber: number): PageRef {
    if (!Number.isInteger(pageNumber) || pageNumber < 0) {
      logger.warn('PagedMessageStore: invalid page number', {
        kind: STORE_ANOMALIES.INVALID_PAGE_NUMBER,
        pageNumber,
      })
      return { pageNumber, data: new Uint8Array(this.format.pageSize) }
    }

    const cached = this.pages.get(pageNumber)
    if (cached) {
      this.counters.hits++
      this.pages.delete(pageNumber)
      this.pages.set(pageNumber, cached)
      return cached
    }

    this.counters.misses++
    const page = this.loadPage(pageNumber)
    if (this.pages.size >= this.capacity) {
      this.evictOldest()
    }
    this.pages.set(pageNumber, page)
    return page
  }

  private loadPage(pageNumber: number): PageRef {
    const { pageSize } = this.format
    const bytes = this.source.read(pageNumber * pageSize, pageSize)

    if (bytes.length < pageSize) {
      this.counters.shortReads++
      logger.warn('PagedMessageStore: short page read, zero-filling', {
        kind: STORE_ANOMALIES.SHORT_PAGE_READ,
        pageNumber,
        bytesRead: bytes.length,
      })
    }

    return { pageNumber, data: zeroPad(bytes, pageSize) }
  }

  private evictOldest(): void {
    const oldest = this.pages.keys().next()
    if (oldest.done) return
    this.pages.delete(oldest.value)
    this.counters.evictions++
    logger.debug('PagedMessageStore: evicted page', { pageNumber: oldest.value })
  }
}
