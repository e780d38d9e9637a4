/**
 * Byte sources backing the message store
 */

import { closeSync, fstatSync, openSync, readSync } from 'node:fs'
import type { ByteSource, Safe } from '@nipvm/types'
import { safeCall } from '@nipvm/types'

/**
 * In-memory source over a byte array
 */
export class BufferByteSource implements ByteSource {
  constructor(private readonly bytes: Uint8Array) {}

  get size(): number {
    return this.bytes.length
  }

  read(position: number, length: number): Uint8Array {
    if (position >= this.bytes.length) return new Uint8Array(0)
    return this.bytes.slice(position, position + length)
  }
}

/**
 * Positional reads from an open file descriptor
 */
export class FileByteSource implements ByteSource {
  private fd: number | null

  private constructor(
    fd: number,
    readonly path: string,
    readonly size: number,
  ) {
    this.fd = fd
  }

  static open(path: string): Safe<FileByteSource> {
    return safeCall(() => {
      const fd = openSync(path, 'r')
      return new FileByteSource(fd, path, fstatSync(fd).size)
    })
  }

  read(position: number, length: number): Uint8Array {
    if (this.fd === null) {
      throw new Error(`Message file ${this.path} is closed`)
    }
    const buffer = new Uint8Array(length)
    const bytesRead = readSync(this.fd, buffer, 0, length, position)
    return buffer.subarray(0, bytesRead)
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd)
      this.fd = null
    }
  }
}
