import { MessageFileBuilder, unpackChunk } from '@nipvm/codec'
import { describe, expect, it } from 'vitest'
import { MessageAssembler } from '../assembler'
import { BufferByteSource } from '../byte-source'
import { MessageCursor } from '../cursor'
import { PagedMessageStore } from '../message-store'
import { storeWith } from './test-utils'

function storeWithContent(address: number, content: number[]): PagedMessageStore {
  const builder = new MessageFileBuilder()
  builder.placeMessage(address, content)
  return new PagedMessageStore(new BufferByteSource(builder.build()))
}

describe('MessageCursor', () => {
  it('should read the header and stop just past it', () => {
    const { store } = storeWith([new MessageAssembler().text('hi').end()])
    const cursor = new MessageCursor(store)

    cursor.open(1)

    expect(cursor.declaredLength).toBe(3)
    expect(cursor.position).toBe(2)
    expect(cursor.nextCharacter()).toBe('h')
    expect(cursor.nextCharacter()).toBe('i')
    expect(cursor.nextCharacter()).toBe('@')
  })

  it('should cross chunk and page boundaries transparently', () => {
    const content = Array.from({ length: 40 }, (_, i) => i)
    // records 80..85: the last one is on page 1
    const store = storeWithContent(80, content)
    const cursor = new MessageCursor(store)

    cursor.open(80)
    const read = Array.from({ length: 40 }, () => cursor.nextSymbol())

    expect(read).toEqual(content)
    expect(cursor.pageNumber).toBe(1)
  })

  it('should agree with a direct read of the chunk records', () => {
    const content = Array.from({ length: 30 }, (_, i) => (i * 5) % 64)
    const store = storeWithContent(3, content)
    const cursor = new MessageCursor(store)

    cursor.open(3)
    const direct = [3, 4, 5, 6]
      .flatMap((record) => unpackChunk(store.readChunk(record)))
      .slice(2, 32)
    const read = Array.from({ length: 30 }, () => cursor.nextSymbol())

    expect(read).toEqual(direct)
  })

  it('should combine two symbols into a big-endian operand', () => {
    const store = storeWithContent(1, [2, 2, 63, 63])
    const cursor = new MessageCursor(store)

    cursor.open(1)

    expect(cursor.readOperand()).toBe(130)
    expect(cursor.readOperand()).toBe(4095)
  })

  it('should treat a zero jump as a no-op', () => {
    const store = storeWithContent(1, [1, 2, 3])
    const cursor = new MessageCursor(store)
    cursor.open(1)

    expect(cursor.jumpRelative(0)).toBe(false)
    expect(cursor.position).toBe(2)
  })

  it('should return to the same position after opposite jumps', () => {
    const content = Array.from({ length: 20 }, (_, i) => i)
    const store = storeWithContent(1, content)
    const cursor = new MessageCursor(store)
    cursor.open(1)
    cursor.nextSymbol()

    cursor.jumpRelative(9)
    expect(cursor.position).toBe(12)
    cursor.jumpRelative(-9)

    expect(cursor.position).toBe(3)
    expect(cursor.nextSymbol()).toBe(1)
  })

  it('should clamp a jump before the start to position 0', () => {
    const store = storeWithContent(1, [1, 2, 3])
    const cursor = new MessageCursor(store)
    cursor.open(1)

    expect(cursor.jumpRelative(-(cursor.position + 1))).toBe(true)
    expect(cursor.position).toBe(0)
  })

  it('should reposition absolutely across records', () => {
    const content = Array.from({ length: 20 }, (_, i) => i + 10)
    const store = storeWithContent(1, content)
    const cursor = new MessageCursor(store)
    cursor.open(1)

    expect(cursor.jumpAbsolute(10)).toBe(false)
    expect(cursor.recordIndex).toBe(2)
    expect(cursor.nextSymbol()).toBe(18)
  })

  it('should restore a snapshot taken in another message', () => {
    const { store } = storeWith([
      new MessageAssembler().text('abc').end(),
      new MessageAssembler().text('xyz').end(),
    ])
    const cursor = new MessageCursor(store)
    cursor.open(1)
    cursor.nextSymbol()
    const saved = cursor.snapshot()

    cursor.open(2)
    expect(cursor.nextCharacter()).toBe('x')
    cursor.restore(saved)

    expect(cursor.base).toBe(1)
    expect(cursor.nextCharacter()).toBe('b')
  })
})
