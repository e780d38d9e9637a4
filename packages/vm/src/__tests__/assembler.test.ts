import { describe, expect, it } from 'vitest'
import { MessageAssembler } from '../assembler'
import { OPERATIONS } from '../config'

const asm = () => new MessageAssembler()

describe('MessageAssembler', () => {
  it('should size a jump by the body it skips', () => {
    expect(asm().jumpOver(asm().text('ab')).toSymbols()).toEqual([
      27, 0, 2, 0, 7,
    ])
  })

  it('should lay out an if/else with a jump past the else branch', () => {
    expect(asm().ifElse(asm().text('a'), asm().text('b')).toSymbols()).toEqual(
      [28, 0, 4, 0, 27, 0, 1, 7],
    )
  })

  it('should choose the reference form of an opcode when given one', () => {
    expect(asm().action(OPERATIONS.ASG).toSymbols()).toEqual([30, 33])
    expect(asm().test(OPERATIONS.EQ, 130).toSymbols()).toEqual([44, 1, 2, 2])
    expect(asm().edit(OPERATIONS.FORCE, 1).toSymbols()).toEqual([45, 28, 0, 1])
  })

  it('should reject an operation outside the category code space', () => {
    expect(() => asm().action(200)).toThrow(RangeError)
    expect(() => asm().test(50)).toThrow(RangeError)
  })

  it('should interleave case values, skips and bodies', () => {
    const symbols = asm()
      .caseBlock(
        'by_reference',
        [{ value: 4, body: asm().text('a').end() }],
        12,
      )
      .toSymbols()

    expect(symbols).toEqual([29, 3, 0, 12, 1, 0, 5, 4, 0, 2, 0, 33])
  })

  it('should reject symbols and operands that do not fit', () => {
    expect(() => asm().raw(64)).toThrow(RangeError)
    expect(() => asm().operand(4096)).toThrow(RangeError)
    expect(() => asm().call(-1)).toThrow(RangeError)
  })
})
