/**
 * Message Assembler
 *
 * Builds message symbol streams with correctly sized forward jumps,
 * conditional blocks, calls, opcode invocations and case blocks. Nested
 * blocks are passed as assemblers of their own; their length fixes the
 * operand of the enclosing construct.
 */

import {
  CONTROL_SYMBOLS,
  operandSymbols,
  SYMBOL_CONFIG,
  type SymbolCodec,
  symbolCodec,
} from '@nipvm/codec'
import type { CaseKind, Nip, OpcodeCategory } from '@nipvm/types'
import { caseKindTag } from './config'
import { opcodeSymbol, operationName } from './operations'

export interface CaseEntry {
  /** Selector value; 0 is the wildcard. Ignored for random blocks */
  value?: number
  body: MessageAssembler
}

const OPCODE_CONTROLS: Record<OpcodeCategory, { plain: Nip; withRef: Nip }> = {
  action: { plain: CONTROL_SYMBOLS.ACTION, withRef: CONTROL_SYMBOLS.ACTION_REF },
  test: { plain: CONTROL_SYMBOLS.TEST, withRef: CONTROL_SYMBOLS.TEST_REF },
  edit: { plain: CONTROL_SYMBOLS.EDIT, withRef: CONTROL_SYMBOLS.EDIT_REF },
}

// value symbol + skip operand
const CASE_ENTRY_HEADER = 3

export class MessageAssembler {
  private readonly stream: Nip[] = []

  constructor(private readonly codec: SymbolCodec = symbolCodec) {}

  get length(): number {
    return this.stream.length
  }

  toSymbols(): Nip[] {
    return [...this.stream]
  }

  /**
   * Literal text; control characters in it are not escaped
   */
  text(value: string): this {
    this.stream.push(...this.codec.encodeText(value))
    return this
  }

  raw(...nips: Nip[]): this {
    for (const nip of nips) {
      if (!Number.isInteger(nip) || nip < 0 || nip > SYMBOL_CONFIG.MASK) {
        throw new RangeError(`Symbol ${nip} outside [0, ${SYMBOL_CONFIG.MASK}]`)
      }
      this.stream.push(nip)
    }
    return this
  }

  operand(value: number): this {
    this.stream.push(...operandSymbols(value))
    return this
  }

  append(other: MessageAssembler): this {
    this.stream.push(...other.stream)
    return this
  }

  jump(delta: number): this {
    return this.raw(CONTROL_SYMBOLS.JUMP).operand(delta)
  }

  /** Unconditional jump past `body`, which is still emitted inline */
  jumpOver(body: MessageAssembler): this {
    return this.jump(body.length).append(body)
  }

  /** `body` runs only when the test flag is set */
  ifTrue(body: MessageAssembler): this {
    return this.raw(CONTROL_SYMBOLS.JUMP_IF_FALSE)
      .operand(body.length)
      .append(body)
  }

  /** `thenBody` when the test flag is set, `elseBody` otherwise */
  ifElse(thenBody: MessageAssembler, elseBody: MessageAssembler): this {
    // then-branch ends with a jump over the else-branch
    const jumpLength = 1 + 2
    return this.raw(CONTROL_SYMBOLS.JUMP_IF_FALSE)
      .operand(thenBody.length + jumpLength)
      .append(thenBody)
      .jumpOver(elseBody)
  }

  call(address: number): this {
    return this.raw(CONTROL_SYMBOLS.CALL).operand(address)
  }

  action(code: number, reference?: number): this {
    return this.opcode('action', code, reference)
  }

  test(code: number, reference?: number): this {
    return this.opcode('test', code, reference)
  }

  edit(code: number, reference?: number): this {
    return this.opcode('edit', code, reference)
  }

  caseBlock(
    kind: CaseKind,
    entries: readonly CaseEntry[],
    reference?: number,
  ): this {
    if (entries.length > SYMBOL_CONFIG.MASK) {
      throw new RangeError(`Case block with ${entries.length} entries`)
    }
    const total = entries.reduce(
      (sum, entry) => sum + CASE_ENTRY_HEADER + entry.body.length,
      0,
    )

    this.raw(CONTROL_SYMBOLS.CASE, caseKindTag(kind))
    if (kind === 'by_reference') {
      this.operand(reference ?? 0)
    }
    this.raw(entries.length).operand(total)
    for (const entry of entries) {
      this.raw(entry.value ?? 0)
        .operand(entry.body.length)
        .append(entry.body)
    }
    return this
  }

  end(): this {
    return this.raw(CONTROL_SYMBOLS.END)
  }

  private opcode(category: OpcodeCategory, code: number, reference?: number): this {
    const nip = opcodeSymbol(category, code)
    if (nip === undefined) {
      throw new RangeError(
        `Operation ${operationName(code)} (${code}) unreachable from ${category}`,
      )
    }
    const controls = OPCODE_CONTROLS[category]
    if (reference === undefined) {
      return this.raw(controls.plain, nip)
    }
    return this.raw(controls.withRef, nip).operand(reference)
  }
}
