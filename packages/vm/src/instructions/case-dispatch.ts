/**
 * Case Dispatch Instruction
 *
 * Block layout after the `*` symbol:
 *
 *   kind  [reference operand, by_reference only]  count  total
 *   { value  skip  body[skip] } x count
 *
 * `total` counts every symbol after the total operand, so the block ends at
 * (position after total) + total. Entry bodies are stored inline; a matched
 * entry leaves the cursor at its body and pushes a `case` frame so the body's
 * EndSym resumes after the block.
 */

import { CONTROL_CHARS } from '@nipvm/codec'
import type { CaseKind } from '@nipvm/types'
import { VM_ANOMALIES } from '@nipvm/types'
import { CASE_KINDS } from '../config'
import type { MessageCursor } from '../cursor'
import {
  ControlInstruction,
  type Disassembly,
  type InstructionContext,
  type InstructionResult,
} from './base'

export interface CaseHeader {
  /** undefined when the tag names no known kind */
  kind: CaseKind | undefined
  tag: number
  reference: number
  count: number
  total: number
  /** Offset just past the whole block */
  endPosition: number
}

export interface CaseEntryHeader {
  value: number
  skip: number
  bodyPosition: number
}

/**
 * Read a case header with the cursor just past the `*` symbol
 */
export function readCaseHeader(cursor: MessageCursor): CaseHeader {
  const tag = cursor.nextSymbol()
  const kind = CASE_KINDS[tag]
  const reference = kind === 'by_reference' ? cursor.readOperand() : 0
  const count = cursor.nextSymbol()
  const total = cursor.readOperand()
  return {
    kind,
    tag,
    reference,
    count,
    total,
    endPosition: cursor.offset + total,
  }
}

export function readCaseEntryHeader(cursor: MessageCursor): CaseEntryHeader {
  const value = cursor.nextSymbol()
  const skip = cursor.readOperand()
  return { value, skip, bodyPosition: cursor.offset }
}

/**
 * CASE (*)
 */
export class CaseDispatchInstruction extends ControlInstruction {
  readonly control = CONTROL_CHARS.CASE
  readonly name = 'CASE'

  execute(context: InstructionContext): InstructionResult {
    const { cursor } = context
    const header = readCaseHeader(cursor)
    const matchValue = this.matchValue(context, header)

    context.log('CASE', {
      kind: header.kind ?? header.tag,
      count: header.count,
      matchValue,
    })

    for (let index = 0; index < header.count; index++) {
      const entry = readCaseEntryHeader(cursor)
      const matched =
        header.kind === 'random'
          ? index === matchValue
          : entry.value === 0 || entry.value === matchValue

      if (matched) {
        this.enterEntry(context, header)
        return this.continue()
      }
      cursor.jumpAbsolute(entry.bodyPosition + entry.skip)
    }

    if (cursor.offset < header.endPosition) {
      cursor.jumpAbsolute(header.endPosition)
    } else if (cursor.offset > header.endPosition) {
      context.recordAnomaly(
        VM_ANOMALIES.CASE_BLOCK_OVERRUN,
        `CASE: entries end at ${cursor.offset}, past block end ${header.endPosition}`,
      )
    }
    return this.continue()
  }

  override disassemble(cursor: MessageCursor): Disassembly {
    const header = readCaseHeader(cursor)
    const kind = header.kind ?? `kind(${header.tag})`
    const reference = header.kind === 'by_reference' ? ` [${header.reference}]` : ''
    return {
      text: `CASE ${kind}${reference} entries=${header.count} size=${header.total} end=${header.endPosition}`,
      caseEntries: header.count,
    }
  }

  private matchValue(context: InstructionContext, header: CaseHeader): number {
    switch (header.kind) {
      case 'random':
        return header.count > 0 ? context.host.randomInt(header.count) : -1
      case 'by_word':
      case 'by_synonym':
        return context.host.currentVerbCode()
      case 'by_reference':
        return context.host.resolveCaseReference(header.reference)
      case undefined:
        context.recordAnomaly(
          VM_ANOMALIES.UNKNOWN_CASE_KIND,
          `CASE: kind tag ${header.tag}, matching wildcard entries only`,
        )
        return 0
    }
  }

  private enterEntry(context: InstructionContext, header: CaseHeader): void {
    const { cursor, callStack } = context
    const pushed = callStack.pushFrame({
      kind: 'case',
      base: cursor.base,
      offset: header.endPosition,
      declaredLength: cursor.declaredLength,
    })
    if (!pushed) {
      context.recordAnomaly(
        VM_ANOMALIES.CALL_STACK_OVERFLOW,
        `CASE: depth ${callStack.getDepth()} reached, entry body will not return past the block`,
      )
    }
  }
}
