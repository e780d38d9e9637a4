/**
 * Base Control Instruction System
 *
 * Defines the context handed to control-character handlers and the abstract
 * class they extend.
 */

import type { ControlChar } from '@nipvm/codec'
import type {
  EndReason,
  InterpreterControl,
  InterpreterStatus,
  OpcodeHost,
  VMAnomalyKind,
} from '@nipvm/types'
import { VM_ANOMALIES } from '@nipvm/types'
import type { MessageCallStack } from '../call-stack'
import type { MessageCursor } from '../cursor'

/**
 * Mutable view of one interpreter, passed to every handler
 */
export interface InstructionContext {
  cursor: MessageCursor
  callStack: MessageCallStack
  host: OpcodeHost
  control: InterpreterControl
  setTestFlag(value: boolean): void
  setStatus(status: InterpreterStatus): void
  /** True when `address` names a record the store can hold a message at */
  isValidAddress(address: number): boolean
  recordAnomaly(kind: VMAnomalyKind, detail: string): void
  log(message: string, data?: Record<string, unknown>): void
}

export interface InstructionResult {
  /** null = continue, otherwise end the execution */
  endReason: EndReason | null
}

export interface Disassembly {
  text: string
  /** Entry headers that follow inline (case blocks only) */
  caseEntries?: number
}

export interface ControlInstructionHandler {
  readonly control: ControlChar
  readonly name: string

  /**
   * Execute with the cursor just past the control symbol
   */
  execute(context: InstructionContext): InstructionResult

  /**
   * Consume the operands and describe them
   */
  disassemble(cursor: MessageCursor): Disassembly
}

export abstract class ControlInstruction implements ControlInstructionHandler {
  abstract readonly control: ControlChar
  abstract readonly name: string

  abstract execute(context: InstructionContext): InstructionResult

  disassemble(_cursor: MessageCursor): Disassembly {
    return { text: this.name }
  }

  protected continue(): InstructionResult {
    return { endReason: null }
  }

  /**
   * Relative jump that records a clamp to the message start
   */
  protected jumpBy(context: InstructionContext, delta: number): void {
    const from = context.cursor.offset
    if (context.cursor.jumpRelative(delta)) {
      context.recordAnomaly(
        VM_ANOMALIES.NEGATIVE_JUMP,
        `${this.name}: target ${from + delta} clamped to 0`,
      )
    }
  }
}
