/**
 * Control Flow Instructions
 *
 * JUMP, JUMP_IF_FALSE, CALL
 */

import { CONTROL_CHARS } from '@nipvm/codec'
import { VM_ANOMALIES } from '@nipvm/types'
import type { MessageCursor } from '../cursor'
import {
  ControlInstruction,
  type Disassembly,
  type InstructionContext,
  type InstructionResult,
} from './base'

/**
 * JUMP (^)
 * Forward offset measured from the symbol after the operand
 */
export class JumpInstruction extends ControlInstruction {
  readonly control = CONTROL_CHARS.JUMP
  readonly name = 'JUMP'

  execute(context: InstructionContext): InstructionResult {
    const delta = context.cursor.readOperand()
    context.log('JUMP', { delta, from: context.cursor.offset })
    this.jumpBy(context, delta)
    return this.continue()
  }

  override disassemble(cursor: MessageCursor): Disassembly {
    const delta = cursor.readOperand()
    return { text: `JUMP +${delta} -> ${cursor.offset + delta}` }
  }
}

/**
 * JUMP_IF_FALSE (|)
 * Same operand as JUMP, taken only while the test flag is clear
 */
export class JumpIfFalseInstruction extends ControlInstruction {
  readonly control = CONTROL_CHARS.JUMP_IF_FALSE
  readonly name = 'JUMP_IF_FALSE'

  execute(context: InstructionContext): InstructionResult {
    const delta = context.cursor.readOperand()
    const taken = !context.control.testFlag
    context.log('JUMP_IF_FALSE', { delta, taken })
    if (taken) {
      this.jumpBy(context, delta)
    }
    return this.continue()
  }

  override disassemble(cursor: MessageCursor): Disassembly {
    const delta = cursor.readOperand()
    return { text: `JUMP_IF_FALSE +${delta} -> ${cursor.offset + delta}` }
  }
}

/**
 * CALL (\)
 * Saves the position after the operand and enters the message at the operand
 * address. A full stack or a null target leaves the call without effect.
 */
export class CallInstruction extends ControlInstruction {
  readonly control = CONTROL_CHARS.CALL
  readonly name = 'CALL'

  execute(context: InstructionContext): InstructionResult {
    const address = context.cursor.readOperand()

    if (!context.isValidAddress(address)) {
      context.recordAnomaly(
        VM_ANOMALIES.INVALID_CALL_TARGET,
        `CALL: no message at address ${address}`,
      )
      return this.continue()
    }

    context.setStatus('awaiting_call')
    const pushed = context.callStack.pushFrame({
      kind: 'call',
      ...context.cursor.snapshot(),
    })
    if (pushed) {
      context.log('CALL', { address, depth: context.callStack.getDepth() })
      context.cursor.open(address)
    } else {
      context.recordAnomaly(
        VM_ANOMALIES.CALL_STACK_OVERFLOW,
        `CALL: depth ${context.callStack.getDepth()} reached, call to ${address} ignored`,
      )
    }
    context.setStatus('running')
    return this.continue()
  }

  override disassemble(cursor: MessageCursor): Disassembly {
    return { text: `CALL ${cursor.readOperand()}` }
  }
}
