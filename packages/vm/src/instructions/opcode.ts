/**
 * Opcode Invocation Instructions
 *
 * ACTION, TEST and EDIT, each with and without a 12-bit reference operand.
 * The symbol after the control character selects the operation within the
 * category's code space; the host performs the effect.
 */

import { CONTROL_CHARS, type ControlChar } from '@nipvm/codec'
import type { Opcode, OpcodeCategory } from '@nipvm/types'
import { VM_ANOMALIES } from '@nipvm/types'
import type { MessageCursor } from '../cursor'
import { decodeOpcode, isKnownOperation, operationName } from '../operations'
import {
  ControlInstruction,
  type Disassembly,
  type InstructionContext,
  type InstructionResult,
} from './base'

abstract class OpcodeInstruction extends ControlInstruction {
  abstract readonly category: OpcodeCategory
  abstract readonly withReference: boolean

  execute(context: InstructionContext): InstructionResult {
    const opcode = this.readOpcode(context.cursor)

    if (!isKnownOperation(opcode.code)) {
      context.recordAnomaly(
        VM_ANOMALIES.UNKNOWN_OPCODE,
        `${this.name}: operation ${opcode.code} outside the operation table`,
      )
      return this.continue()
    }

    context.log(this.name, {
      operation: operationName(opcode.code),
      reference: opcode.hasReference ? opcode.reference : undefined,
    })
    this.invoke(context, opcode)
    return this.continue()
  }

  override disassemble(cursor: MessageCursor): Disassembly {
    const opcode = this.readOpcode(cursor)
    const reference = opcode.hasReference ? ` [${opcode.reference}]` : ''
    return {
      text: `${this.name} ${operationName(opcode.code)}(${opcode.code})${reference}`,
    }
  }

  protected abstract invoke(context: InstructionContext, opcode: Opcode): void

  private readOpcode(cursor: MessageCursor): Opcode {
    const nip = cursor.nextSymbol()
    const reference = this.withReference ? cursor.readOperand() : undefined
    return decodeOpcode(this.category, nip, reference)
  }
}

abstract class ActionOpcodeInstruction extends OpcodeInstruction {
  readonly category = 'action'

  protected invoke(context: InstructionContext, opcode: Opcode): void {
    context.host.invokeAction(
      opcode.code,
      opcode.hasReference,
      opcode.reference,
      context.control,
    )
  }
}

abstract class TestOpcodeInstruction extends OpcodeInstruction {
  readonly category = 'test'

  protected invoke(context: InstructionContext, opcode: Opcode): void {
    const result = context.host.invokeTest(
      opcode.code,
      opcode.hasReference,
      opcode.reference,
      context.control,
    )
    context.setTestFlag(result)
  }
}

abstract class EditOpcodeInstruction extends OpcodeInstruction {
  readonly category = 'edit'

  protected invoke(context: InstructionContext, opcode: Opcode): void {
    context.host.invokeEdit(
      opcode.code,
      opcode.hasReference,
      opcode.reference,
      context.control,
    )
  }
}

/** ACTION ( */
export class ActionInstruction extends ActionOpcodeInstruction {
  readonly control: ControlChar = CONTROL_CHARS.ACTION
  readonly name = 'ACTION'
  readonly withReference = false
}

/** ACTION_REF + */
export class ActionRefInstruction extends ActionOpcodeInstruction {
  readonly control: ControlChar = CONTROL_CHARS.ACTION_REF
  readonly name = 'ACTION_REF'
  readonly withReference = true
}

/** TEST $ */
export class TestInstruction extends TestOpcodeInstruction {
  readonly control: ControlChar = CONTROL_CHARS.TEST
  readonly name = 'TEST'
  readonly withReference = false
}

/** TEST_REF & */
export class TestRefInstruction extends TestOpcodeInstruction {
  readonly control: ControlChar = CONTROL_CHARS.TEST_REF
  readonly name = 'TEST_REF'
  readonly withReference = true
}

/** EDIT % */
export class EditInstruction extends EditOpcodeInstruction {
  readonly control: ControlChar = CONTROL_CHARS.EDIT
  readonly name = 'EDIT'
  readonly withReference = false
}

/** EDIT_REF = */
export class EditRefInstruction extends EditOpcodeInstruction {
  readonly control: ControlChar = CONTROL_CHARS.EDIT_REF
  readonly name = 'EDIT_REF'
  readonly withReference = true
}
