/**
 * Control Instruction Registry
 *
 * Maps control characters to their handlers. Characters with no handler are
 * ordinary text; EndSym is handled by the interpreter loop itself.
 */

import { CaseDispatchInstruction } from './case-dispatch'
import type { ControlInstructionHandler } from './base'
import {
  CallInstruction,
  JumpIfFalseInstruction,
  JumpInstruction,
} from './control-flow'
import {
  ActionInstruction,
  ActionRefInstruction,
  EditInstruction,
  EditRefInstruction,
  TestInstruction,
  TestRefInstruction,
} from './opcode'

export class ControlInstructionRegistry {
  private handlers: Map<string, ControlInstructionHandler> = new Map()

  constructor() {
    this.registerInstructions()
  }

  /**
   * Register all control handlers
   */
  private registerInstructions(): void {
    // Control flow
    this.register(new JumpInstruction())
    this.register(new JumpIfFalseInstruction())
    this.register(new CallInstruction())
    this.register(new CaseDispatchInstruction())

    // Opcode invocations
    this.register(new ActionInstruction())
    this.register(new ActionRefInstruction())
    this.register(new TestInstruction())
    this.register(new TestRefInstruction())
    this.register(new EditInstruction())
    this.register(new EditRefInstruction())
  }

  register(handler: ControlInstructionHandler): void {
    this.handlers.set(handler.control, handler)
  }

  getHandler(character: string): ControlInstructionHandler | undefined {
    return this.handlers.get(character)
  }
}
