/**
 * Field arithmetic actions: asg, incr, decr
 * The reference operand names the world field.
 */

import { OPERATIONS } from '../../config'
import { BaseOpcodeHandler, type OpcodeHandlerContext } from '../base'

/** accumulator := field[ref] */
export class AsgOpcodeHandler extends BaseOpcodeHandler {
  readonly category = 'action'
  readonly code = OPERATIONS.ASG
  readonly name = 'asg'

  execute(context: OpcodeHandlerContext): boolean {
    context.state.accumulator = context.world.readField(context.reference)
    return true
  }
}

export class IncrOpcodeHandler extends BaseOpcodeHandler {
  readonly category = 'action'
  readonly code = OPERATIONS.INCR
  readonly name = 'incr'

  execute(context: OpcodeHandlerContext): boolean {
    const { world, reference } = context
    world.writeField(reference, world.readField(reference) + 1)
    return true
  }
}

export class DecrOpcodeHandler extends BaseOpcodeHandler {
  readonly category = 'action'
  readonly code = OPERATIONS.DECR
  readonly name = 'decr'

  execute(context: OpcodeHandlerContext): boolean {
    const { world, reference } = context
    world.writeField(reference, world.readField(reference) - 1)
    return true
  }
}
