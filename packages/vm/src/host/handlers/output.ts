/**
 * Output control edits
 *
 * cap, force, spk: steer capitalization, suppression and line breaks.
 */

import { OPERATIONS } from '../../config'
import { BaseOpcodeHandler, type OpcodeHandlerContext } from '../base'

/** Upper-case the next character when it is a letter, and resume suppressed text */
export class CapOpcodeHandler extends BaseOpcodeHandler {
  readonly category = 'edit'
  readonly code = OPERATIONS.CAP
  readonly name = 'cap'

  execute(context: OpcodeHandlerContext): boolean {
    context.control.capitalizeNext()
    context.control.setTextSuppressed(false)
    return true
  }
}

/** Line break; clears capitalization and suppression */
export class ForceOpcodeHandler extends BaseOpcodeHandler {
  readonly category = 'edit'
  readonly code = OPERATIONS.FORCE
  readonly name = 'force'

  execute(context: OpcodeHandlerContext): boolean {
    context.output.newline()
    context.control.clearCapitalize()
    context.control.setTextSuppressed(false)
    return true
  }
}

export class SpkOpcodeHandler extends BaseOpcodeHandler {
  readonly category = 'edit'
  readonly code = OPERATIONS.SPK
  readonly name = 'spk'

  execute(context: OpcodeHandlerContext): boolean {
    context.control.clearCapitalize()
    return true
  }
}
