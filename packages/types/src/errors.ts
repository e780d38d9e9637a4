/**
 * Message VM anomaly and termination codes
 *
 * Anomalies are recoverable: the VM logs them, records them on the execution
 * result and carries on with the documented fallback. End reasons describe how
 * a single message execution finished.
 */

export const VM_ANOMALIES = {
  /** Opcode number outside its category's code space, or with no handler */
  UNKNOWN_OPCODE: 'unknown_opcode',
  /** Call or case frame refused because the call stack is full */
  CALL_STACK_OVERFLOW: 'call_stack_overflow',
  /** Jump target before the start of the message, clamped to 0 */
  NEGATIVE_JUMP: 'negative_jump',
  /** Call operand names the null address */
  INVALID_CALL_TARGET: 'invalid_call_target',
  /** Cursor already past the end of a case block when no entry matched */
  CASE_BLOCK_OVERRUN: 'case_block_overrun',
  /** Case kind tag outside Random/ByWord/BySynonym/ByReference */
  UNKNOWN_CASE_KIND: 'unknown_case_kind',
} as const

export type VMAnomalyKind = (typeof VM_ANOMALIES)[keyof typeof VM_ANOMALIES]

export const END_REASONS = {
  END_OF_MESSAGE: 'end_of_message',
  RUNAWAY: 'runaway',
  CANCELLED: 'cancelled',
  INVALID_ADDRESS: 'invalid_address',
} as const

export type EndReason = (typeof END_REASONS)[keyof typeof END_REASONS]

/**
 * Store-level condition, counted in store statistics rather than attached to
 * an execution
 */
export const STORE_ANOMALIES = {
  SHORT_PAGE_READ: 'short_page_read',
  INVALID_PAGE_NUMBER: 'invalid_page_number',
} as const

export type StoreAnomalyKind =
  (typeof STORE_ANOMALIES)[keyof typeof STORE_ANOMALIES]
