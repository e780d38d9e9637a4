export * from './base'
export * from './case-dispatch'
export * from './control-flow'
export * from './opcode'
export * from './registry'
