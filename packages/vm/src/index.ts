/**
 * Message VM: paged store, cursor, interpreter and opcode host
 */

export * from './assembler'
export * from './byte-source'
export * from './call-stack'
export * from './config'
export * from './cursor'
export * from './disassembler'
export * from './host'
export * from './instructions'
export * from './interpreter'
export * from './message-store'
export * from './operations'
