/**
 * Message codec: symbol table, chunk packing and message file layout
 */

export * from './chunk'
export * from './config'
export * from './message-file'
export * from './symbol-codec'
