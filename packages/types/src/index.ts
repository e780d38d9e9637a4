export * from './errors'
export * from './message-file'
export * from './safe'
export * from './vm'
