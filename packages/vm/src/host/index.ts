export * from './base'
export * from './handlers/arithmetic'
export * from './handlers/comparison'
export * from './handlers/output'
export * from './output'
export * from './random'
export * from './registry'
export * from './world'
