export * from './bytes'
