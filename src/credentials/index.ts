export * from './types'
export * from './strategies'
export * from './resolver'
