export * from './types'
export * from './dates'
export * from './secret-spec'
export * from './reconcile'
