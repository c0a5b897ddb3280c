// Public entry point
export * from './core'
export * from './stream'
