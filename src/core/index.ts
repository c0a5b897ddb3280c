// Core buffer modules - both retention strategies and their shared contract
export * from './types'
export * from './errors'
export * from './rotate'
export * from './rotating-buffer'
export * from './overflow-buffer'
export * from './strategy'
