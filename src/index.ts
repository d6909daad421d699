export * from './graph'
export * from './runtime'
export * from './storage'
export * from './observability'
export * from './config'
export * from './engine'
export * from './pipelines'
