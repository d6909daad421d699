export * from './errors'
export * from './state'
export * from './interrupt'
export * from './graph-dsl'
export * from './node-registry'
export * from './state-graph'
export * from './graph-executor'
