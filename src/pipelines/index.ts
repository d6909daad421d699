export * from './content-state'
export * from './content-services'
export * from './content-pipeline'
export * from './research-pipeline'
