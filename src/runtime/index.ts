export * from './retry-handler'
