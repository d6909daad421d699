export * from './adapter-factory'
export * from './checkpoint-store'
export * from './lock-manager'

// Implementations
export * from './in-memory-checkpoint-store'
export * from './in-memory-lock-manager'
export * from './redis-checkpoint-store'
export * from './redis-lock-manager'
