export * from './sync'
