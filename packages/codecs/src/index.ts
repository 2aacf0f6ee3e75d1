export * from './png'
export * from './ico'
