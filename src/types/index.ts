export * from './document'
export * from './filter'
export * from './update'
export * from './store'
