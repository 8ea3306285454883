export * from './store.js'
export * from './serve.js'
export * from './category.js'
export * from './location.js'
export * from './user.js'
