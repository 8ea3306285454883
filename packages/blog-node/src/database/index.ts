export * from './schema.js'
export * from './connection.js'
export * from './migrations.js'
export * from './blog-repository.js'
