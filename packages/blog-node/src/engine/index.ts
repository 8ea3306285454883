export * from './server-manager.js'
export * from './server-security.js'
