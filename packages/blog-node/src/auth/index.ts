export * from './better-auth.js'
export * from './session-auth-provider.js'
