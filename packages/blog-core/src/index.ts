/**
 * Scrivener Blog Core
 *
 * Platform-agnostic blog engine and interfaces.
 * No Node.js or platform-specific dependencies.
 */

// Domain Types
export * from './types/blog.js'

// Visibility & Authorization
export * from './visibility/post-query.js'
export * from './auth/ownership-guard.js'
export * from './auth/provider.js'

// Errors
export * from './errors/base-error.js'

// Security
export * from './security/html-escape.js'
export * from './security/error-sanitizer.js'

// Pagination & Forms
export * from './pagination/paginator.js'
export * from './forms/datetime.js'
export * from './forms/form-schemas.js'
export * from './forms/form-processor.js'

// Rendering
export * from './renderer/theme.js'
export * from './renderer/document-wrapper.js'
export * from './renderer/form-renderers.js'
export * from './renderer/post-renderers.js'
export * from './renderer/profile-renderers.js'
export * from './renderer/html-renderer.js'

// Request Handling
export * from './routing/request-ports.js'
export * from './routing/request-utils.js'
export * from './routing/route-matcher.js'
export * from './routing/session-resolver.js'
export * from './routing/page-responder.js'
export * from './routing/auth-request-handler.js'
export * from './routing/blog-request-handler.js'
