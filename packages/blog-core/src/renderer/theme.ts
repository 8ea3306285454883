/**
 * Theme System
 *
 * Tailwind class sets used by every renderer.
 */

export interface Theme {
  name: string

  // Layout
  body: string
  container: string
  containerNarrow: string

  // Typography
  heading1: string
  heading2: string
  heading3: string
  textPrimary: string
  textSecondary: string

  // Navigation
  nav: string
  navContent: string
  navBrand: string
  navLinks: string
  navLink: string

  // Components
  card: string
  buttonPrimary: string
  buttonSecondary: string
  buttonDanger: string
  linkPrimary: string
  linkSecondary: string
  badge: string

  // Posts
  postCard: string
  postMeta: string
  postText: string
  postImage: string
  comment: string
  pagination: string

  // Forms
  form: string
  formField: string
  formActions: string
  label: string
  input: string
  textarea: string
  select: string
  fileInput: string
  fieldError: string

  // States
  emptyState: string
  errorState: string

  // Page-specific
  pageHeader: string
}

export const defaultTheme: Theme = {
  name: 'default',

  body: 'bg-gray-50 text-gray-900 min-h-screen',
  container: 'container mx-auto px-4 py-8',
  containerNarrow: 'max-w-2xl',

  heading1: 'text-3xl font-bold text-gray-900 mb-6',
  heading2: 'text-2xl font-semibold text-gray-800 mb-4',
  heading3: 'text-xl font-medium text-gray-700 mb-3',
  textPrimary: 'text-gray-900',
  textSecondary: 'text-gray-600',

  nav: 'bg-white shadow-sm border-b border-gray-200',
  navContent: 'flex justify-between items-center h-16',
  navBrand: 'text-xl font-bold text-gray-900 hover:text-gray-700',
  navLinks: 'flex space-x-6',
  navLink: 'text-gray-600 hover:text-gray-900 transition-colors',

  card: 'bg-white rounded-lg shadow-sm border border-gray-200 overflow-hidden',
  buttonPrimary: 'px-4 py-2 bg-blue-600 text-white rounded-lg hover:bg-blue-700 focus:outline-none focus:ring-2 focus:ring-blue-500 transition-colors font-medium',
  buttonSecondary: 'px-4 py-2 border border-gray-300 text-gray-700 rounded-lg hover:bg-gray-50 focus:outline-none focus:ring-2 focus:ring-gray-500 transition-colors font-medium',
  buttonDanger: 'px-4 py-2 bg-red-600 text-white rounded-lg hover:bg-red-700 focus:outline-none focus:ring-2 focus:ring-red-500 transition-colors font-medium',
  linkPrimary: 'text-blue-600 hover:text-blue-800 transition-colors font-medium',
  linkSecondary: 'text-gray-600 hover:text-gray-800 transition-colors',
  badge: 'inline-block rounded bg-yellow-100 px-2 py-0.5 text-xs font-medium text-yellow-800',

  postCard: 'bg-white rounded-lg shadow-sm border border-gray-200 p-6 space-y-3',
  postMeta: 'text-sm text-gray-500',
  postText: 'text-gray-800 whitespace-pre-line',
  postImage: 'w-full max-h-96 object-cover rounded-lg',
  comment: 'border-t border-gray-200 py-4',
  pagination: 'flex justify-center items-center gap-4 mt-8 text-sm',

  form: 'bg-white rounded-lg shadow-sm border border-gray-200 p-6 space-y-6',
  formField: 'space-y-2',
  formActions: 'flex justify-end gap-3 pt-6 border-t border-gray-200',
  label: 'block text-sm font-medium text-gray-700',
  input: 'w-full px-3 py-2 border border-gray-300 rounded-lg focus:outline-none focus:ring-2 focus:ring-blue-500 focus:border-transparent transition-shadow',
  textarea: 'w-full px-3 py-2 border border-gray-300 rounded-lg focus:outline-none focus:ring-2 focus:ring-blue-500 focus:border-transparent transition-shadow resize-y',
  select: 'w-full px-3 py-2 border border-gray-300 rounded-lg focus:outline-none focus:ring-2 focus:ring-blue-500 focus:border-transparent transition-shadow bg-white',
  fileInput: 'w-full text-sm text-gray-500 file:mr-4 file:py-2 file:px-4 file:rounded-lg file:border-0 file:text-sm file:font-semibold file:bg-blue-50 file:text-blue-700 hover:file:bg-blue-100 cursor-pointer',
  fieldError: 'text-sm text-red-600 mt-1',

  emptyState: 'text-center py-12 text-gray-500',
  errorState: 'text-center py-12 text-red-600 bg-red-50 border border-red-200 rounded-lg',

  pageHeader: 'flex justify-between items-center mb-6',
}
