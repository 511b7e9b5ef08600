/**
 * Shared type definitions for the HRM toolkit
 */

export * from './commands'
export * from './errors'
export * from './problem'
export * from './program'
export * from './safe'
export * from './value'
