/**
 * HRM Core Package
 *
 * Logging, environment configuration and problem definition schemas
 */

export * from './env'
// Export logger
export * from './logger'
// Export Zod schemas
export * from './schemas/problem-definition'
