/**
 * Compiler Package Exports
 */

export { compile } from './compile'
