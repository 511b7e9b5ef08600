/**
 * Validation utilities for CLI arguments
 */

import { InvalidArgumentError } from 'commander'

/**
 * Validates if a string is a usable file path
 */
export function isValidPath(path: string): boolean {
  return path.length > 0 && !/[<>"|?*]/.test(path)
}

/**
 * Commander argument parser for a positive step limit
 * @throws InvalidArgumentError for anything but a positive integer
 */
export function parseStepLimit(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Step limit must be a positive integer')
  }

  const limit = Number(value)
  if (!Number.isSafeInteger(limit) || limit === 0) {
    throw new InvalidArgumentError('Step limit must be a positive integer')
  }
  return limit
}
