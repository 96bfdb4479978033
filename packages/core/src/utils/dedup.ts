/**
 * Occurrence Deduplication Registry
 *
 * Insertion-ordered set of identity hashes seen during one conversion run.
 * Entries are never evicted; a new run starts with a new registry.
 */

import { createHash } from 'node:crypto'

export class DedupRegistry {
  private seen = new Set<string>()

  /**
   * Check if a key has been seen in this run.
   * If not seen, marks it as seen and returns false (not a duplicate).
   */
  isDuplicate(key: string): boolean {
    if (this.seen.has(key)) {
      return true
    }
    this.seen.add(key)
    return false
  }

  has(key: string): boolean {
    return this.seen.has(key)
  }

  /** Keys in the order they were first seen */
  keys(): string[] {
    return [...this.seen]
  }

  get size(): number {
    return this.seen.size
  }
}

/**
 * MD5 hex digest of the concatenated parts.
 */
export function hashParts(...parts: string[]): string {
  return createHash('md5').update(parts.join('')).digest('hex')
}
