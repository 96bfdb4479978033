/**
 * Deduplicating Emitter
 *
 * Gives every occurrence an identity hash and forwards the first one of
 * each identity to the outline sink. Later copies are dropped silently.
 */

import { DedupRegistry, hashParts } from '../utils/dedup.js'
import { formatDateTime } from './time.js'
import { NO_ID, type Component, type EmitResult, type Occurrence } from './types.js'

/** An occurrence that survived deduplication, with what the writer needs */
export interface OutlineEntry {
  hash: string
  occurrence: Occurrence
  component: Component
}

export interface OutlineSink {
  writeEntry(entry: OutlineEntry): void
}

/**
 * Identity of an occurrence: start and end at minute granularity in the
 * target zone, plus the original UID.
 */
export function identityHash(occurrence: Occurrence, componentId: string, zone: string): string {
  return hashParts(
    formatDateTime(occurrence.start, zone),
    formatDateTime(occurrence.end, zone),
    componentId,
  )
}

export class DeduplicatingEmitter {
  private readonly zone: string
  private readonly sink: OutlineSink
  private readonly registry: DedupRegistry
  private counts = { accepted: 0, duplicates: 0 }

  constructor(zone: string, sink: OutlineSink, registry: DedupRegistry = new DedupRegistry()) {
    this.zone = zone
    this.sink = sink
    this.registry = registry
  }

  emit(occurrence: Occurrence, component: Component): EmitResult {
    const hash = identityHash(occurrence, component.id ?? NO_ID, this.zone)

    if (this.registry.isDuplicate(hash)) {
      this.counts.duplicates++
      return 'duplicate'
    }

    this.counts.accepted++
    this.sink.writeEntry({ hash, occurrence, component })
    return 'accepted'
  }

  get accepted(): number {
    return this.counts.accepted
  }

  get duplicates(): number {
    return this.counts.duplicates
  }
}
