import type { SessionState } from '@/types'
import type { WorldCatalog } from '@/server/world/WorldCatalog'
import { InvariantViolationError } from '@/lib/errors'

/**
 * Problems with a single state, independent of history
 */
export function findStateViolations(state: SessionState, catalog: WorldCatalog): string[] {
  const violations: string[] = []

  if (state.cluesFound !== state.evidence.length) {
    violations.push(`cluesFound (${state.cluesFound}) != evidence size (${state.evidence.length})`)
  }
  const ids = new Set(state.evidence.map((e) => e.id))
  if (ids.size !== state.evidence.length) {
    violations.push('evidence contains duplicate clue ids')
  }
  if (!catalog.hasLocation(state.locationId)) {
    violations.push(`unknown location: ${state.locationId}`)
  }

  return violations
}

/**
 * Throw if `next` is not a valid successor of `previous`:
 * the timeline must have grown without rewriting earlier entries.
 */
export function assertValidTransition(previous: SessionState, next: SessionState, catalog: WorldCatalog): void {
  const violations = findStateViolations(next, catalog)

  if (next.timeline.length <= previous.timeline.length) {
    violations.push(`timeline did not grow (${previous.timeline.length} -> ${next.timeline.length})`)
  } else {
    const rewritten = previous.timeline.some((e, i) => {
      const other = next.timeline[i]
      return e.speaker !== other.speaker || e.text !== other.text || e.avatarType !== other.avatarType
    })
    if (rewritten) {
      violations.push('existing timeline entries were modified')
    }
  }

  if (violations.length > 0) {
    throw new InvariantViolationError(next.id, `Session ${next.id} invariant violated: ${violations.join('; ')}`)
  }
}

export function assertValidState(state: SessionState, catalog: WorldCatalog): void {
  const violations = findStateViolations(state, catalog)
  if (violations.length > 0) {
    throw new InvariantViolationError(state.id, `Session ${state.id} invariant violated: ${violations.join('; ')}`)
  }
}
