import type { Candidate } from '../../types/candidate'
import type { IdentifierKind } from '../../types/record'

/**
 * A catalog search backend. Implementations raise `UnsupportedIdentifierError`
 * for an identifier kind they cannot search, and let transport failures
 * propagate as `LookupError`s.
 */
export interface CandidateSource {
  /** Source name used in logs and errors */
  readonly name: string

  getCandidates(kind: IdentifierKind, value: string): Promise<Candidate[]>
}
