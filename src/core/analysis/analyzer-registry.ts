/**
 * Selects the decision analyzer for a workflow, library and collection
 * @module core/analysis/analyzer-registry
 */

import type { EngineConfig } from '../../types/config'
import type { Collection, LibrarySystem, Workflow } from '../../types/record'
import { UnsupportedAnalyzerError } from '../../utils/errors.js'
import type { AnalyzerKey, DecisionAnalyzer } from './analyzer.js'
import { AcquisitionsAnalyzer } from './analyzers/acquisitions.js'
import { BplCatalogingAnalyzer } from './analyzers/bpl-cataloging.js'
import { NyplBranchAnalyzer } from './analyzers/nypl-branch.js'
import { NyplResearchAnalyzer } from './analyzers/nypl-research.js'
import { SelectionAnalyzer } from './analyzers/selection.js'

type AnalyzerFactory = (config: Pick<EngineConfig, 'attachOnNoMatchVendors'>) => DecisionAnalyzer

const analyzerFactories: Readonly<Record<AnalyzerKey, AnalyzerFactory>> = {
  'nypl-branch': () => new NyplBranchAnalyzer(),
  'nypl-research': () => new NyplResearchAnalyzer(),
  'bpl-cataloging': (config) => new BplCatalogingAnalyzer(config.attachOnNoMatchVendors),
  selection: () => new SelectionAnalyzer(),
  acquisitions: () => new AcquisitionsAnalyzer(),
}

/**
 * Resolves the analyzer variant. Selection and acquisitions take precedence
 * over library and collection.
 *
 * @throws {UnsupportedAnalyzerError} For a cataloging combination with no analyzer
 */
export function analyzerKeyFor(
  workflow: Workflow,
  library: LibrarySystem,
  collection: Collection,
): AnalyzerKey {
  if (workflow === 'sel') return 'selection'
  if (workflow === 'acq') return 'acquisitions'
  if (library === 'bpl') return 'bpl-cataloging'
  if (collection === 'BL') return 'nypl-branch'
  if (collection === 'RL') return 'nypl-research'
  throw new UnsupportedAnalyzerError(workflow, library, collection)
}

/**
 * Creates the analyzer for a workflow, library and collection.
 *
 * @example
 * ```typescript
 * const analyzer = selectAnalyzer('cat', 'nypl', 'RL', config)
 * analyzer.key // 'nypl-research'
 * ```
 */
export function selectAnalyzer(
  workflow: Workflow,
  library: LibrarySystem,
  collection: Collection,
  config: Pick<EngineConfig, 'attachOnNoMatchVendors'>,
): DecisionAnalyzer {
  return analyzerFactories[analyzerKeyFor(workflow, library, collection)](config)
}
