/**
 * Batch orchestration: match, decide, edit, dedupe, validate and report
 * @module core/processor
 */

import type { EngineConfig } from '../types/config'
import type { FieldEdit } from '../types/marc'
import type { MatchAnalysis } from '../types/match'
import type { BibRecord, Matchpoints, OrderTemplate } from '../types/record'
import type { BarcodeValidation } from '../dedupe/barcode-validator.js'
import { ensureUniqueBarcodes, validateBarcodes } from '../dedupe/barcode-validator.js'
import { dedupeBatch } from '../dedupe/batch-deduplicator.js'
import { applyFieldEdits } from '../marc/apply-edits.js'
import type { BatchReport } from '../report/reporter.js'
import { buildBatchReport } from '../report/reporter.js'
import type { CandidateSource } from '../services/sources/candidate-source.js'
import type { Logger } from '../services/logger.js'
import { createPrefixedLogger, createSilentLogger } from '../services/logger.js'
import { computeFieldEdits } from '../updates/rule-engine.js'
import {
  BatchCancelledError,
  TemplateMissingError,
  VendorInfoMissingError,
} from '../utils/errors.js'
import { selectAnalyzer } from './analysis/analyzer-registry.js'
import { classifyCandidates } from './matching/candidate-classifier.js'
import { getResourceId } from './matching/match-identifiers.js'
import { BibMatcher, resolveMatchpoints } from './matching/matcher.js'
import { normalizeBibId } from './normalizers/identifier.js'

export interface BatchProcessorOptions {
  config: EngineConfig
  source: CandidateSource
  logger?: Logger
}

export interface ProcessBatchOptions {
  /** Matchpoints for acquisitions and selection batches */
  matchpoints?: Matchpoints | null
  /** Order template for acquisitions and selection batches */
  templateData?: OrderTemplate | null
  /** Cancels the batch between groups of records */
  signal?: AbortSignal
  batchId?: string
}

/**
 * A record after its decision and edits. `record.bibId` is the decision's
 * target id and `record.marc` the edited form.
 */
export interface ProcessedRecord {
  record: BibRecord
  analysis: MatchAnalysis
  edits: FieldEdit[]
}

export interface BatchResult {
  records: ProcessedRecord[]
  attach: BibRecord[]
  new: BibRecord[]
  deduped: BibRecord[]
  /** Null when no cataloging records were processed */
  integrity: BarcodeValidation | null
  report: BatchReport
}

function hasTemplate(template: OrderTemplate | null | undefined): template is OrderTemplate {
  return !!template && Object.keys(template).length > 0
}

/**
 * BatchProcessor runs each record through matching, decision and field
 * edits with bounded concurrency, then merges and checks the batch as a
 * whole once every decision is final.
 *
 * @example
 * ```typescript
 * const processor = new BatchProcessor({ config, source })
 * const result = await processor.processBatch(records)
 * result.report.summary // { total, attach, insert, overlay, callNumberMismatches }
 * ```
 */
export class BatchProcessor {
  private readonly config: EngineConfig
  private readonly matcher: BibMatcher
  private readonly logger: Logger

  constructor(options: BatchProcessorOptions) {
    this.config = options.config
    this.logger = createPrefixedLogger('BatchProcessor', options.logger ?? createSilentLogger())
    this.matcher = new BibMatcher({
      source: options.source,
      timeoutMs: options.config.lookupTimeoutMs,
      logger: this.logger,
    })
  }

  /**
   * @throws {PreconditionError} If a record cannot be processed with the given options
   * @throws {DataIntegrityError} For duplicate barcodes or a call number that cannot be split
   * @throws {LookupError} When a candidate lookup fails or times out
   * @throws {BatchCancelledError} When the signal aborts the batch
   */
  async processBatch(
    records: readonly BibRecord[],
    options: ProcessBatchOptions = {},
  ): Promise<BatchResult> {
    this.checkPreconditions(records, options)
    ensureUniqueBarcodes(records)

    const cataloging = records.filter((record) => record.workflow === 'cat')
    const originalBarcodes = cataloging.flatMap((record) => record.barcodes)

    const processed = await this.processRecords(records, options)

    const processedCataloging = processed.filter((entry) => entry.record.workflow === 'cat')
    const others = processed
      .filter((entry) => entry.record.workflow !== 'cat')
      .map((entry) => entry.record)

    const { attach, new: fresh, deduped } = dedupeBatch(
      processedCataloging.map((entry) => entry.record),
      processedCataloging.map((entry) => entry.analysis.decision),
      { config: this.config, logger: this.logger },
    )

    const integrity =
      processedCataloging.length > 0
        ? validateBarcodes([attach, deduped], originalBarcodes, this.config, this.logger)
        : null

    const report = buildBatchReport(
      processed.map((entry) => entry.analysis),
      { batchId: options.batchId },
    )
    this.logger.info(`Processed ${processed.length} records`, { ...report.summary })

    return {
      records: processed,
      attach,
      new: [...fresh, ...others],
      deduped,
      integrity,
      report,
    }
  }

  private checkPreconditions(records: readonly BibRecord[], options: ProcessBatchOptions): void {
    for (const record of records) {
      if (record.workflow === 'cat') {
        if (!record.vendorInfo) {
          throw new VendorInfoMissingError(getResourceId(record))
        }
        continue
      }
      resolveMatchpoints(record, options.matchpoints)
      if (!hasTemplate(options.templateData)) {
        throw new TemplateMissingError(record.workflow)
      }
    }
  }

  private async processRecords(
    records: readonly BibRecord[],
    options: ProcessBatchOptions,
  ): Promise<ProcessedRecord[]> {
    const processed: ProcessedRecord[] = []
    const size = this.config.concurrency

    for (let offset = 0; offset < records.length; offset += size) {
      if (options.signal?.aborted) {
        throw new BatchCancelledError(processed.length, records.length)
      }
      const group = records.slice(offset, offset + size)
      try {
        processed.push(
          ...(await Promise.all(group.map((record) => this.processRecord(record, options)))),
        )
      } catch (error) {
        if (options.signal?.aborted) {
          throw new BatchCancelledError(processed.length, records.length)
        }
        throw error
      }
    }

    if (options.signal?.aborted) {
      throw new BatchCancelledError(processed.length, records.length)
    }
    return processed
  }

  private async processRecord(
    record: BibRecord,
    options: ProcessBatchOptions,
  ): Promise<ProcessedRecord> {
    const matchpoints = resolveMatchpoints(record, options.matchpoints)
    const candidates = await this.matcher.match(record, matchpoints, options.signal)
    const classified = classifyCandidates(record, candidates)
    const analyzer = selectAnalyzer(record.workflow, record.library, record.collection, this.config)
    const analysis = analyzer.analyze(record, classified)

    const edits = computeFieldEdits(
      record,
      analysis.decision,
      record.vendorInfo,
      options.templateData ?? null,
      this.config,
    )
    this.logger.debug(`Record ${analysis.resourceId ?? '(no id)'}: ${analysis.decision.action}`, {
      analyzer: analyzer.key,
      targetId: analysis.decision.targetId,
      edits: edits.length,
    })

    return {
      record: {
        ...record,
        bibId: normalizeBibId(analysis.decision.targetId),
        marc: applyFieldEdits(record.marc, edits),
      },
      analysis,
      edits,
    }
  }
}
