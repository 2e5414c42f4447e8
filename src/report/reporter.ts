/**
 * Batch reports built from per-record analyses
 * @module report/reporter
 */

import { v4 as uuidv4 } from 'uuid'
import type { MatchAction, MatchAnalysis } from '../types/match'

/**
 * Counts of each action for one vendor
 */
export type ActionTally = Record<MatchAction, number>

/**
 * Row of the duplicate report
 */
export interface DuplicateRow {
  vendor: string
  resourceId: string | null
  targetBibId: string | null
  duplicates: readonly string[]
  mixed: readonly string[]
  other: readonly string[]
}

/**
 * Row of the call-number report
 */
export interface CallNumberRow {
  vendor: string
  resourceId: string | null
  targetBibId: string | null
  inputCallNumber: string | null
  targetCallNumber: string | null
  duplicates: readonly string[]
  callNumberMatch: boolean
}

export interface BatchSummary {
  total: number
  attach: number
  insert: number
  overlay: number
  callNumberMismatches: number
}

export interface BatchReport {
  batchId: string
  generatedAt: Date
  vendorTally: Record<string, ActionTally>
  duplicateRows: DuplicateRow[]
  callNumberRows: CallNumberRow[]
  summary: BatchSummary
}

export interface BatchReportOptions {
  /** Defaults to a random v4 uuid */
  batchId?: string
  /** Defaults to now */
  generatedAt?: Date
}

/** Vendor name used when a record has none */
export const UNKNOWN_VENDOR_NAME = 'UNKNOWN'

function emptyTally(): ActionTally {
  return { attach: 0, insert: 0, overlay: 0 }
}

function vendorOf(analysis: MatchAnalysis): string {
  return analysis.vendor ?? UNKNOWN_VENDOR_NAME
}

function hasMissingCallNumbers(analysis: MatchAnalysis): boolean {
  return (
    analysis.workflow === 'cat' &&
    analysis.inputCallNumber === null &&
    analysis.targetCallNumber === null
  )
}

/**
 * Tallies actions per vendor, in order of first appearance
 */
export function tallyByVendor(analyses: readonly MatchAnalysis[]): Record<string, ActionTally> {
  const tally: Record<string, ActionTally> = {}
  for (const analysis of analyses) {
    const vendor = vendorOf(analysis)
    const counts = tally[vendor] ?? emptyTally()
    counts[analysis.decision.action] += 1
    tally[vendor] = counts
  }
  return tally
}

export function duplicateRows(analyses: readonly MatchAnalysis[]): DuplicateRow[] {
  return analyses
    .filter(
      (analysis) =>
        analysis.duplicates.length > 0 || analysis.mixed.length > 0 || analysis.other.length > 0,
    )
    .map((analysis) => ({
      vendor: vendorOf(analysis),
      resourceId: analysis.resourceId,
      targetBibId: analysis.decision.targetId,
      duplicates: analysis.duplicates,
      mixed: analysis.mixed,
      other: analysis.other,
    }))
}

export function callNumberRows(analyses: readonly MatchAnalysis[]): CallNumberRow[] {
  return analyses
    .filter((analysis) => !analysis.callNumberMatch || hasMissingCallNumbers(analysis))
    .map((analysis) => ({
      vendor: vendorOf(analysis),
      resourceId: analysis.resourceId,
      targetBibId: analysis.decision.targetId,
      inputCallNumber: analysis.inputCallNumber,
      targetCallNumber: analysis.targetCallNumber,
      duplicates: analysis.duplicates,
      callNumberMatch: analysis.callNumberMatch,
    }))
}

/**
 * Builds the duplicate report, the call-number report and the vendor tally
 * for a batch.
 *
 * @example
 * ```typescript
 * const report = buildBatchReport(result.records.map((r) => r.analysis))
 * report.summary.insert
 * ```
 */
export function buildBatchReport(
  analyses: readonly MatchAnalysis[],
  options: BatchReportOptions = {},
): BatchReport {
  const summary: BatchSummary = {
    total: analyses.length,
    ...emptyTally(),
    callNumberMismatches: analyses.filter((analysis) => !analysis.callNumberMatch).length,
  }
  for (const analysis of analyses) {
    summary[analysis.decision.action] += 1
  }

  return {
    batchId: options.batchId ?? uuidv4(),
    generatedAt: options.generatedAt ?? new Date(),
    vendorTally: tallyByVendor(analyses),
    duplicateRows: duplicateRows(analyses),
    callNumberRows: callNumberRows(analyses),
    summary,
  }
}
