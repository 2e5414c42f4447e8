// Main entry point
export { BatchProcessor } from './core/processor'
export type {
  BatchProcessorOptions,
  ProcessBatchOptions,
  ProcessedRecord,
  BatchResult,
} from './core/processor'

// Configuration
export { createEngineConfig, loadEngineConfig, DEFAULT_RULES_PATH } from './config/loader'
export { validateEngineConfig } from './config/validation'

// Types
export * from './types'

// Structured records
export {
  isControlField,
  isDataField,
  createDataField,
  getFields,
  getDataFields,
  controlValue,
  subfieldValue,
  subfieldValues,
  firstSubfieldValue,
  fieldValue,
  insertOrdered,
} from './marc/marc-record'
export { applyFieldEdits } from './marc/apply-edits'
export {
  BARCODE_SUBFIELD,
  isItemField,
  getItemFields,
  getBarcodes,
  itemFieldPatternFor,
} from './marc/item-fields'
export { identifyVendor, UNKNOWN_VENDOR } from './marc/vendor-identifier'
export { mapBibRecord, mapOrders, LIST_ORDER_ATTRIBUTES } from './marc/bib-mapper'
export type { MappingContext } from './marc/bib-mapper'

// Normalizers
export {
  normalizeIsbn,
  normalizeOclcNumber,
  normalizeBibId,
  normalizeUpc,
  bibIdNumber,
  IDENTIFIER_NORMALIZERS,
} from './core/normalizers/identifier'
export { parseMarcTimestamp, parseIsoTimestamp, parseTimestamp } from './core/normalizers/date'
export type { NormalizerFunction } from './core/normalizers/types'

// Matching
export { BibMatcher, resolveMatchpoints } from './core/matching/matcher'
export type { BibMatcherOptions } from './core/matching/matcher'
export { classifyCandidates } from './core/matching/candidate-classifier'
export { getResourceId, getInputCallNumber } from './core/matching/match-identifiers'

// Decision analyzers
export { determineCatalogAction } from './core/analysis/analyzer'
export type { AnalyzerKey, DecisionAnalyzer } from './core/analysis/analyzer'
export { analyzerKeyFor, selectAnalyzer } from './core/analysis/analyzer-registry'
export { NyplBranchAnalyzer } from './core/analysis/analyzers/nypl-branch'
export { NyplResearchAnalyzer } from './core/analysis/analyzers/nypl-research'
export { BplCatalogingAnalyzer } from './core/analysis/analyzers/bpl-cataloging'
export { SelectionAnalyzer } from './core/analysis/analyzers/selection'
export { AcquisitionsAnalyzer } from './core/analysis/analyzers/acquisitions'

// Field updates
export { computeFieldEdits } from './updates/rule-engine'
export { applyOrderTemplate, mapOrderToFields, hasValue } from './updates/order-template'
export { parseCallNumber } from './updates/call-number'
export { commandTagEdit } from './updates/command-tag'
export type { CommandTagOptions } from './updates/command-tag'

// Dedupe and integrity
export { dedupeBatch } from './dedupe/batch-deduplicator'
export type { DedupeResult, DedupeOptions } from './dedupe/batch-deduplicator'
export { ensureUniqueBarcodes, validateBarcodes } from './dedupe/barcode-validator'
export type { BarcodeValidation } from './dedupe/barcode-validator'

// Reporting
export {
  buildBatchReport,
  tallyByVendor,
  duplicateRows,
  callNumberRows,
  UNKNOWN_VENDOR_NAME,
} from './report/reporter'
export type {
  ActionTally,
  BatchReport,
  BatchReportOptions,
  BatchSummary,
  CallNumberRow,
  DuplicateRow,
} from './report/reporter'

// Candidate sources
export type { CandidateSource } from './services/sources/candidate-source'
export { PlatformCandidateSource } from './services/sources/platform-candidate-source'
export type { PlatformSourceOptions } from './services/sources/platform-candidate-source'
export { SolrCandidateSource } from './services/sources/solr-candidate-source'
export type { SolrSourceOptions } from './services/sources/solr-candidate-source'
export { parsePlatformBib } from './services/sources/platform-response'
export { parseSolrDoc } from './services/sources/solr-response'
export { createStaticCandidateSource } from './services/sources/static-candidate-source'
export type {
  StaticCandidateSource,
  StaticSourceConfig,
  StaticSourceEntry,
  StaticSourceCall,
} from './services/sources/static-candidate-source'
export type { FetchFunction } from './services/sources/http'

// Resilience
export { withTimeout } from './services/resilience/timeout'
export type { TimeoutOptions } from './services/resilience/timeout'

// Logging
export { consoleLogger, createSilentLogger, createPrefixedLogger } from './services/logger'
export type { Logger } from './services/logger'

// Errors
export {
  ReconcilerError,
  MissingParameterError,
  InvalidParameterError,
  ConfigurationError,
  PreconditionError,
  VendorInfoMissingError,
  MatchpointsMissingError,
  TemplateMissingError,
  UnsupportedAnalyzerError,
  DataIntegrityError,
  CallNumberIntegrityError,
  DuplicateBarcodeError,
  BatchCancelledError,
  isReconcilerError,
} from './utils/errors'
export {
  LookupError,
  LookupTimeoutError,
  LookupNetworkError,
  LookupServerError,
  UnsupportedIdentifierError,
  isLookupError,
} from './services/lookup-error'
export type { LookupErrorType } from './services/lookup-error'
