export type {
  LibrarySystem,
  Collection,
  Workflow,
  IdentifierKind,
  MatchpointPriority,
  Matchpoints,
  OrderAttribute,
  OrderValue,
  OrderLine,
  OrderTemplate,
  VendorBibField,
  VendorInfo,
  BibRecord,
} from './record'

export {
  MATCHPOINT_ORDER,
  IDENTIFIER_KINDS,
  LIBRARY_SYSTEMS,
  COLLECTIONS,
  WORKFLOWS,
  ORDER_ATTRIBUTES,
} from './record'

export type { CatalogingSource, CandidateIdentifiers, Candidate } from './candidate'

export type {
  MatchAction,
  MatchDecision,
  ClassifiedCandidates,
  MatchAnalysis,
} from './match'

export type {
  Subfield,
  ControlField,
  DataField,
  MarcField,
  MarcRecord,
  FieldEdit,
  RecordCodec,
} from './marc'

export { LEADER_TAG } from './marc'

export type {
  OrderFieldRules,
  ItemFieldPattern,
  ExternalItemSource,
  VendorSignature,
  VendorRule,
  LibraryRules,
  EngineConfig,
} from './config'
