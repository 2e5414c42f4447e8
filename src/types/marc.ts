/**
 * Structured MARC record form
 * @module types/marc
 */

export interface Subfield {
  code: string
  value: string
}

/** Control field (tags 001 to 009) */
export interface ControlField {
  tag: string
  data: string
}

export interface DataField {
  tag: string
  indicators: readonly [string, string]
  subfields: readonly Subfield[]
}

export type MarcField = ControlField | DataField

export interface MarcRecord {
  leader: string
  fields: readonly MarcField[]
}

/** Tag addressing the leader in a field edit */
export const LEADER_TAG = 'LDR'

/**
 * A request to remove and/or add one field. Edits describe changes;
 * they are applied by `applyFieldEdits`. An edit tagged `LDR` writes
 * `data` into the leader at `position` instead.
 */
export interface FieldEdit {
  tag: string
  indicators?: readonly [string, string]
  subfields?: readonly Subfield[]
  /** Control field data to insert, or leader characters */
  data?: string
  /** Leader offset of a leader edit */
  position?: number
  /** Remove existing fields with this tag before inserting */
  delete: boolean
  /** Restrict the deletion to fields whose value equals this string */
  replaces?: string | null
}

/**
 * Reader and writer for the binary record format. The engine only consumes
 * the structured form, so implementations live with the calling application.
 */
export interface RecordCodec {
  read(bytes: Uint8Array): MarcRecord[]
  write(records: readonly MarcRecord[]): Uint8Array
}
