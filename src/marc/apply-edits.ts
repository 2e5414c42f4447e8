/**
 * Applies computed field edits to a structured record
 * @module marc/apply-edits
 */

import type { FieldEdit, MarcField, MarcRecord } from '../types/marc'
import { LEADER_TAG } from '../types/marc'
import { createDataField, fieldValue, insertOrdered } from './marc-record.js'

function removeMatching(fields: readonly MarcField[], edit: FieldEdit): MarcField[] {
  return fields.filter((field) => {
    if (field.tag !== edit.tag) return true
    if (edit.replaces != null) return fieldValue(field) !== edit.replaces
    return false
  })
}

function writeLeader(leader: string, position: number, data: string): string {
  const padded = leader.padEnd(position, ' ')
  return padded.slice(0, position) + data + padded.slice(position + data.length)
}

function fieldFromEdit(edit: FieldEdit): MarcField | null {
  if (edit.data !== undefined) {
    return { tag: edit.tag, data: edit.data }
  }
  if (edit.subfields && edit.subfields.length > 0) {
    return createDataField(edit.tag, edit.indicators ?? [' ', ' '], edit.subfields)
  }
  return null
}

/**
 * Applies edits in order and returns a new record; the input is left untouched.
 *
 * An edit with `delete` first removes every field with its tag (only those whose
 * value equals `replaces`, when set), then inserts its own field in tag order
 * if it carries one. Leader edits overwrite characters of the leader.
 */
export function applyFieldEdits(record: MarcRecord, edits: readonly FieldEdit[]): MarcRecord {
  let leader = record.leader
  let fields: MarcField[] = [...record.fields]
  for (const edit of edits) {
    if (edit.tag === LEADER_TAG) {
      if (edit.data !== undefined) {
        leader = writeLeader(leader, edit.position ?? 0, edit.data)
      }
      continue
    }
    if (edit.delete) {
      fields = removeMatching(fields, edit)
    }
    const field = fieldFromEdit(edit)
    if (field) {
      fields = insertOrdered(fields, field)
    }
  }
  return { leader, fields }
}
