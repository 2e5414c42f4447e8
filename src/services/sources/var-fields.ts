/**
 * Backend-neutral view of the variable fields carried in search responses
 */

export interface VarField {
  tag: string
  ind1: string
  ind2: string
  subfields: readonly { code: string; content: string }[]
}

export function varFieldsWithTag(fields: readonly VarField[], tags: readonly string[]): VarField[] {
  return fields.filter((field) => tags.includes(field.tag))
}

export function subfieldContents(
  fields: readonly VarField[],
  tags: readonly string[],
  code: string,
): string[] {
  return varFieldsWithTag(fields, tags).flatMap((field) =>
    field.subfields.filter((subfield) => subfield.code === code).map((subfield) => subfield.content),
  )
}

/**
 * Subfield contents joined with spaces
 */
export function varFieldValue(field: VarField): string {
  return field.subfields.map((subfield) => subfield.content).join(' ')
}
