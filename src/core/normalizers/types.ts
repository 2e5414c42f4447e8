/**
 * A normalizer turns a raw identifier or timestamp into its canonical form,
 * returning `null` when nothing usable remains.
 */
export type NormalizerFunction = (value: unknown) => string | null
