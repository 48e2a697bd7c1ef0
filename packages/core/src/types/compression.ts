// =============================================================================
// COMPRESSION RESULTS
// =============================================================================

/**
 * How one level of the compressor splits its paths.
 *
 * - `slash`: split on the first `/` into a prefix and the remaining sub-path
 * - `bare`: split a single token at its first digit (`ao12` into `ao` and `12`)
 *
 * @public
 */
export type SplitMode = 'slash' | 'bare'

/**
 * A compact pattern was found.
 * @public
 */
export interface Compressed {
  readonly kind: 'compressed'

  /** The pattern string, e.g. `Dev1/{ai0:3,ao0:1}` */
  readonly pattern: string
}

/**
 * No compact pattern exists for the input (a numeric gap, a non-integer
 * suffix, or mixed path shapes below the top level).
 * @public
 */
export interface NoCompactForm {
  readonly kind: 'no-compact-form'
}

/**
 * Outcome of compressing one level of paths.
 * @public
 */
export type CompressionResult = Compressed | NoCompactForm

/**
 * Options for {@link compressPaths}.
 * @public
 */
export interface CompressOptions {
  /**
   * What to do when the top-level input mixes slash paths and bare tokens.
   * `reject` throws a `PathListError`; `enumerate` returns the input joined by commas.
   * @defaultValue 'reject'
   */
  readonly onMixedShapes?: 'reject' | 'enumerate'
}

// =============================================================================
// EXPANSION RESULTS
// =============================================================================

/**
 * Options for {@link expandPattern}.
 * @public
 */
export interface ExpandOptions {
  /**
   * Maximum number of paths to produce before reporting `EXPANSION_LIMIT`.
   * @defaultValue 1000
   */
  readonly maxExpansion?: number
}
