/**
 * Path compression utilities.
 * @packageDocumentation
 */

export { compressPaths, tryCompressPaths } from './compressor'
export { validatePathList, isCompressible } from './validator'
export {
  stripLeadingSlash,
  pathShape,
  detectSplitMode,
  splitPath,
  groupByPrefix,
  type SplitPath,
} from './split'
export { parseIntegerSuffix, formatContiguousRange, formatSuffixRange } from './range'
