/**
 * Pipeline Module - PDF Outline Extraction
 *
 * Turns the text spans of one document into a title and an H1-H4 outline.
 */

export { DEFAULT_OUTLINE_CONFIG, type KeywordRule, loadOutlineConfig, type OutlineConfig } from './config'

export { filterCandidates, type FilterContext } from './candidate-filter'
export { computeBodyFontSize, scoreSpans, selectHeadingCandidates } from './feature-scorer'
export { identifyScript } from './language-identifier'
export { buildLevelCluster, clusterLevels } from './level-clusterer'
export { assembleOutline, toOutlineJson } from './outline-assembler'
export { decodeDocument, extractOutline, extractOutlineSync } from './outline-pipeline'
export { matchPattern } from './pattern-matcher'
export { extractTitle } from './title-extractor'

export * from './types/errors'
export * from './types/outline'
