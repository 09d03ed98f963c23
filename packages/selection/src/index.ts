/**
 * @vidbatch/selection
 *
 * Chooses which files take part in a batch: filesystem walk, filename
 * patterns and media-metadata predicates.
 */

export { Selector, type SelectionResult, type SelectionWarning, type SelectOptions } from './selector.js';

export {
  createSelectionCriteria,
  selectionCriteriaSchema,
  matchesPath,
  matchesDescriptor,
  needsMetadata,
  VIDEO_EXTENSIONS,
  type SelectionCriteria,
  type SelectionCriteriaInput,
} from './criteria.js';

export {
  globToRegExp,
  compileGlob,
  compileRegex,
  testPattern,
  isRecursiveGlob,
  type CompiledPattern,
  type PatternKind,
} from './pattern.js';

export { normalizeCodecName } from './codecAliases.js';

export { walkRoot, type WalkEntry } from './walker.js';
