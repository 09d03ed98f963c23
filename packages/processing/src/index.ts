/**
 * @vidbatch/processing
 * 
 * Transcode planning and execution.
 * 
 * Rules:
 * - Stream copy unless an option asks for an encoder
 * - Never write over the source file
 * - Never leave a partial file under an output name
 * - Log every ffmpeg command executed
 */

// Options
export {
  createTranscodeOptions,
  toTranscodeInput,
  mergeTranscodeInput,
  describeTranscodeOptions,
  transcodeInputSchema,
  DEFAULT_X265_CRF,
  type TranscodeInput,
  type CanonicalTranscodeInput,
  type TranscodeOptions,
  type CodecSelector,
  type PassthroughSelector,
} from './transcodeOptions.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  buildTranscodeCommand,
  evenScaleFilter,
  formatCommandLine,
  type BuildContext,
  type CommandSpec,
  type InputOptions,
  type StreamMapping,
  type VideoCodecOptions,
  type AudioCodecOptions,
  type StreamCodec,
} from './commandBuilder.js';

// Output naming
export {
  parseNamingPattern,
  createOutputOptions,
  renderOutputPath,
  resolveOutputPath,
  incrementedPath,
  PLACEHOLDERS,
  DEFAULT_NAMING_PATTERN,
  MAX_INCREMENT,
  type Placeholder,
  type PatternToken,
  type NamingPattern,
  type CollisionPolicy,
  type OutputOptions,
  type OutputAction,
  type ResolvedOutput,
  type RenderContext,
  type ResolveDeps,
} from './pathTemplate.js';

// Presets
export {
  PresetStore,
  presetFileSchema,
  PRESET_FILE_VERSION,
  type PresetFile,
  type PresetEntry,
  type OpenPresetStoreOptions,
  type ImportConflictPolicy,
} from './presetStore.js';
export { DEFAULT_PRESETS, CRF_LEVELS, type PresetDefinition } from './defaultPresets.js';

// Execution
export { FFmpegProgressParser, type TranscodeProgress } from './progressParser.js';
export {
  FFmpegRunner,
  summarizeDiagnostics,
  type TranscodeRunner,
  type RunOptions,
  type RunOutcome,
  type FFmpegRunnerOptions,
} from './transcodeRunner.js';
export {
  BatchOrchestrator,
  partialOutputPath,
  retryFailed,
  type BatchRequest,
  type BatchResult,
  type BatchEntry,
  type BatchCounts,
  type BatchEvent,
  type JobInfo,
  type JobFailure,
  type CollisionQuestion,
  type CollisionResolver,
  type BatchOrchestratorOptions,
} from './orchestrator.js';

// Renaming
export { renameWithResolution, RESOLUTION_RENAME_PATTERN, type RenameResult, type RenameDeps } from './renamer.js';
