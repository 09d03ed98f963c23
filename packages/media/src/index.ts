/**
 * @vidbatch/media
 * 
 * Media analysis layer.
 * 
 * Responsibilities:
 * - Probe files with ffprobe
 * - Normalise probe output into immutable descriptors
 * - Cache descriptors per path and modification time
 */

// Probing
export {
  FFProbe,
  parseFFProbeOutput,
  ffprobeResultSchema,
  type FFProbeResult,
  type FFProbeStream,
  type FFProbeOptions,
  type ProbeRunner,
} from './probes/ffprobe.js';

export {
  MediaProber,
  type Prober,
  type MediaProberOptions,
  type FileStat,
  type StatFn,
} from './prober.js';

export { DescriptorCache } from './descriptorCache.js';

// Descriptors
export {
  toMediaDescriptor,
  streamsOfKind,
  primaryStream,
  maxResolution,
  formatResolution,
  type FileFacts,
} from './descriptor.js';

export { formatInfoBlock } from './infoBlock.js';

// Types
export {
  STREAM_KIND_ORDER,
  type StreamKind,
  type StreamDescriptor,
  type MediaDescriptor,
  type Resolution,
} from './types.js';
