/**
 * Codec name normalisation.
 *
 * ffprobe reports the decoded codec ("hevc"), never the encoder that produced
 * the stream. Users often name encoders or marketing names instead, so codec
 * predicates compare normalised names.
 */

const CODEC_ALIASES: Record<string, string> = {
  // HEVC
  h265: 'hevc',
  'h.265': 'hevc',
  x265: 'hevc',
  libx265: 'hevc',
  hevc_nvenc: 'hevc',
  hevc_qsv: 'hevc',
  hevc_vaapi: 'hevc',
  hevc_videotoolbox: 'hevc',
  hevc_amf: 'hevc',
  // AVC
  avc: 'h264',
  'h.264': 'h264',
  x264: 'h264',
  libx264: 'h264',
  h264_nvenc: 'h264',
  h264_qsv: 'h264',
  h264_vaapi: 'h264',
  h264_videotoolbox: 'h264',
  h264_amf: 'h264',
  // AV1 / VP9
  libsvtav1: 'av1',
  libaom: 'av1',
  'libaom-av1': 'av1',
  librav1e: 'av1',
  av1_nvenc: 'av1',
  'libvpx-vp9': 'vp9',
  libvpx: 'vp8',
  // MPEG-4 part 2
  xvid: 'mpeg4',
  libxvid: 'mpeg4',
  divx: 'mpeg4',
  // Audio
  libfdk_aac: 'aac',
  libmp3lame: 'mp3',
  lame: 'mp3',
  libopus: 'opus',
  libvorbis: 'vorbis',
  'e-ac3': 'eac3',
  'ac-3': 'ac3',
};

export function normalizeCodecName(name: string): string {
  const lower = name.trim().toLowerCase();
  return CODEC_ALIASES[lower] ?? lower;
}
