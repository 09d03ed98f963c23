/**
 * Progress Parser
 * 
 * Parses the key=value blocks ffmpeg writes with `-progress pipe:1`.
 * Each block ends with `progress=continue` or `progress=end`.
 */

export interface TranscodeProgress {
  /** Position reached in the output, milliseconds */
  outTimeMs: number;
  frame: number;
  fps: number;
  /** Multiple of realtime */
  speed: number;
  /** Bytes written so far */
  totalSize: number;
  /** 0-100, present when the source duration is known */
  percent?: number;
  /** True on the final block */
  done: boolean;
}

function toNumber(value: string): number {
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

export class FFmpegProgressParser {
  private buffer = '';
  private current: Omit<TranscodeProgress, 'done' | 'percent'> = {
    outTimeMs: 0,
    frame: 0,
    fps: 0,
    speed: 0,
    totalSize: 0,
  };

  constructor(private readonly durationMs: number = 0) {}

  /**
   * Feed a chunk of stdout; returns one entry per block completed by it
   */
  push(chunk: string): TranscodeProgress[] {
    this.buffer += chunk;

    // Process complete lines
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    const blocks: TranscodeProgress[] = [];
    for (const line of lines) {
      const block = this.parseLine(line.trim());
      if (block) blocks.push(block);
    }
    return blocks;
  }

  parseLine(line: string): TranscodeProgress | null {
    const eq = line.indexOf('=');
    if (eq <= 0) return null;

    const key = line.slice(0, eq).trim();
    const value = line.slice(eq + 1).trim();

    switch (key) {
      case 'frame':
        this.current.frame = Math.trunc(toNumber(value));
        break;
      case 'fps':
        this.current.fps = toNumber(value);
        break;
      case 'total_size':
        this.current.totalSize = Math.trunc(toNumber(value));
        break;
      // Both keys carry microseconds
      case 'out_time_us':
      case 'out_time_ms':
        this.current.outTimeMs = Math.max(0, Math.round(toNumber(value) / 1000));
        break;
      case 'speed':
        this.current.speed = toNumber(value.replace('x', ''));
        break;
      case 'progress':
        if (value === 'continue' || value === 'end') {
          return this.snapshot(value === 'end');
        }
        break;
    }

    return null;
  }

  private snapshot(done: boolean): TranscodeProgress {
    const progress: TranscodeProgress = { ...this.current, done };
    if (this.durationMs > 0) {
      progress.percent = done ? 100 : Math.min(100, (this.current.outTimeMs / this.durationMs) * 100);
    }
    return progress;
  }
}
