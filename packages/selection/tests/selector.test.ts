import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, symlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { ProbeError, SelectionError } from '@vidbatch/core';
import { ffprobeResultSchema, toMediaDescriptor, type MediaDescriptor, type Prober } from '@vidbatch/media';
import { Selector, createSelectionCriteria } from '../src/index.js';

function descriptor(path: string, videoCodec: string, width: number, height: number, durationSec: number): MediaDescriptor {
  return toMediaDescriptor(
    path,
    ffprobeResultSchema.parse({
      format: { format_name: 'matroska', duration: String(durationSec), size: '1000' },
      streams: [
        { index: 0, codec_type: 'video', codec_name: videoCodec, width, height },
        { index: 1, codec_type: 'audio', codec_name: 'aac' },
      ],
    }),
    { mtimeMs: 1, size: 1000 }
  );
}

describe('Selector', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'vidbatch-select-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function touch(...names: string[]): Promise<void> {
    for (const name of names) {
      const full = join(root, name);
      await mkdir(join(full, '..'), { recursive: true });
      await writeFile(full, 'x');
    }
  }

  const noProbe: Prober = {
    probe: async (path) => {
      throw new Error(`unexpected probe of ${path}`);
    },
  };

  it('selects the three .avi files out of five, ordered by path', async () => {
    await touch('c.avi', 'a.avi', 'x.mkv', 'b.avi', 'y.mkv');

    const result = await new Selector(noProbe).select(
      [root],
      createSelectionCriteria({ pattern: { kind: 'glob', value: '*.avi' } }),
      0
    );

    expect(result.paths).toEqual([join(root, 'a.avi'), join(root, 'b.avi'), join(root, 'c.avi')]);
    expect(result.warnings).toEqual([]);
  });

  it('returns every regular file once, dot files included, when no predicate is set', async () => {
    await touch('one.mkv', 'two.txt', 'sub/three.mp4', '.hidden.mkv', '.movie.vidbatch-partial.mkv');

    const result = await new Selector(noProbe).select([root, root], createSelectionCriteria(), -1);

    expect(result.paths).toEqual([
      join(root, '.hidden.mkv'),
      join(root, 'one.mkv'),
      join(root, 'sub', 'three.mp4'),
      join(root, 'two.txt'),
    ]);
  });

  it('limits the walk to the requested depth', async () => {
    await touch('top.mkv', 'a/one.mkv', 'a/b/two.mkv');
    const selector = new Selector(noProbe);
    const all = createSelectionCriteria();

    expect((await selector.select([root], all, 0)).paths).toEqual([join(root, 'top.mkv')]);
    expect((await selector.select([root], all, 1)).paths).toEqual([join(root, 'a', 'one.mkv'), join(root, 'top.mkv')]);
    expect((await selector.select([root], all, -1)).paths).toHaveLength(3);
  });

  it('matches globs containing a slash against the relative path', async () => {
    await touch('shows/ep1.mkv', 'movies/film.mkv');

    const result = await new Selector(noProbe).select(
      [root],
      createSelectionCriteria({ pattern: 'shows/*.mkv' }),
      -1
    );

    expect(result.paths).toEqual([join(root, 'shows', 'ep1.mkv')]);
  });

  it('applies regex patterns, exclusions and extensions without probing', async () => {
    await touch('Show.S01E01.mkv', 'Show.S01E02.sample.mkv', 'Show.S01E03.MP4', 'notes.txt');

    const result = await new Selector(noProbe).select(
      [root],
      createSelectionCriteria({
        pattern: { kind: 'regex', value: 's01e\\d+' },
        exclude: ['*sample*'],
        extensions: ['mkv', '.mp4'],
      }),
      0
    );

    expect(result.paths.map((p) => basename(p))).toEqual(['Show.S01E01.mkv', 'Show.S01E03.MP4']);
  });

  it('accepts a file root as its own candidate', async () => {
    await touch('single.mkv');

    const result = await new Selector(noProbe).select([join(root, 'single.mkv')], createSelectionCriteria(), 0);

    expect(result.paths).toEqual([join(root, 'single.mkv')]);
  });

  it('follows symlinks to files', async () => {
    await touch('real.mkv');
    await mkdir(join(root, 'links'));
    await symlink(join(root, 'real.mkv'), join(root, 'links', 'alias.mkv'));

    const result = await new Selector(noProbe).select([join(root, 'links')], createSelectionCriteria(), 0);

    expect(result.paths).toEqual([join(root, 'links', 'alias.mkv')]);
  });

  it('fails with PathNotFound before probing anything', async () => {
    const prober = { probe: vi.fn(noProbe.probe) };
    await touch('a.mkv');

    await expect(
      new Selector(prober).select([root, join(root, 'missing')], createSelectionCriteria({ videoCodecs: ['hevc'] }), 0)
    ).rejects.toBeInstanceOf(SelectionError);
    expect(prober.probe).not.toHaveBeenCalled();
  });

  it('filters on metadata and matches codec aliases', async () => {
    await touch('hevc.mkv', 'avc.mkv', 'short.mkv');
    const facts: Record<string, [string, number, number, number]> = {
      'hevc.mkv': ['hevc', 1920, 1080, 3600],
      'avc.mkv': ['h264', 1920, 1080, 3600],
      'short.mkv': ['hevc', 1280, 720, 30],
    };
    const prober: Prober = {
      probe: async (path) => {
        const fact = facts[basename(path)];
        if (!fact) throw new Error(`no fixture for ${path}`);
        return descriptor(path, ...fact);
      },
    };

    const result = await new Selector(prober).select(
      [root],
      createSelectionCriteria({ videoCodecs: ['x265'], minDurationSec: 60 }),
      0
    );

    expect(result.paths).toEqual([join(root, 'hevc.mkv')]);
    expect([...result.descriptors.keys()]).toEqual([join(root, 'hevc.mkv')]);
  });

  it('turns per-file probe failures into warnings', async () => {
    await touch('good.mkv', 'broken.mkv');
    const prober: Prober = {
      probe: async (path) => {
        if (path.endsWith('broken.mkv')) throw new ProbeError('Unreadable', path, 'ffprobe could not read it');
        return descriptor(path, 'h264', 640, 480, 100);
      },
    };

    const result = await new Selector(prober).select(
      [root],
      createSelectionCriteria({ minResolution: { width: 320 } }),
      0
    );

    expect(result.paths).toEqual([join(root, 'good.mkv')]);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]?.path).toBe(join(root, 'broken.mkv'));
    expect(result.warnings[0]?.error.kind).toBe('Unreadable');
  });

  it('aborts when the probe tool is missing', async () => {
    await touch('a.mkv');
    const prober: Prober = {
      probe: async (path) => {
        throw new ProbeError('ToolMissing', path, 'ffprobe executable not found');
      },
    };

    await expect(
      new Selector(prober).select([root], createSelectionCriteria({ audioCodecs: ['aac'] }), 0)
    ).rejects.toMatchObject({ kind: 'ToolMissing' });
  });
});
