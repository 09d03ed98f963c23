import { describe, it, expect } from 'vitest';
import { TemplateError } from '@vidbatch/core';
import {
  createOutputOptions,
  parseNamingPattern,
  renderOutputPath,
  resolveOutputPath,
  type CollisionPolicy,
} from '../src/index.js';
import { movie } from './fixtures.js';

const SOURCE = '/media/shows/ep.mkv';
const fixedClock = (): Date => new Date(2026, 9, 18, 12, 0, 0);

function existing(...paths: string[]): (path: string) => Promise<boolean> {
  const set = new Set(paths);
  return async (path) => set.has(path);
}

function templateError(fn: () => unknown): TemplateError {
  try {
    fn();
  } catch (error) {
    if (error instanceof TemplateError) return error;
    throw error;
  }
  throw new Error('expected a TemplateError');
}

describe('parseNamingPattern', () => {
  it('splits literals and placeholders', () => {
    expect(parseNamingPattern('{stem}-{resolution}.{ext}').tokens).toEqual([
      { type: 'placeholder', name: 'stem' },
      { type: 'literal', text: '-' },
      { type: 'placeholder', name: 'resolution' },
      { type: 'literal', text: '.' },
      { type: 'placeholder', name: 'ext' },
    ]);
  });

  it('reads doubled braces as literal braces', () => {
    expect(parseNamingPattern('{{stem}}').tokens).toEqual([{ type: 'literal', text: '{stem}' }]);
  });

  it('rejects unknown placeholders', () => {
    expect(templateError(() => parseNamingPattern('{stem}-{bogus}')).kind).toBe('UnknownPlaceholder');
  });

  it.each(['{stem', 'a}b', '', '   '])('rejects malformed pattern %j', (pattern) => {
    expect(templateError(() => parseNamingPattern(pattern)).kind).toBe('MalformedPattern');
  });
});

describe('renderOutputPath', () => {
  const descriptor = movie(SOURCE);

  it('uses stem, suffix and target extension by default, beside the source', () => {
    const output = createOutputOptions({ extension: 'mp4', suffix: '-small' });
    expect(renderOutputPath(SOURCE, descriptor, output)).toBe('/media/shows/ep-small.mp4');
  });

  it('substitutes descriptor and clock placeholders', () => {
    const output = createOutputOptions({
      pattern: 'encoded/{parent}/{stem}.{vcodec}.{acodec}.{resolution}.{width}.{height}.{duration}.{date}{extension}',
      extension: '.mkv',
    });
    expect(renderOutputPath(SOURCE, descriptor, output, { now: fixedClock })).toBe(
      '/media/shows/encoded/shows/ep.h264.ac3.1920x1080.1920.1080.60.2026-10-18.mkv'
    );
  });

  it('substitutes time, size in whole megabytes and quality', () => {
    const output = createOutputOptions({ pattern: '{stem}_{time}_{size_mb}MB_q{quality}{extension}', extension: 'mkv' });
    expect(renderOutputPath(SOURCE, descriptor, output, { now: fixedClock, quality: 23 })).toBe(
      '/media/shows/ep_120000_0MB_q23.mkv'
    );
  });

  it('renders quality as empty without a value', () => {
    const output = createOutputOptions({ pattern: '{stem}-q{quality}{extension}', extension: 'mkv' });
    expect(renderOutputPath(SOURCE, descriptor, output)).toBe('/media/shows/ep-q.mkv');
  });

  it('sanitises substituted values', () => {
    const output = createOutputOptions({ extension: 'mkv', suffix: 'a/b:c?' });
    expect(renderOutputPath(SOURCE, descriptor, output)).toBe('/media/shows/epa_b_c_.mkv');
  });

  it('keeps absolute patterns absolute', () => {
    const output = createOutputOptions({ pattern: '/archive/{stem}{extension}', extension: 'mkv' });
    expect(renderOutputPath(SOURCE, descriptor, output)).toBe('/archive/ep.mkv');
  });
});

describe('resolveOutputPath', () => {
  const descriptor = movie(SOURCE);
  const target = '/media/shows/ep-x265.mkv';

  function options(collisionPolicy: CollisionPolicy) {
    return createOutputOptions({ extension: 'mkv', suffix: '-x265', collisionPolicy });
  }

  it('writes a free path under every policy', async () => {
    for (const policy of ['force', 'no-clobber', 'prompt', 'increment'] as const) {
      await expect(resolveOutputPath(SOURCE, descriptor, options(policy), { exists: existing() })).resolves.toEqual({
        path: target,
        exists: false,
        action: 'write',
      });
    }
  });

  it('denies an existing path under no-clobber', async () => {
    await expect(
      resolveOutputPath(SOURCE, descriptor, options('no-clobber'), { exists: existing(target) })
    ).rejects.toMatchObject({ kind: 'CollisionDenied' });
  });

  it('returns the same path under force', async () => {
    await expect(
      resolveOutputPath(SOURCE, descriptor, options('force'), { exists: existing(target) })
    ).resolves.toEqual({ path: target, exists: true, action: 'overwrite' });
  });

  it('leaves the decision to the caller under prompt', async () => {
    await expect(
      resolveOutputPath(SOURCE, descriptor, options('prompt'), { exists: existing(target) })
    ).resolves.toEqual({ path: target, exists: true, action: 'ask' });
  });

  it('numbers the output under increment', async () => {
    await expect(
      resolveOutputPath(SOURCE, descriptor, options('increment'), {
        exists: existing(target, '/media/shows/ep-x265_001.mkv'),
      })
    ).resolves.toEqual({ path: '/media/shows/ep-x265_002.mkv', exists: true, action: 'rename' });
  });

  it('denies a path claimed by another job under every policy but increment', async () => {
    for (const policy of ['force', 'no-clobber', 'prompt'] as const) {
      await expect(
        resolveOutputPath(SOURCE, descriptor, options(policy), { exists: existing(), isClaimed: (p) => p === target })
      ).rejects.toMatchObject({ kind: 'CollisionDenied', details: { path: target } });
    }
  });

  it('skips claimed paths under increment', async () => {
    const claimed = new Set([target, '/media/shows/ep-x265_001.mkv']);
    await expect(
      resolveOutputPath(SOURCE, descriptor, options('increment'), {
        exists: existing('/media/shows/ep-x265_002.mkv'),
        isClaimed: (p) => claimed.has(p),
      })
    ).resolves.toEqual({ path: '/media/shows/ep-x265_003.mkv', exists: true, action: 'rename' });
  });

  it('refuses an output equal to the input whatever the policy', async () => {
    const sameName = createOutputOptions({ extension: 'mkv', collisionPolicy: 'force' });
    await expect(
      resolveOutputPath(SOURCE, descriptor, sameName, { exists: existing(SOURCE) })
    ).rejects.toMatchObject({ kind: 'SameAsInput' });
  });
});
