import { describe, it, expect, vi } from 'vitest';
import type { Prober } from '@vidbatch/media';
import { renameWithResolution } from '../src/index.js';
import { movie } from './fixtures.js';

const prober: Prober = {
  probe: async (path) => movie(path, 1280, 720),
};

describe('renameWithResolution', () => {
  it('appends the resolution before the extension', async () => {
    const rename = vi.fn(async () => {});

    const result = await renameWithResolution('/media/clip.mp4', prober, { exists: async () => false, rename });

    expect(result).toEqual({ from: '/media/clip.mp4', to: '/media/clip-1280x720.mp4', renamed: true });
    expect(rename).toHaveBeenCalledWith('/media/clip.mp4', '/media/clip-1280x720.mp4');
  });

  it('leaves the file alone when the target exists', async () => {
    const rename = vi.fn(async () => {});

    const result = await renameWithResolution('/media/clip.mp4', prober, { exists: async () => true, rename });

    expect(result).toEqual({ from: '/media/clip.mp4', to: '/media/clip-1280x720.mp4', renamed: false });
    expect(rename).not.toHaveBeenCalled();
  });
});
