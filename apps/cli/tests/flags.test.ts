import { describe, it, expect } from 'vitest';
import { ValidationError } from '@vidbatch/core';
import {
  batchSelection,
  collisionPolicyFromFlags,
  flagsToTranscodeInput,
  parseIntegerFlag,
} from '../src/lib/flags.js';

describe('parseIntegerFlag', () => {
  it('accepts integers at or above the minimum', () => {
    expect(parseIntegerFlag('--crf', ' 23 ', 0)).toBe(23);
    expect(parseIntegerFlag('--depth', '-1', -1)).toBe(-1);
  });

  it.each(['abc', '2.5', ''])('rejects %j', (value) => {
    expect(() => parseIntegerFlag('--crf', value, 0)).toThrow(ValidationError);
  });

  it('rejects values below the minimum', () => {
    expect(() => parseIntegerFlag('--concurrency', '0', 1)).toThrow('must be at least 1');
  });
});

describe('flagsToTranscodeInput', () => {
  it('maps flag names onto option fields', () => {
    expect(
      flagsToTranscodeInput({
        vcodec: 'libx264',
        acodec: 'aac',
        stripSubs: true,
        crf: '20',
        customFlags: ['-preset slow'],
        fixErrors: true,
      })
    ).toEqual({
      videoCodec: 'libx264',
      audioCodec: 'aac',
      stripVideo: false,
      stripAudio: false,
      stripSubs: true,
      stripData: false,
      avCopyOnly: false,
      x265: false,
      crf: 20,
      fixResolution: false,
      fixErrors: true,
      customFlags: ['-preset slow'],
    });
  });
});

describe('collisionPolicyFromFlags', () => {
  it('defaults to prompting', () => {
    expect(collisionPolicyFromFlags({})).toBe('prompt');
    expect(collisionPolicyFromFlags({ clobber: true })).toBe('prompt');
  });

  it('maps each policy flag', () => {
    expect(collisionPolicyFromFlags({ force: true })).toBe('force');
    expect(collisionPolicyFromFlags({ clobber: false })).toBe('no-clobber');
    expect(collisionPolicyFromFlags({ increment: true })).toBe('increment');
  });

  it('rejects more than one policy', () => {
    expect(() => collisionPolicyFromFlags({ force: true, increment: true })).toThrow(
      '--force, --increment are mutually exclusive'
    );
  });
});

describe('batchSelection', () => {
  it('matches in the working directory by default', () => {
    expect(batchSelection('*.avi', undefined, '/work')).toEqual({ root: '/work', pattern: '*.avi', depth: 0 });
  });

  it('moves literal leading directories into the root', () => {
    expect(batchSelection('videos/*.avi', undefined, '/work')).toEqual({
      root: '/work/videos',
      pattern: '*.avi',
      depth: 0,
    });
  });

  it('keeps absolute roots', () => {
    expect(batchSelection('/*.avi', undefined, '/work')).toEqual({ root: '/', pattern: '*.avi', depth: 0 });
  });

  it('walks without limit for recursive globs', () => {
    expect(batchSelection('/data/movies/**/*.mkv', '2', '/work')).toEqual({
      root: '/data/movies',
      pattern: '**/*.mkv',
      depth: -1,
    });
  });

  it('walks at least as deep as the pattern has segments', () => {
    expect(batchSelection('shows/*/*.mkv', undefined, '/work').depth).toBe(1);
    expect(batchSelection('*.mkv', '3', '/work').depth).toBe(3);
  });

  it('rejects a malformed depth', () => {
    expect(() => batchSelection('*.mkv', 'deep', '/work')).toThrow(ValidationError);
  });
});
