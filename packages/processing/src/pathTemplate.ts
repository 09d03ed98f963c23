/**
 * Path Templater
 *
 * Naming patterns with `{placeholder}` substitution and collision policies
 * for output paths.
 */

import { basename, dirname, extname, join, resolve } from 'node:path';
import { TemplateError } from '@vidbatch/core';
import { formatResolution, maxResolution, primaryStream, type MediaDescriptor } from '@vidbatch/media';
import { getBasename, normalizeExtension, pathExists, sanitizeFilename } from '@vidbatch/utils';

export const PLACEHOLDERS = [
  'stem',
  'parent',
  'ext',
  'extension',
  'suffix',
  'resolution',
  'width',
  'height',
  'vcodec',
  'acodec',
  'duration',
  'size_mb',
  'quality',
  'date',
  'time',
] as const;

export type Placeholder = (typeof PLACEHOLDERS)[number];

export const DEFAULT_NAMING_PATTERN = '{stem}{suffix}{extension}';

export const MAX_INCREMENT = 999;

export type PatternToken =
  | { readonly type: 'literal'; readonly text: string }
  | { readonly type: 'placeholder'; readonly name: Placeholder };

export interface NamingPattern {
  readonly source: string;
  readonly tokens: readonly PatternToken[];
}

export type CollisionPolicy = 'force' | 'no-clobber' | 'prompt' | 'increment';

export interface OutputOptions {
  readonly pattern: NamingPattern;
  /** Target extension with leading dot, or '' */
  readonly extension: string;
  readonly suffix: string;
  readonly collisionPolicy: CollisionPolicy;
}

export type OutputAction = 'write' | 'overwrite' | 'ask' | 'rename';

export interface ResolvedOutput {
  readonly path: string;
  /** Whether the rendered path already existed or was claimed */
  readonly exists: boolean;
  readonly action: OutputAction;
}

export interface RenderContext {
  now?: () => Date;
  /** Value of `{quality}`, normally the CRF */
  quality?: number | string;
}

export interface ResolveDeps extends RenderContext {
  exists?: (path: string) => Promise<boolean>;
  /** Paths already taken by another job of the same batch */
  isClaimed?: (path: string) => boolean;
}

function isPlaceholder(name: string): name is Placeholder {
  return PLACEHOLDERS.some((placeholder) => placeholder === name);
}

/**
 * Tokenise a naming pattern. `{{` and `}}` are literal braces.
 *
 * @throws TemplateError(UnknownPlaceholder | MalformedPattern)
 */
export function parseNamingPattern(source: string): NamingPattern {
  if (source.trim() === '') {
    throw new TemplateError('MalformedPattern', 'Naming pattern is empty', { pattern: source });
  }

  const tokens: PatternToken[] = [];
  let literal = '';
  let i = 0;

  const flush = (): void => {
    if (literal) {
      tokens.push({ type: 'literal', text: literal });
      literal = '';
    }
  };

  while (i < source.length) {
    const char = source.charAt(i);
    const next = source.charAt(i + 1);

    if (char === '{' && next === '{') {
      literal += '{';
      i += 2;
    } else if (char === '}' && next === '}') {
      literal += '}';
      i += 2;
    } else if (char === '{') {
      const close = source.indexOf('}', i + 1);
      if (close === -1) {
        throw new TemplateError('MalformedPattern', `Unterminated "{" at position ${i} in "${source}"`, {
          pattern: source,
          position: i,
        });
      }
      const name = source.slice(i + 1, close).trim();
      if (!isPlaceholder(name)) {
        throw new TemplateError(
          'UnknownPlaceholder',
          `Unknown placeholder {${name}}; expected one of ${PLACEHOLDERS.join(', ')}`,
          { pattern: source, placeholder: name }
        );
      }
      flush();
      tokens.push({ type: 'placeholder', name });
      i = close + 1;
    } else if (char === '}') {
      throw new TemplateError('MalformedPattern', `Unmatched "}" at position ${i} in "${source}"`, {
        pattern: source,
        position: i,
      });
    } else {
      literal += char;
      i += 1;
    }
  }
  flush();

  return Object.freeze({ source, tokens: Object.freeze(tokens) });
}

export function createOutputOptions(input: {
  pattern?: string;
  extension: string;
  suffix?: string;
  collisionPolicy?: CollisionPolicy;
}): OutputOptions {
  return Object.freeze({
    pattern: parseNamingPattern(input.pattern ?? DEFAULT_NAMING_PATTERN),
    extension: normalizeExtension(input.extension),
    suffix: input.suffix ?? '',
    collisionPolicy: input.collisionPolicy ?? 'prompt',
  });
}

const pad = (n: number): string => String(n).padStart(2, '0');

function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function formatTime(date: Date): string {
  return `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

function placeholderValue(
  name: Placeholder,
  sourcePath: string,
  descriptor: MediaDescriptor,
  options: OutputOptions,
  context: RenderContext
): string {
  const now = context.now ?? (() => new Date());
  switch (name) {
    case 'stem':
      return getBasename(sourcePath);
    case 'parent':
      return basename(dirname(sourcePath));
    case 'ext':
      return extname(sourcePath).replace(/^\./, '');
    case 'extension':
      return options.extension;
    case 'suffix':
      return options.suffix;
    case 'resolution':
      return formatResolution(maxResolution(descriptor));
    case 'width':
      return String(maxResolution(descriptor).width);
    case 'height':
      return String(maxResolution(descriptor).height);
    case 'vcodec':
      return primaryStream(descriptor, 'video')?.codec ?? 'none';
    case 'acodec':
      return primaryStream(descriptor, 'audio')?.codec ?? 'none';
    case 'duration':
      return String(Math.floor(descriptor.durationSec));
    case 'size_mb':
      return String(Math.floor(descriptor.sizeBytes / (1024 * 1024)));
    case 'quality':
      return context.quality === undefined ? '' : String(context.quality);
    case 'date':
      return formatDate(now());
    case 'time':
      return formatTime(now());
  }
}

/**
 * Render the pattern for one source. Relative results are resolved against
 * the source's directory.
 */
export function renderOutputPath(
  sourcePath: string,
  descriptor: MediaDescriptor,
  options: OutputOptions,
  context: RenderContext = {}
): string {
  const source = resolve(sourcePath);
  const rendered = options.pattern.tokens
    .map((token) => {
      if (token.type === 'literal') return token.text;
      const value = placeholderValue(token.name, source, descriptor, options, context);
      return token.name === 'parent' ? value : sanitizeFilename(value);
    })
    .join('');

  if (rendered.trim() === '') {
    throw new TemplateError('MalformedPattern', `Pattern "${options.pattern.source}" renders an empty name`, {
      pattern: options.pattern.source,
      path: source,
    });
  }

  return resolve(dirname(source), rendered);
}

/**
 * Numbered sibling: `movie.mkv` -> `movie_007.mkv`
 */
export function incrementedPath(path: string, counter: number): string {
  const ext = extname(path);
  const stem = basename(path, ext);
  return join(dirname(path), `${stem}_${String(counter).padStart(3, '0')}${ext}`);
}

/**
 * Render the output path for a source and apply the collision policy.
 * A path claimed by another job is never shared: increment skips it and
 * every other policy denies it.
 *
 * @throws TemplateError(SameAsInput) when the output would overwrite the source
 * @throws TemplateError(CollisionDenied) under no-clobber, on a claimed path, or when increment runs out
 */
export async function resolveOutputPath(
  sourcePath: string,
  descriptor: MediaDescriptor,
  options: OutputOptions,
  deps: ResolveDeps = {}
): Promise<ResolvedOutput> {
  const exists = deps.exists ?? pathExists;
  const isClaimed = deps.isClaimed ?? (() => false);
  const source = resolve(sourcePath);
  const path = renderOutputPath(source, descriptor, options, { now: deps.now, quality: deps.quality });

  if (path === source) {
    throw new TemplateError('SameAsInput', `Output path is the input file: ${source}`, { path: source });
  }

  const claimed = isClaimed(path);
  if (!claimed && !(await exists(path))) {
    return { path, exists: false, action: 'write' };
  }

  if (claimed && options.collisionPolicy !== 'increment') {
    throw new TemplateError('CollisionDenied', `Output is already claimed by another job: ${path}`, { path });
  }

  switch (options.collisionPolicy) {
    case 'force':
      return { path, exists: true, action: 'overwrite' };
    case 'prompt':
      return { path, exists: true, action: 'ask' };
    case 'no-clobber':
      throw new TemplateError('CollisionDenied', `Output exists: ${path}`, { path });
    case 'increment':
      for (let counter = 1; counter <= MAX_INCREMENT; counter++) {
        const candidate = incrementedPath(path, counter);
        if (candidate !== source && !isClaimed(candidate) && !(await exists(candidate))) {
          return { path: candidate, exists: true, action: 'rename' };
        }
      }
      throw new TemplateError('CollisionDenied', `No free numbered name left for ${path}`, { path });
  }
}
