/**
 * Filename patterns: globs and regular expressions.
 */

import { ValidationError } from '@vidbatch/core';

export type PatternKind = 'glob' | 'regex';

export interface CompiledPattern {
  kind: PatternKind;
  source: string;
  /** Globs containing "/" match the root-relative path instead of the file name */
  matchesPath: boolean;
  regex: RegExp;
}

const REGEX_SPECIALS = /[\\^$.|+(){}]/;

/**
 * Translate a glob to an anchored, case-insensitive RegExp.
 *
 * `*` stays within one path segment, `**` crosses segments (`**\/` may also
 * match nothing), `?` is one character, `[...]` and `[!...]` are classes.
 */
export function globToRegExp(glob: string): RegExp {
  let re = '';

  for (let i = 0; i < glob.length; i++) {
    const c = glob.charAt(i);

    if (c === '*') {
      if (glob.charAt(i + 1) === '*') {
        if (glob.charAt(i + 2) === '/') {
          re += '(?:.*/)?';
          i += 2;
        } else {
          re += '.*';
          i += 1;
        }
      } else {
        re += '[^/]*';
      }
    } else if (c === '?') {
      re += '[^/]';
    } else if (c === '[') {
      const close = glob.indexOf(']', i + 2);
      if (close === -1) {
        re += '\\[';
      } else {
        let body = glob.slice(i + 1, close).replace(/\\/g, '\\\\');
        if (body.startsWith('!')) body = '^' + body.slice(1);
        re += `[${body}]`;
        i = close;
      }
    } else if (c === ']') {
      re += '\\]';
    } else if (REGEX_SPECIALS.test(c)) {
      re += '\\' + c;
    } else {
      re += c;
    }
  }

  return new RegExp(`^${re}$`, 'i');
}

export function compileGlob(glob: string): CompiledPattern {
  return {
    kind: 'glob',
    source: glob,
    matchesPath: glob.includes('/'),
    regex: globToRegExp(glob),
  };
}

export function compileRegex(source: string): CompiledPattern {
  let regex: RegExp;
  try {
    regex = new RegExp(source, 'i');
  } catch (error) {
    throw new ValidationError('pattern', `invalid regular expression: ${error instanceof Error ? error.message : String(error)}`);
  }
  return { kind: 'regex', source, matchesPath: false, regex };
}

/**
 * Test a compiled pattern against a file name and its root-relative path
 * (forward slashes).
 */
export function testPattern(
  pattern: CompiledPattern,
  fileName: string,
  relativePath: string
): boolean {
  return pattern.regex.test(pattern.matchesPath ? relativePath : fileName);
}

/**
 * Whether a glob can reach below the first directory level
 */
export function isRecursiveGlob(glob: string): boolean {
  return glob.includes('**');
}
