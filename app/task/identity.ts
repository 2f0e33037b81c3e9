import { createHash } from 'crypto';
import { logger as rootLogger, type Logger } from '../utils/logger';
import type { IdentityOrigin, SourceProvider, TaskCallable } from './types';

export interface ContentIdentity {
  identity: string;
  origin: IdentityOrigin;
}

export interface IdentityInput {
  callable: TaskCallable;
  displayName: string;
  cache: boolean;
  sourceProvider: SourceProvider;
  logger?: Logger;
}

/**
 * 128-bit hex digest of UTF-8 text
 */
export function digestSource(source: string): string {
  return createHash('md5').update(source, 'utf8').digest('hex');
}

/**
 * Derive the cache identity of a callable.
 *
 * With caching on, the identity is the digest of the callable's source, so
 * editing the function body yields a new identity. When no source can be
 * recovered the display name stands in and a debug line is logged. With
 * caching off the display name is used as is and no source is read.
 */
export function deriveContentIdentity(input: IdentityInput): ContentIdentity {
  const { callable, displayName, cache, sourceProvider } = input;

  if (!cache) {
    return { identity: displayName, origin: 'display-name' };
  }

  const source = sourceProvider(callable);
  if (source === undefined || source === '') {
    (input.logger ?? rootLogger).debug(
      'Source unavailable for cached task; identity falls back to name',
      { task: displayName }
    );
    return { identity: displayName, origin: 'name-fallback' };
  }

  return { identity: digestSource(source), origin: 'source' };
}
