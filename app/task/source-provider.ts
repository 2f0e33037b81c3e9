/**
 * Source Providers
 *
 * Ways of recovering a callable's source text for content hashing. Every
 * provider may answer undefined; callers treat that as a normal outcome.
 */

import type { SourceProvider, TaskCallable } from './types';

const NATIVE_CODE = /\{\s*\[native code\]\s*\}\s*$/;

export function isNativeSource(text: string): boolean {
  return NATIVE_CODE.test(text);
}

/**
 * Source text as the runtime reports it. Built-in and bound functions
 * report `[native code]`, which identifies nothing, so they have no source.
 */
export const functionSourceProvider: SourceProvider = (callable) => {
  const text = Function.prototype.toString.call(callable);
  if (!text || isNativeSource(text)) {
    return undefined;
  }
  return text;
};

/**
 * Sources registered ahead of time, for callables built at run time whose
 * text lives elsewhere (generated code, templates, remote definitions).
 */
export function staticSourceProvider(
  entries: Iterable<readonly [TaskCallable, string]>
): SourceProvider {
  const sources = new Map<TaskCallable, string>(entries);
  return (callable) => sources.get(callable);
}

/**
 * First provider with a non-empty answer wins
 */
export function chainSourceProviders(...providers: SourceProvider[]): SourceProvider {
  return (callable) => {
    for (const provider of providers) {
      const source = provider(callable);
      if (source) return source;
    }
    return undefined;
  };
}
