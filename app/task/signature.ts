/**
 * Parameter Signatures
 *
 * Reads the formal parameter list of a callable from its source text so
 * wrappers can check call arguments before submitting a task.
 */

import { TaskArgumentError } from './errors';
import { isNativeSource } from './source-provider';
import type { TaskParameter, TaskSignature } from './types';

const SINGLE_ARROW_PARAM = /^(?:async\s+)?([A-Za-z_$][\w$]*)\s*=>/;

type CharVisitor = (ch: string, index: number, depth: number) => boolean;

/**
 * Walk text outside string literals, reporting each character with its
 * bracket depth. Closing brackets report the depth they return to.
 * The visitor returns true to stop.
 */
function scan(text: string, visit: CharVisitor): void {
  let depth = 0;
  let quote: string | undefined;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);

    if (quote) {
      if (ch === '\\') {
        i++;
      } else if (ch === quote) {
        quote = undefined;
      }
      continue;
    }

    if (ch === '"' || ch === "'" || ch === '`') {
      quote = ch;
      continue;
    }

    if (ch === '(' || ch === '[' || ch === '{') {
      if (visit(ch, i, depth)) return;
      depth++;
      continue;
    }

    if (ch === ')' || ch === ']' || ch === '}') {
      depth--;
      if (visit(ch, i, depth)) return;
      continue;
    }

    if (visit(ch, i, depth)) return;
  }
}

/**
 * Replace comments outside string literals with a space
 */
function stripComments(text: string): string {
  let out = '';
  let quote: string | undefined;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);

    if (quote) {
      out += ch;
      if (ch === '\\') {
        out += text.charAt(++i);
      } else if (ch === quote) {
        quote = undefined;
      }
      continue;
    }

    if (ch === '"' || ch === "'" || ch === '`') {
      quote = ch;
      out += ch;
      continue;
    }

    const next = text.charAt(i + 1);
    if (ch === '/' && next === '*') {
      const close = text.indexOf('*/', i + 2);
      i = close < 0 ? text.length : close + 1;
      out += ' ';
      continue;
    }
    if (ch === '/' && next === '/') {
      const newline = text.indexOf('\n', i + 2);
      i = newline < 0 ? text.length : newline - 1;
      out += ' ';
      continue;
    }

    out += ch;
  }

  return out;
}

/**
 * Text between the parentheses of the parameter list, or undefined when the
 * source does not show one.
 */
function extractParameterList(source: string): string | undefined {
  const trimmed = stripComments(source).trim();
  if (trimmed.startsWith('class')) return undefined;

  const arrow = SINGLE_ARROW_PARAM.exec(trimmed);
  if (arrow) return arrow[1];

  let start = -1;
  let end = -1;
  scan(trimmed, (ch, index, depth) => {
    if (start < 0) {
      if (ch === '(' && depth === 0) start = index;
      return false;
    }
    if (ch === ')' && depth === 0) {
      end = index;
      return true;
    }
    return false;
  });

  if (start < 0 || end < 0) return undefined;
  return trimmed.slice(start + 1, end);
}

function splitTopLevel(list: string): string[] {
  const pieces: string[] = [];
  let from = 0;

  scan(list, (ch, index, depth) => {
    if (ch === ',' && depth === 0) {
      pieces.push(list.slice(from, index));
      from = index + 1;
    }
    return false;
  });
  pieces.push(list.slice(from));

  return pieces.map((piece) => piece.trim()).filter((piece) => piece.length > 0);
}

function parseParameter(raw: string): TaskParameter {
  const rest = raw.startsWith('...');
  const body = rest ? raw.slice(3).trim() : raw;

  let defaultAt = -1;
  scan(body, (ch, index, depth) => {
    if (ch === '=' && depth === 0) {
      defaultAt = index;
      return true;
    }
    return false;
  });

  const name = (defaultAt >= 0 ? body.slice(0, defaultAt) : body).trim();
  return { name, optional: rest || defaultAt >= 0, rest };
}

/**
 * Read the parameter signature of a callable.
 *
 * Throws a TypeError for anything that is not a function. Built-in and
 * bound functions show no parameter list; they are treated as variadic with
 * `required` taken from `length`.
 */
export function readSignature(callable: unknown): TaskSignature {
  if (typeof callable !== 'function') {
    throw new TypeError(`Task callable must be a function, got ${callable === null ? 'null' : typeof callable}`);
  }

  const source = Function.prototype.toString.call(callable);
  const list = isNativeSource(source) ? undefined : extractParameterList(source);

  if (list === undefined) {
    return { parameters: [], required: callable.length, variadic: true };
  }

  const parameters = splitTopLevel(list).map(parseParameter);
  return {
    parameters,
    required: callable.length,
    variadic: parameters.some((p) => p.rest),
  };
}

function describeArity(signature: TaskSignature): string {
  if (signature.variadic) return `at least ${signature.required}`;
  if (signature.required === signature.parameters.length) return String(signature.required);
  return `${signature.required} to ${signature.parameters.length}`;
}

/**
 * Check an argument list against a signature
 */
export function validateArguments(
  taskName: string,
  signature: TaskSignature,
  args: readonly unknown[]
): void {
  const tooFew = args.length < signature.required;
  const tooMany = !signature.variadic && args.length > signature.parameters.length;

  if (tooFew || tooMany) {
    throw new TaskArgumentError(taskName, describeArity(signature), args.length);
  }
}
