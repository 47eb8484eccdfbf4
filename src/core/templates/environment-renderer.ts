/**
 * Environment Renderer
 *
 * Turns the `environment` template and the relation context into a flat
 * mapping of environment variables. Pure: the same template and context
 * always give the same result, and a failure never yields a partial mapping.
 */

import { isAlias, isMap, isScalar, isSeq, parseDocument, type YAMLError } from 'yaml';
import {
  Success,
  Failure,
  type Result,
  type RelationContext,
  type RenderedEnvironment,
  type RenderError,
  type MalformedTemplate,
  invalidKey,
  malformedTemplate,
  missingRelations,
} from '../../domain/types';
import { parseTemplate, referencedRelations, substitute } from './template-engine';

export interface RenderOptions {
  /** Relations that must be present even when the template does not use them */
  requiredRelations?: readonly string[];
}

const ENV_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isValidEnvironmentKey(key: string): boolean {
  return ENV_KEY.test(key);
}

/**
 * Render a template against the relation context
 */
export function renderEnvironment(
  template: string,
  context: RelationContext,
  options: RenderOptions = {},
): Result<RenderedEnvironment, RenderError> {
  const parsed = parseTemplate(template);
  if (!parsed.ok) {
    return parsed;
  }

  const absent = [...(options.requiredRelations ?? []), ...referencedRelations(parsed.value)].filter(
    (relation) => !Object.hasOwn(context, relation),
  );
  if (absent.length > 0) {
    return Failure(missingRelations(absent));
  }

  const substituted = substitute(parsed.value, context);
  if (!substituted.ok) {
    return substituted;
  }

  return parseEnvironment(substituted.value);
}

/**
 * Parse rendered text as a flat YAML mapping of scalars.
 *
 * Keys keep their source text (`TRUE` stays `TRUE`, `NULL` stays `NULL`);
 * integers are read as bigints so long numeric values keep every digit.
 */
export function parseEnvironment(text: string): Result<RenderedEnvironment, RenderError> {
  const document = parseDocument(text, { uniqueKeys: sameKey, intAsBigInt: true });
  const [firstError] = document.errors;
  if (firstError) {
    return Failure(yamlFailure(firstError));
  }

  const root = document.contents;
  if (root === null || (isScalar(root) && root.value === null)) {
    return Success({});
  }
  if (!isMap(root)) {
    const got = isSeq(root) ? 'a sequence' : isScalar(root) ? `a ${typeof root.value}` : 'an alias';
    return Failure(malformedTemplate(`expected a mapping of environment variables, got ${got}`));
  }

  const environment: RenderedEnvironment = {};
  for (const pair of root.items) {
    const key = keyText(pair.key);
    if (key === undefined) {
      return Failure(malformedTemplate('environment variable names must be plain scalars'));
    }
    if (!isValidEnvironmentKey(key)) {
      return Failure(invalidKey(key));
    }
    const node = isAlias(pair.value) ? pair.value.resolve(document) : pair.value;
    const coerced = node === null ? '' : isScalar(node) ? coerceValue(node.value) : undefined;
    if (coerced === undefined) {
      return Failure(malformedTemplate(`value of ${key} must be a scalar`));
    }
    environment[key] = coerced;
  }
  return Success(environment);
}

function keyText(key: unknown): string | undefined {
  if (!isScalar(key)) return undefined;
  return key.source ?? String(key.value);
}

// Keys are variable names, compared as written rather than by resolved value
function sameKey(a: unknown, b: unknown): boolean {
  return a === b || (keyText(a) !== undefined && keyText(a) === keyText(b));
}

function coerceValue(raw: unknown): string | undefined {
  if (raw === null) return '';
  switch (typeof raw) {
    case 'string':
      return raw;
    case 'number':
    case 'boolean':
    case 'bigint':
      return String(raw);
    default:
      return undefined;
  }
}

function yamlFailure(error: YAMLError): MalformedTemplate {
  const message = error.message.split('\n')[0].replace(/ at line \d+, column \d+:?$/, '');
  const position = error.linePos?.[0];
  return malformedTemplate(
    message,
    position ? { line: position.line, column: position.col } : undefined,
  );
}
