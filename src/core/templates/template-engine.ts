/**
 * Template Engine
 *
 * A deliberately small substitution language for the `environment` option:
 *
 *   {{ relation.field }}   replaced with the field's value
 *   {# anything #}         dropped
 *
 * Placeholders are plain two-segment lookups into the relation context.
 * There are no filters, expressions or `{% %}` statements.
 */

import {
  Success,
  Failure,
  type Result,
  type RelationContext,
  type MalformedTemplate,
  type MissingRelationData,
  type SourceLocation,
  malformedTemplate,
  missingRelations,
  missingFields,
} from '../../domain/types';

export interface TextSegment {
  type: 'text';
  value: string;
}

export interface PlaceholderSegment {
  type: 'placeholder';
  relation: string;
  field: string;
  location: SourceLocation;
}

export type TemplateSegment = TextSegment | PlaceholderSegment;

export interface ParsedTemplate {
  source: string;
  segments: TemplateSegment[];
}

const OPENER = /\{[{#%]/g;
const LOOKUP = /^([A-Za-z_][\w-]*)\.([A-Za-z_][\w-]*)$/;

/**
 * 1-based line and column of an offset in the source
 */
export function locate(source: string, offset: number): SourceLocation {
  const before = source.slice(0, offset);
  const lineStart = before.lastIndexOf('\n') + 1;
  return {
    line: before.split('\n').length,
    column: offset - lineStart + 1,
  };
}

/**
 * Split a template into literal text and placeholders
 */
export function parseTemplate(source: string): Result<ParsedTemplate, MalformedTemplate> {
  const segments: TemplateSegment[] = [];
  let cursor = 0;

  const pushText = (value: string): void => {
    if (value.length === 0) return;
    const last = segments[segments.length - 1];
    if (last?.type === 'text') {
      last.value += value;
    } else {
      segments.push({ type: 'text', value });
    }
  };

  OPENER.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = OPENER.exec(source)) !== null) {
    const start = match.index;
    const location = locate(source, start);
    pushText(source.slice(cursor, start));

    if (match[0] === '{%') {
      return Failure(malformedTemplate('control statements ({% %}) are not supported', location));
    }

    const closer = match[0] === '{{' ? '}}' : '#}';
    const end = source.indexOf(closer, start + 2);
    if (end === -1) {
      const what = closer === '}}' ? 'placeholder' : 'comment';
      return Failure(malformedTemplate(`unterminated ${what}, expected "${closer}"`, location));
    }

    if (closer === '}}') {
      const expression = source.slice(start + 2, end).trim();
      if (expression.length === 0) {
        return Failure(malformedTemplate('empty placeholder', location));
      }
      const lookup = LOOKUP.exec(expression);
      if (!lookup) {
        return Failure(
          malformedTemplate(
            `unsupported expression "${expression}", only relation.field lookups are allowed`,
            location,
          ),
        );
      }
      segments.push({ type: 'placeholder', relation: lookup[1], field: lookup[2], location });
    }

    cursor = end + 2;
    OPENER.lastIndex = cursor;
  }
  pushText(source.slice(cursor));

  return Success({ source, segments });
}

function placeholders(template: ParsedTemplate): PlaceholderSegment[] {
  return template.segments.filter(
    (segment): segment is PlaceholderSegment => segment.type === 'placeholder',
  );
}

/**
 * Relation names the template reads from, sorted and unique
 */
export function referencedRelations(template: ParsedTemplate): string[] {
  return [...new Set(placeholders(template).map((p) => p.relation))].sort();
}

/**
 * `relation.field` references in the template, sorted and unique
 */
export function referencedFields(template: ParsedTemplate): string[] {
  return [...new Set(placeholders(template).map((p) => `${p.relation}.${p.field}`))].sort();
}

/**
 * Replace every placeholder with its context value.
 *
 * Fails without producing any text when a relation or field is missing.
 */
export function substitute(
  template: ParsedTemplate,
  context: RelationContext,
): Result<string, MissingRelationData> {
  const absentRelations: string[] = [];
  const absentFields: string[] = [];

  for (const placeholder of placeholders(template)) {
    const data = Object.hasOwn(context, placeholder.relation)
      ? context[placeholder.relation]
      : undefined;
    if (!data) {
      absentRelations.push(placeholder.relation);
    } else if (!Object.hasOwn(data, placeholder.field)) {
      absentFields.push(`${placeholder.relation}.${placeholder.field}`);
    }
  }

  if (absentRelations.length > 0) {
    return Failure(missingRelations(absentRelations));
  }
  if (absentFields.length > 0) {
    return Failure(missingFields(absentFields));
  }

  const rendered = template.segments
    .map((segment) =>
      segment.type === 'text' ? segment.value : context[segment.relation][segment.field],
    )
    .join('');
  return Success(rendered);
}
