/**
 * Render failures
 *
 * Every way a template can fail to become an environment. All of them are
 * recoverable: the operator keeps the unit blocked and re-renders on the
 * next event.
 */

export interface SourceLocation {
  line: number;
  column: number;
}

/**
 * A relation the template (or the metadata) needs is not joined, or a joined
 * relation has not published a referenced field yet.
 */
export interface MissingRelationData {
  kind: 'MissingRelationData';
  /** Relation names that are absent from the context, sorted */
  relations: string[];
  /** `relation.field` references that could not be resolved, sorted */
  fields: string[];
}

/**
 * Substitution syntax error, YAML syntax error, or a rendered document that
 * is not a flat mapping of scalars.
 */
export interface MalformedTemplate {
  kind: 'MalformedTemplate';
  message: string;
  location?: SourceLocation;
}

/**
 * A rendered key that cannot be used as an environment variable name.
 */
export interface InvalidKey {
  kind: 'InvalidKey';
  key: string;
}

export type RenderError = MissingRelationData | MalformedTemplate | InvalidKey;

export const missingRelations = (relations: Iterable<string>): MissingRelationData => ({
  kind: 'MissingRelationData',
  relations: [...new Set(relations)].sort(),
  fields: [],
});

export const missingFields = (fields: Iterable<string>): MissingRelationData => ({
  kind: 'MissingRelationData',
  relations: [],
  fields: [...new Set(fields)].sort(),
});

export const malformedTemplate = (message: string, location?: SourceLocation): MalformedTemplate =>
  location ? { kind: 'MalformedTemplate', message, location } : { kind: 'MalformedTemplate', message };

export const invalidKey = (key: string): InvalidKey => ({ kind: 'InvalidKey', key });

/**
 * Human-readable reason used as the blocked status message.
 */
export function describeRenderError(error: RenderError): string {
  switch (error.kind) {
    case 'MissingRelationData':
      if (error.relations.length > 0) {
        return `Waiting for ${error.relations.join(', ')} relation(s)`;
      }
      return `Waiting for relation data: ${error.fields.join(', ')}`;
    case 'MalformedTemplate': {
      const where = error.location
        ? ` (line ${error.location.line}, column ${error.location.column})`
        : '';
      return `Invalid environment template: ${error.message}${where}`;
    }
    case 'InvalidKey':
      return `Invalid environment variable name: ${JSON.stringify(error.key)}`;
  }
}
