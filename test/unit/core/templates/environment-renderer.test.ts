import { describe, it, expect } from '@jest/globals';
import {
  isValidEnvironmentKey,
  renderEnvironment,
} from '../../../../src/core/templates/environment-renderer';

describe('renderEnvironment', () => {
  describe('successful renders', () => {
    it('should return the literal mapping of a template without placeholders', () => {
      expect(renderEnvironment('DEBUG_LEVEL: 2\nNAME: web', {})).toEqual({
        ok: true,
        value: { DEBUG_LEVEL: '2', NAME: 'web' },
      });
    });

    it('should substitute relation data', () => {
      const result = renderEnvironment('DB_URI: "{{pg.db_uri}}"', {
        pg: { db_uri: 'postgres://x' },
      });

      expect(result).toEqual({ ok: true, value: { DB_URI: 'postgres://x' } });
    });

    it('should render an empty template to an empty mapping', () => {
      expect(renderEnvironment('', {})).toEqual({ ok: true, value: {} });
    });

    it('should render a comment-only template to an empty mapping', () => {
      expect(renderEnvironment('# nothing yet\n', {})).toEqual({ ok: true, value: {} });
    });

    it('should coerce scalars to strings', () => {
      const result = renderEnvironment('DEBUG: true\nRATIO: 0.5\nWORKERS: 4\nEMPTY:', {});

      expect(result).toEqual({
        ok: true,
        value: { DEBUG: 'true', RATIO: '0.5', WORKERS: '4', EMPTY: '' },
      });
    });

    it('should keep variable names as written', () => {
      expect(renderEnvironment('TRUE: 1\nNULL: x\ntrue: 2\nNo: n', {})).toEqual({
        ok: true,
        value: { TRUE: '1', NULL: 'x', true: '2', No: 'n' },
      });
    });

    it('should keep every digit of long integers', () => {
      expect(renderEnvironment('ACCOUNT_ID: 12345678901234567891', {})).toEqual({
        ok: true,
        value: { ACCOUNT_ID: '12345678901234567891' },
      });
    });

    it('should keep every digit of long integers from relation data', () => {
      const result = renderEnvironment('TOKEN: {{ influxdb.id }}', {
        influxdb: { id: '98765432109876543210' },
      });

      expect(result).toEqual({ ok: true, value: { TOKEN: '98765432109876543210' } });
    });

    it('should resolve aliases to their anchored value', () => {
      expect(renderEnvironment('PORT: &port 8080\nAPP_PORT: *port', {})).toEqual({
        ok: true,
        value: { PORT: '8080', APP_PORT: '8080' },
      });
    });

    it('should give identical output for identical inputs', () => {
      const template = 'B: "{{ influxdb.hostname }}"\nA: {{ pg.db_uri }}';
      const context = { pg: { db_uri: 'postgres://x' }, influxdb: { hostname: 'influx.local' } };

      const first = renderEnvironment(template, context);
      const second = renderEnvironment(template, context);

      expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    });
  });

  describe('missing relation data', () => {
    it('should name a referenced relation that is not joined', () => {
      const result = renderEnvironment('INFLUX: {{influxdb.hostname}}', {});

      expect(result).toEqual({
        ok: false,
        error: { kind: 'MissingRelationData', relations: ['influxdb'], fields: [] },
      });
    });

    it('should block on required relations the template does not use', () => {
      const result = renderEnvironment('A: 1', {}, { requiredRelations: ['pg'] });

      expect(result).toEqual({
        ok: false,
        error: { kind: 'MissingRelationData', relations: ['pg'], fields: [] },
      });
    });

    it('should report required and referenced relations together', () => {
      const result = renderEnvironment(
        'INFLUX: {{influxdb.hostname}}',
        { logging: { url: 'http://loki' } },
        { requiredRelations: ['pg', 'influxdb'] },
      );

      expect(result).toEqual({
        ok: false,
        error: { kind: 'MissingRelationData', relations: ['influxdb', 'pg'], fields: [] },
      });
    });

    it('should name fields a joined relation has not published', () => {
      const result = renderEnvironment('RO: {{ pg.ro_uris }}', { pg: { db_uri: 'postgres://x' } });

      expect(result).toEqual({
        ok: false,
        error: { kind: 'MissingRelationData', relations: [], fields: ['pg.ro_uris'] },
      });
    });
  });

  describe('malformed templates', () => {
    it('should report substitution syntax errors before missing relations', () => {
      const result = renderEnvironment('A: {{ pg.db_uri }}\n{% if x %}', {});

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('MalformedTemplate');
      }
    });

    it('should report YAML syntax errors with a location', () => {
      const result = renderEnvironment('A: "unclosed', {});

      expect(result.ok).toBe(false);
      if (!result.ok && result.error.kind === 'MalformedTemplate') {
        expect(result.error.location?.line).toBe(1);
      } else {
        throw new Error('expected a MalformedTemplate failure');
      }
    });

    it('should reject duplicate keys', () => {
      const result = renderEnvironment('A: 1\nA: 2', {});

      expect(result.ok).toBe(false);
      if (!result.ok && result.error.kind === 'MalformedTemplate') {
        expect(result.error.message).toBe('Map keys must be unique');
      } else {
        throw new Error('expected a MalformedTemplate failure');
      }
    });

    it('should reject a collection used as a name', () => {
      expect(renderEnvironment('[A]: 1', {})).toEqual({
        ok: false,
        error: {
          kind: 'MalformedTemplate',
          message: 'environment variable names must be plain scalars',
        },
      });
    });

    it('should reject nested values', () => {
      expect(renderEnvironment('A:\n  B: 1', {})).toEqual({
        ok: false,
        error: { kind: 'MalformedTemplate', message: 'value of A must be a scalar' },
      });
    });

    it('should reject a sequence at the top level', () => {
      expect(renderEnvironment('- a\n- b', {})).toEqual({
        ok: false,
        error: {
          kind: 'MalformedTemplate',
          message: 'expected a mapping of environment variables, got a sequence',
        },
      });
    });

    it('should reject a bare scalar', () => {
      expect(renderEnvironment('just text', {})).toEqual({
        ok: false,
        error: {
          kind: 'MalformedTemplate',
          message: 'expected a mapping of environment variables, got a string',
        },
      });
    });
  });

  describe('invalid keys', () => {
    it('should name a key containing a space', () => {
      expect(renderEnvironment('MY KEY: 1', {})).toEqual({
        ok: false,
        error: { kind: 'InvalidKey', key: 'MY KEY' },
      });
    });

    it('should not return the valid part of a broken mapping', () => {
      expect(renderEnvironment('GOOD: 1\nBAD-KEY: 2', {})).toEqual({
        ok: false,
        error: { kind: 'InvalidKey', key: 'BAD-KEY' },
      });
    });
  });

  describe('isValidEnvironmentKey', () => {
    it.each([
      ['APP_NAME', true],
      ['_private1', true],
      ['1VAR', false],
      ['A-B', false],
      ['', false],
    ])('should judge %j as %s', (key, expected) => {
      expect(isValidEnvironmentKey(key)).toBe(expected);
    });
  });
});
