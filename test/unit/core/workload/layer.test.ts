import { describe, it, expect } from '@jest/globals';
import {
  buildLayer,
  combineLayers,
  defaultEnvironment,
  mergeEnvironment,
} from '../../../../src/core/workload/layer';
import { charmConfigSchema } from '../../../../src/config/charm-config';
import type { WorkloadLayer } from '../../../../src/domain/types';

const config = charmConfigSchema.parse({});

describe('workload layer', () => {
  it('should provide the built-in environment from config', () => {
    expect(defaultEnvironment('gunicorn-k8s', config)).toEqual({
      APP_NAME: 'gunicorn-k8s',
      APP_WSGI: 'app:app',
      APP_PORT: '8080',
      STARTUP_COMMAND: '/srv/gunicorn/run',
    });
  });

  it('should follow configured port and command', () => {
    const custom = charmConfigSchema.parse({ external_port: 9000, startup_command: '/srv/run --fast' });

    expect(defaultEnvironment('web', custom)).toMatchObject({
      APP_PORT: '9000',
      STARTUP_COMMAND: '/srv/run --fast',
    });
  });

  it('should let template values override defaults and sort the keys', () => {
    const merged = mergeEnvironment(
      { APP_NAME: 'web', APP_WSGI: 'app:app' },
      { DB_URI: 'postgres://x', APP_WSGI: 'site.wsgi:application' },
    );

    expect(merged).toEqual({
      APP_NAME: 'web',
      APP_WSGI: 'site.wsgi:application',
      DB_URI: 'postgres://x',
    });
    expect(Object.keys(merged)).toEqual(['APP_NAME', 'APP_WSGI', 'DB_URI']);
  });

  it('should build a layer with one service and a readiness check', () => {
    expect(buildLayer({ APP_NAME: 'web' }, config)).toEqual({
      summary: 'gunicorn layer',
      description: 'gunicorn layer',
      services: {
        gunicorn: {
          override: 'replace',
          summary: 'gunicorn service',
          command: '/srv/gunicorn/run',
          startup: 'enabled',
          environment: { APP_NAME: 'web' },
        },
      },
      checks: {
        'gunicorn-ready': {
          override: 'replace',
          level: 'ready',
          http: { url: 'http://127.0.0.1:8080' },
        },
      },
    });
  });

  describe('combineLayers', () => {
    const base = buildLayer({ A: '1', B: '2' }, config);

    it('should let a later replace layer supersede the service', () => {
      const next = buildLayer({ C: '3' }, config);

      expect(combineLayers([base, next]).services.gunicorn.environment).toEqual({ C: '3' });
    });

    it('should overlay a merge layer on the earlier service', () => {
      const overlay: WorkloadLayer = {
        summary: 'overlay',
        description: 'overlay',
        services: {
          gunicorn: {
            override: 'merge',
            summary: 'gunicorn service',
            command: '/srv/other',
            startup: 'enabled',
            environment: { B: 'two' },
          },
        },
        checks: {},
      };

      const plan = combineLayers([base, overlay]);

      expect(plan.summary).toBe('overlay');
      expect(plan.services.gunicorn.command).toBe('/srv/other');
      expect(plan.services.gunicorn.environment).toEqual({ A: '1', B: 'two' });
      expect(plan.checks['gunicorn-ready']).toEqual(base.checks['gunicorn-ready']);
    });
  });
});
