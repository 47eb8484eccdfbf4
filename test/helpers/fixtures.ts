/**
 * Shared builders for unit tests
 */

import pino from 'pino';
import { createLogger, type Logger } from '../../src/lib/logger';
import type { RelationData, RelationInstance } from '../../src/domain/types';
import { parseMetadata, type CharmMetadata } from '../../src/config/metadata';

export function createTestLogger(): Logger {
  return createLogger({ name: 'test', level: 'silent' });
}

let nextRelationId = 1;

export function relation(
  name: string,
  units: Record<string, RelationData> = {},
  extra: Partial<Omit<RelationInstance, 'name' | 'units'>> = {},
): RelationInstance {
  return {
    id: extra.id ?? nextRelationId++,
    name,
    app: extra.app,
    units,
    appData: extra.appData ?? {},
    localAppData: extra.localAppData ?? {},
  };
}

export const TEST_METADATA_YAML = `
name: gunicorn-k8s
containers:
  gunicorn:
    resource: gunicorn-image
peers:
  peer:
    interface: gunicorn-peer
requires:
  pg:
    interface: pgsql
    limit: 1
  influxdb:
    interface: influxdb-api
    limit: 1
  ingress:
    interface: ingress
  mongodb_client:
    interface: mongodb_client
    limit: 1
`;

export function testMetadata(overrides: Partial<CharmMetadata> = {}): CharmMetadata {
  return { ...parseMetadata(TEST_METADATA_YAML), ...overrides };
}

export const PG_MASTER =
  'dbname=gunicorn-k8s host=10.1.1.5 password=test-secret port=5432 user=app_user';

export interface CapturedLog {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/**
 * A real pino logger writing JSON lines into memory
 */
export function createCapturingLogger(): { logger: Logger; logs: CapturedLog[] } {
  const logs: CapturedLog[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(line: string): void {
        const entry: unknown = JSON.parse(line);
        if (typeof entry === 'object' && entry !== null && 'level' in entry && 'msg' in entry) {
          logs.push({ ...entry, level: Number(entry.level), msg: String(entry.msg) });
        }
      },
    },
  );
  return { logger, logs };
}
