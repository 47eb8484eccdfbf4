/**
 * State-file model
 *
 * An OperatorModel backed by a YAML snapshot of the unit: its leadership,
 * configured values and established relations. The CLI runs single events
 * against it; writes stay in memory and can be dumped back out.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import yaml from 'yaml';
import type {
  RelationData,
  RelationInstance,
  RelationSnapshot,
  UnitStatus,
} from '../../domain/types';
import { ConfigurationError, ErrorCodes, errorMessage } from '../../lib/errors';
import type { OperatorModel } from '../../core/operator';

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform(String);
const bagSchema = z.record(scalar).default({});

const relationSchema = z.object({
  id: z.number().int().nonnegative(),
  app: z.string().optional(),
  units: z.record(bagSchema).default({}),
  'app-data': bagSchema,
  'local-app-data': bagSchema,
});

const stateSchema = z.object({
  app: z.string().min(1).optional(),
  unit: z.string().min(1).optional(),
  leader: z.boolean().default(true),
  config: z.record(z.unknown()).default({}),
  relations: z.record(z.array(relationSchema)).default({}),
});

export type UnitState = z.infer<typeof stateSchema>;

export interface StateModel extends OperatorModel {
  readonly status: UnitStatus | undefined;
}

export function parseUnitState(source: string): UnitState {
  let raw: unknown;
  try {
    raw = yaml.parse(source);
  } catch (error) {
    throw new ConfigurationError(`State file is not valid YAML: ${errorMessage(error)}`);
  }
  const parsed = stateSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`State file is invalid: ${issues}`);
  }
  return parsed.data;
}

export function loadUnitState(path: string): UnitState {
  try {
    return parseUnitState(readFileSync(path, 'utf-8'));
  } catch (error) {
    if (error instanceof ConfigurationError) throw error;
    throw new ConfigurationError(
      `Cannot read ${path}`,
      ErrorCodes.FILE_NOT_FOUND,
      { path },
      error instanceof Error ? error : undefined,
    );
  }
}

/**
 * Build a model from a parsed state. `defaultApp` names the application when
 * the state does not.
 */
export function createStateModel(state: UnitState, defaultApp: string): StateModel {
  const appName = state.app ?? defaultApp;
  const unitName = state.unit ?? `${appName}/0`;

  const relations: RelationSnapshot = {};
  for (const [name, instances] of Object.entries(state.relations)) {
    relations[name] = instances.map(
      (instance): RelationInstance => ({
        id: instance.id,
        name,
        app: instance.app,
        units: instance.units,
        appData: instance['app-data'],
        localAppData: instance['local-app-data'],
      }),
    );
  }

  let status: UnitStatus | undefined;

  return {
    appName,
    unitName,
    get status(): UnitStatus | undefined {
      return status;
    },
    isLeader: () => state.leader,
    config: () => state.config,
    relations: () => relations,
    setLocalAppData(relationName: string, relationId: number, data: RelationData): void {
      const instance = relations[relationName]?.find((r) => r.id === relationId);
      if (!instance) {
        throw new ConfigurationError(`Relation ${relationName}:${relationId} is not established`);
      }
      for (const [key, value] of Object.entries(data)) {
        if (value === '') {
          delete instance.localAppData[key];
        } else {
          instance.localAppData[key] = value;
        }
      }
    },
    setStatus(next: UnitStatus): void {
      status = next;
    },
  };
}
