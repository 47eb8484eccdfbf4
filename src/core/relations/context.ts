/**
 * Relation Context
 *
 * Builds the renderer context from the relations currently established.
 * Adapters normalise structured relations into flat string bags first;
 * raw relation data is layered on top under the relation's own name.
 */

import type { Logger } from 'pino';
import type {
  RelationContext,
  RelationData,
  RelationInstance,
  RelationSnapshot,
} from '../../domain/types';
import { errorMessage } from '../../lib/errors';
import { RELATION_NAMES } from '../../config/defaults';
import { postgresqlFields } from './postgresql';
import { MONGODB_NAMESPACE, mongodbFieldsFromPeer } from './mongodb';

export interface RelationContextOptions {
  /** Database name requested from database providers */
  database: string;
  unitName: string;
  /** Peer relation carrying leader-shared data */
  peerRelation?: string;
}

/**
 * First instance of a relation, warning when there are several
 */
export function primaryInstance(
  instances: RelationInstance[] | undefined,
  logger: Logger,
): RelationInstance | undefined {
  const [first] = instances ?? [];
  if (first && instances && instances.length > 1) {
    logger.warn(
      { relation: first.name, relationId: first.id, count: instances.length },
      'Multiple relations of the same name, using only the first one for relation data',
    );
  }
  return first;
}

/**
 * Data bag of the first unit by name, so the choice is stable across events
 */
export function primaryUnitData(instance: RelationInstance, logger: Logger): RelationData | undefined {
  const unitNames = Object.keys(instance.units).sort();
  const [unit] = unitNames;
  if (unit === undefined) {
    return undefined;
  }
  if (unitNames.length > 1) {
    logger.warn(
      { relation: instance.name, relationId: instance.id, unit },
      'Multiple units in the relation, using only the first one for relation data',
    );
  }
  return instance.units[unit];
}

function adapterFields(
  relations: RelationSnapshot,
  options: RelationContextOptions,
  logger: Logger,
): RelationContext {
  const context: RelationContext = {};

  const pg = primaryInstance(relations[RELATION_NAMES.postgresql], logger);
  const pgData = pg ? primaryUnitData(pg, logger) : undefined;
  if (pgData) {
    try {
      const fields = postgresqlFields(pgData, {
        database: options.database,
        unitName: options.unitName,
      });
      if (fields) {
        context[RELATION_NAMES.postgresql] = fields;
      }
    } catch (error) {
      logger.warn(
        { relation: RELATION_NAMES.postgresql, error: errorMessage(error) },
        'Ignoring unparseable PostgreSQL connection data',
      );
    }
  }

  const peer = options.peerRelation
    ? primaryInstance(relations[options.peerRelation], logger)
    : undefined;
  if (peer) {
    const fields = mongodbFieldsFromPeer(peer.localAppData);
    if (fields) {
      context[MONGODB_NAMESPACE] = fields;
    }
  }

  return context;
}

/**
 * Build the template context: relation name -> field -> value.
 *
 * Relations without any data are left out, so the renderer treats them as
 * not joined.
 */
export function buildRelationContext(
  relations: RelationSnapshot,
  options: RelationContextOptions,
  logger: Logger,
): RelationContext {
  const context = adapterFields(relations, options, logger);

  for (const name of Object.keys(relations).sort()) {
    const instance = primaryInstance(relations[name], logger);
    if (!instance) continue;

    const data = primaryUnitData(instance, logger);
    if (!data) continue;

    context[name] = { ...context[name], ...data };
  }

  for (const name of Object.keys(context)) {
    if (Object.keys(context[name]).length === 0) {
      delete context[name];
    }
  }

  return context;
}
