/**
 * Operator framework seams
 */

import type { RelationData, RelationSnapshot, UnitStatus } from '../../domain/types';

/**
 * What the operator framework exposes about this unit and its relations
 */
export interface OperatorModel {
  readonly appName: string;
  readonly unitName: string;
  isLeader(): boolean;
  /** Configured option values, before defaults */
  config(): Record<string, unknown>;
  /** Relations established right now */
  relations(): RelationSnapshot;
  /** Merge into our application bag on a relation; an empty value deletes the key */
  setLocalAppData(relationName: string, relationId: number, data: RelationData): void;
  setStatus(status: UnitStatus): void;
}

export type RelationEventType = 'relation-joined' | 'relation-changed' | 'relation-departed';

export type OperatorEvent =
  | { type: 'config-changed' }
  | { type: 'workload-ready' }
  | { type: RelationEventType; relation: string; relationId: number };
