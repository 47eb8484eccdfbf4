/**
 * Relation data as delivered by the orchestration framework
 */

/** A single data bag: string keys to string values */
export type RelationData = Record<string, string>;

/**
 * One established relation with a remote application
 */
export interface RelationInstance {
  id: number;
  name: string;
  /** Remote application name, when known */
  app?: string;
  /** Remote unit name -> that unit's data bag */
  units: Record<string, RelationData>;
  /** Remote application data bag */
  appData: RelationData;
  /** Our own application data bag on this relation (leader-writable) */
  localAppData: RelationData;
}

/** Relation name -> established instances of that relation */
export type RelationSnapshot = Record<string, RelationInstance[]>;

/**
 * Context handed to the renderer: relation name -> field -> value.
 * Only relations with data are present.
 */
export type RelationContext = Record<string, RelationData>;
