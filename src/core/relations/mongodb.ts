/**
 * MongoDB relation adapter
 *
 * Credentials arrive in the provider's application bag on the
 * `mongodb_client` relation. Only the leader sees the event that creates
 * them, so it copies them into the peer relation where every unit reads
 * them back under the `mongodb` template namespace.
 */

import type { RelationData } from '../../domain/types';

export const MONGODB_NAMESPACE = 'mongodb';

const PEER_KEYS = {
  database: 'mongodb-database',
  username: 'mongodb-username',
  password: 'mongodb-password',
  endpoints: 'mongodb-endpoints',
} as const;

export interface MongodbCredentials {
  database: string;
  username: string;
  password: string;
  endpoints: string;
}

/**
 * Credentials published by the provider, once it has created the database
 */
export function mongodbCredentials(
  providerAppData: RelationData,
  database: string,
): MongodbCredentials | undefined {
  const { username, password } = providerAppData;
  if (!username || !password) {
    return undefined;
  }
  return {
    database: providerAppData.database || database,
    username,
    password,
    endpoints: providerAppData.endpoints ?? '',
  };
}

/**
 * Peer bag entries carrying the credentials
 */
export function toPeerData(credentials: MongodbCredentials): RelationData {
  return {
    [PEER_KEYS.database]: credentials.database,
    [PEER_KEYS.username]: credentials.username,
    [PEER_KEYS.password]: credentials.password,
    [PEER_KEYS.endpoints]: credentials.endpoints,
  };
}

/**
 * Template fields for the `mongodb` namespace, read from the peer bag
 */
export function mongodbFieldsFromPeer(peerAppData: RelationData): RelationData | undefined {
  if (!peerAppData[PEER_KEYS.database]) {
    return undefined;
  }
  return {
    database: peerAppData[PEER_KEYS.database],
    username: peerAppData[PEER_KEYS.username] ?? '',
    password: peerAppData[PEER_KEYS.password] ?? '',
    endpoints: peerAppData[PEER_KEYS.endpoints] ?? '',
  };
}

/**
 * Whether the peer bag already holds these credentials
 */
export function peerHasCredentials(peerAppData: RelationData, credentials: MongodbCredentials): boolean {
  const expected = toPeerData(credentials);
  return Object.entries(expected).every(([key, value]) => peerAppData[key] === value);
}
