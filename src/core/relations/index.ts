export { buildRelationContext, primaryInstance, primaryUnitData, type RelationContextOptions } from './context';
export {
  parseConnectionString,
  connectionUri,
  postgresqlFields,
  type ConnectionParameters,
  type PostgresqlAdapterOptions,
} from './postgresql';
export {
  MONGODB_NAMESPACE,
  mongodbCredentials,
  mongodbFieldsFromPeer,
  peerHasCredentials,
  toPeerData,
  type MongodbCredentials,
} from './mongodb';
export { ingressRequirements, toIngressData, type IngressRequirements } from './ingress';
