/**
 * Domain Types - Unified exports
 */

export { Success, Failure, type Result } from './result';
export * from './render-errors';
export type { RelationData, RelationInstance, RelationSnapshot, RelationContext } from './relations';
export {
  ActiveStatus,
  BlockedStatus,
  MaintenanceStatus,
  type RenderedEnvironment,
  type LayerService,
  type LayerCheck,
  type WorkloadLayer,
  type UnitStatus,
} from './workload';
