/**
 * The container the operator configures.
 *
 * Implementations: the Kubernetes Deployment target in
 * infrastructure/kubernetes, and in-memory fakes in tests.
 */

import type { WorkloadLayer } from '../../domain/types';

export interface Workload {
  /** Whether the workload can be configured right now */
  canConnect(): Promise<boolean>;
  /** Record the desired layer under a label, merging over earlier ones */
  addLayer(label: string, layer: WorkloadLayer): Promise<void>;
  /** Restart services whose definition changed */
  replan(): Promise<void>;
}
