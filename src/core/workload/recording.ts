/**
 * In-memory workload that records layers instead of applying them.
 * Backs `reconcile --dry-run` and the operator tests.
 */

import type { WorkloadLayer } from '../../domain/types';
import type { Workload } from './workload';

export interface RecordingWorkload extends Workload {
  readonly layers: Map<string, WorkloadLayer>;
  readonly replans: number;
  connected: boolean;
}

export function createRecordingWorkload(connected = true): RecordingWorkload {
  const layers = new Map<string, WorkloadLayer>();
  let replans = 0;

  return {
    layers,
    connected,
    get replans(): number {
      return replans;
    },
    async canConnect(): Promise<boolean> {
      return this.connected;
    },
    async addLayer(label: string, layer: WorkloadLayer): Promise<void> {
      layers.set(label, layer);
    },
    async replan(): Promise<void> {
      replans++;
    },
  };
}
