/**
 * Workload layer types
 *
 * The layer is the desired state of the workload container: one gunicorn
 * service and its readiness check.
 */

export type RenderedEnvironment = Record<string, string>;

export interface LayerService {
  override: 'replace' | 'merge';
  summary: string;
  command: string;
  startup: 'enabled' | 'disabled';
  environment?: RenderedEnvironment;
}

export interface LayerCheck {
  override: 'replace' | 'merge';
  level: 'alive' | 'ready';
  http: { url: string };
}

export interface WorkloadLayer {
  summary: string;
  description: string;
  services: Record<string, LayerService>;
  checks: Record<string, LayerCheck>;
}

/**
 * Unit status reported back to the operator framework
 */
export type UnitStatus =
  | { name: 'active'; message: string }
  | { name: 'blocked'; message: string }
  | { name: 'maintenance'; message: string }
  | { name: 'waiting'; message: string };

export const ActiveStatus = (message = ''): UnitStatus => ({ name: 'active', message });
export const BlockedStatus = (message: string): UnitStatus => ({ name: 'blocked', message });
export const MaintenanceStatus = (message: string): UnitStatus => ({
  name: 'maintenance',
  message,
});
