/**
 * Workload layer construction
 */

import type { RenderedEnvironment, WorkloadLayer } from '../../domain/types';
import type { CharmConfig } from '../../config/charm-config';
import { DEFAULT_NETWORK, DEFAULT_WORKLOAD } from '../../config/defaults';

/**
 * Variables every workload gets, whatever the template says
 */
export function defaultEnvironment(appName: string, config: CharmConfig): RenderedEnvironment {
  return {
    APP_NAME: appName,
    APP_WSGI: config.app_wsgi,
    APP_PORT: String(config.external_port),
    STARTUP_COMMAND: config.startup_command,
  };
}

/**
 * Defaults first, template values on top. Keys are sorted so that equal
 * inputs always serialise identically.
 */
export function mergeEnvironment(
  defaults: RenderedEnvironment,
  rendered: RenderedEnvironment,
): RenderedEnvironment {
  const merged: RenderedEnvironment = { ...defaults, ...rendered };
  return Object.fromEntries(
    Object.keys(merged)
      .sort()
      .map((key): [string, string] => [key, merged[key]]),
  );
}

export function buildLayer(environment: RenderedEnvironment, config: CharmConfig): WorkloadLayer {
  return {
    summary: DEFAULT_WORKLOAD.summary,
    description: DEFAULT_WORKLOAD.summary,
    services: {
      [DEFAULT_WORKLOAD.serviceName]: {
        override: 'replace',
        summary: DEFAULT_WORKLOAD.serviceSummary,
        command: config.startup_command,
        startup: 'enabled',
        environment,
      },
    },
    checks: {
      [DEFAULT_WORKLOAD.checkName]: {
        override: 'replace',
        level: 'ready',
        http: { url: `http://${DEFAULT_NETWORK.loopback}:${config.external_port}` },
      },
    },
  };
}

/**
 * Flatten layers in the order they were added. A later `replace` entry
 * supersedes an earlier one of the same name; `merge` overlays its fields.
 */
export function combineLayers(layers: Iterable<WorkloadLayer>): WorkloadLayer {
  const plan: WorkloadLayer = { summary: '', description: '', services: {}, checks: {} };

  for (const layer of layers) {
    plan.summary = layer.summary;
    plan.description = layer.description;

    for (const [name, service] of Object.entries(layer.services)) {
      const current = plan.services[name];
      plan.services[name] =
        service.override === 'merge' && current
          ? {
              ...current,
              ...service,
              environment: { ...current.environment, ...service.environment },
            }
          : service;
    }
    for (const [name, check] of Object.entries(layer.checks)) {
      const current = plan.checks[name];
      plan.checks[name] = check.override === 'merge' && current ? { ...current, ...check } : check;
    }
  }

  return plan;
}
