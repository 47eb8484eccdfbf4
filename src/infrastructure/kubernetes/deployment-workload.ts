/**
 * Deployment-backed workload
 *
 * Applies the combined layer to one container of a Deployment: its
 * environment, command and readiness probe. Kubernetes rolls the pods when
 * the template changes, which is what `replan` amounts to here.
 */

import type {
  V1Container,
  V1Deployment,
  V1EnvVar,
  V1HTTPGetAction,
  V1Probe,
} from '@kubernetes/client-node';
import type { Logger } from 'pino';
import type { LayerCheck, LayerService, WorkloadLayer } from '../../domain/types';
import { combineLayers, type Workload } from '../../core/workload';
import { DEFAULT_WORKLOAD } from '../../config/defaults';
import { ConfigurationError, KubernetesError, ErrorCodes, errorMessage } from '../../lib/errors';
import type { DeploymentApi } from './client';

export interface DeploymentWorkloadOptions {
  namespace: string;
  deployment: string;
  container: string;
}

export function toEnvVars(environment: Record<string, string> = {}): V1EnvVar[] {
  return Object.keys(environment)
    .sort()
    .map((name) => ({ name, value: environment[name] }));
}

/**
 * Container command from a service command line. Words split on whitespace;
 * single quotes keep their text as is, double quotes and backslashes escape
 * the way a POSIX shell does.
 */
export function toCommand(command: string): string[] {
  const words: string[] = [];
  let word: string | undefined;
  let quote: "'" | '"' | undefined;

  for (let i = 0; i < command.length; i++) {
    const char = command[i];

    if (quote === "'") {
      if (char === "'") quote = undefined;
      else word = (word ?? '') + char;
      continue;
    }
    if (quote === '"') {
      if (char === '"') {
        quote = undefined;
      } else if (char === '\\' && i + 1 < command.length && '"\\$`'.includes(command[i + 1])) {
        word = (word ?? '') + command[++i];
      } else {
        word = (word ?? '') + char;
      }
      continue;
    }

    if (/\s/.test(char)) {
      if (word !== undefined) words.push(word);
      word = undefined;
    } else if (char === "'" || char === '"') {
      quote = char;
      word = word ?? '';
    } else if (char === '\\' && i + 1 < command.length) {
      word = (word ?? '') + command[++i];
    } else {
      word = (word ?? '') + char;
    }
  }

  if (quote) {
    throw new ConfigurationError(`Unterminated ${quote} quote in command: ${command}`);
  }
  if (word !== undefined) words.push(word);
  return words;
}

export function toHttpGet(check: LayerCheck): V1HTTPGetAction {
  const url = new URL(check.http.url);
  const port = url.port ? Number(url.port) : url.protocol === 'https:' ? 443 : 80;
  return {
    path: url.pathname || '/',
    port,
    scheme: url.protocol === 'https:' ? 'HTTPS' : 'HTTP',
  };
}

export function toReadinessProbe(check: LayerCheck): V1Probe {
  return { httpGet: toHttpGet(check) };
}

/**
 * Write the service and check into the container. Returns whether anything changed.
 */
export function applyToContainer(
  container: V1Container,
  service: LayerService,
  check: LayerCheck | undefined,
): boolean {
  const before = JSON.stringify([container.env, container.command, container.readinessProbe]);

  container.env = toEnvVars(service.environment);
  container.command = toCommand(service.command);
  if (check) {
    // Timings and thresholds defaulted by the API server stay as they are
    const current = container.readinessProbe;
    container.readinessProbe = {
      ...current,
      httpGet: { ...current?.httpGet, ...toHttpGet(check) },
    };
  }

  return JSON.stringify([container.env, container.command, container.readinessProbe]) !== before;
}

export function createDeploymentWorkload(
  api: DeploymentApi,
  options: DeploymentWorkloadOptions,
  logger: Logger,
): Workload {
  const log = logger.child({ component: 'DeploymentWorkload', ...options });
  const layers = new Map<string, WorkloadLayer>();

  return {
    async canConnect(): Promise<boolean> {
      try {
        await api.read(options.deployment, options.namespace);
        return true;
      } catch (error) {
        log.debug({ error: errorMessage(error) }, 'Deployment not reachable');
        return false;
      }
    },

    async addLayer(label: string, layer: WorkloadLayer): Promise<void> {
      layers.set(label, layer);
    },

    async replan(): Promise<void> {
      const plan = combineLayers(layers.values());
      const service = plan.services[DEFAULT_WORKLOAD.serviceName];
      if (!service) {
        log.debug('No service in plan, nothing to apply');
        return;
      }

      const deployment: V1Deployment = await api.read(options.deployment, options.namespace);
      const container = deployment.spec?.template.spec?.containers.find(
        (c) => c.name === options.container,
      );
      if (!container) {
        throw new KubernetesError(
          `Container ${options.container} not found in deployment ${options.namespace}/${options.deployment}`,
          ErrorCodes.CONTAINER_NOT_FOUND,
          { ...options },
        );
      }

      const readyCheck = Object.values(plan.checks).find((check) => check.level === 'ready');
      if (!applyToContainer(container, service, readyCheck)) {
        log.debug('Deployment already matches the plan');
        return;
      }

      await api.replace(options.deployment, options.namespace, deployment);
    },
  };
}
