/**
 * Kubernetes Client - Direct k8s API Access
 *
 * Narrow Deployment operations on top of @kubernetes/client-node.
 */

import * as k8s from '@kubernetes/client-node';
import type { Logger } from 'pino';
import { KubernetesError, ErrorCodes, errorMessage } from '../../lib/errors';

export interface DeploymentApi {
  read: (name: string, namespace: string) => Promise<k8s.V1Deployment>;
  replace: (name: string, namespace: string, body: k8s.V1Deployment) => Promise<k8s.V1Deployment>;
}

/**
 * Create a Deployment API client from a kubeconfig file, or from the default
 * loading rules (KUBECONFIG, ~/.kube/config, in-cluster service account)
 */
export const createDeploymentApi = (logger: Logger, kubeconfigPath?: string): DeploymentApi => {
  const kc = new k8s.KubeConfig();

  if (kubeconfigPath) {
    kc.loadFromFile(kubeconfigPath);
  } else {
    kc.loadFromDefault();
  }
  logger.debug({ context: kc.getCurrentContext() }, 'Loaded kubeconfig');

  const appsApi = kc.makeApiClient(k8s.AppsV1Api);

  return {
    async read(name: string, namespace: string): Promise<k8s.V1Deployment> {
      try {
        const response = await appsApi.readNamespacedDeployment(name, namespace);
        return response.body;
      } catch (error) {
        throw new KubernetesError(
          `Failed to read deployment ${namespace}/${name}: ${errorMessage(error)}`,
          ErrorCodes.KUBERNETES_CONNECTION_FAILED,
          { name, namespace },
          error instanceof Error ? error : undefined,
        );
      }
    },

    async replace(
      name: string,
      namespace: string,
      body: k8s.V1Deployment,
    ): Promise<k8s.V1Deployment> {
      try {
        const response = await appsApi.replaceNamespacedDeployment(name, namespace, body);
        logger.info({ name, namespace }, 'Deployment updated');
        return response.body;
      } catch (error) {
        throw new KubernetesError(
          `Failed to update deployment ${namespace}/${name}: ${errorMessage(error)}`,
          ErrorCodes.KUBERNETES_APPLY_FAILED,
          { name, namespace },
          error instanceof Error ? error : undefined,
        );
      }
    },
  };
};
