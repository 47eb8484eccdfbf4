/**
 * Ingress requirements published to the ingress controller
 */

import type { RelationData } from '../../domain/types';

export interface IngressRequirements {
  serviceHostname: string;
  serviceName: string;
  servicePort: number;
}

/**
 * The hostname falls back to the application name when not configured
 */
export function ingressRequirements(
  appName: string,
  externalHostname: string,
  externalPort: number,
): IngressRequirements {
  return {
    serviceHostname: externalHostname || appName,
    serviceName: appName,
    servicePort: externalPort,
  };
}

export function toIngressData(requirements: IngressRequirements): RelationData {
  return {
    'service-hostname': requirements.serviceHostname,
    'service-name': requirements.serviceName,
    'service-port': String(requirements.servicePort),
  };
}
