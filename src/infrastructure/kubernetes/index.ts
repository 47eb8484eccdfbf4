export { createDeploymentApi, type DeploymentApi } from './client';
export {
  createDeploymentWorkload,
  applyToContainer,
  toEnvVars,
  toCommand,
  toReadinessProbe,
  toHttpGet,
  type DeploymentWorkloadOptions,
} from './deployment-workload';
