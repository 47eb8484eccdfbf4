export { defaultEnvironment, mergeEnvironment, buildLayer, combineLayers } from './layer';
export { createRecordingWorkload, type RecordingWorkload } from './recording';
export type { Workload } from './workload';
