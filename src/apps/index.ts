// Apps — manifests and the installer that wires them into the platform
export type {
  AgentManifest,
  AppManifest,
  CachePoolDeclaration,
  ManifestRoutes,
  ScheduledTaskDeclaration,
} from './types.js';
export { installManifests } from './registry.js';
export type { InstallSummary, InstallTargets } from './registry.js';
export {
  createWorkforceAcceleratorManifest,
  NOTIFICATION_TASK_NAME,
  REPORT_AGENT_ID,
  REPORT_TASK_NAME,
} from './workforce-accelerator/manifest.js';
export type { WorkforceAcceleratorDependencies } from './workforce-accelerator/manifest.js';
