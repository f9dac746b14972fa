// ─── Schemas ────────────────────────────────────────────────────
export { platformEnvSchema } from './schema.js';
export type { PlatformEnv } from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export { ConfigError, loadPlatformConfig } from './loader.js';
export type { PlatformConfig } from './loader.js';
