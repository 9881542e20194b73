export { resolve, resolveChanges } from './services/path-resolver.js';
export type { AffectedApplication, ChangeImpact } from './services/path-resolver.js';
export { loadRegistry, readDefinitions, validateEntries, DEFAULT_REGISTRY_OPTIONS } from './services/registry.js';
export type { DefinitionEntry, RegistryLoad, RegistryOptions } from './services/registry.js';
export { FsRegistrySource, MemoryRegistrySource, OverlayRegistrySource } from './services/registry-source.js';
export type { DirEntry, RegistrySource } from './services/registry-source.js';
export { isTier, parseTier, selectPolicy } from './services/policy.js';
export { renderHookJob, hookJobToYaml } from './services/hook-job.js';
export type { HookJobOptions } from './services/hook-job.js';
export { planEnvironment, checkPlan, writePlan } from './services/scaffold.js';
export type { ScaffoldPlan, ScaffoldRequest, ScaffoldSettings } from './services/scaffold.js';
export { getDisplayMessage } from './services/errors.js';
export type * from './services/errors.js';
export type * from './types/domain.js';
export type { PathwiseConfig } from './types/pathwise.js';
export { runCli } from './cli.js';
