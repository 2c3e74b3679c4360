export * from './errors.js';
export * from './types.js';
export { AliasManager, makeRedirect, writeRedirectFile } from './AliasManager.js';
export type { AliasResult } from './AliasManager.js';
export { collectArtifacts, resolveDiskImage } from './ArtifactCollector.js';
export { createExecRunner } from './CommandRunner.js';
export type { CommandRunner, CommandResult } from './CommandRunner.js';
export { CreaterepoIndexer, RepoDataGenerator } from './RepoDataGenerator.js';
export type { MetadataIndexer, RepoDataResult } from './RepoDataGenerator.js';
export {
  SyncEngine,
  autoApproveGate,
  evaluateFilter,
  metadataFilterMatches,
  summarizeOutput,
  METADATA_FILTER,
  CONTENT_FILTER,
} from './SyncEngine.js';
export type {
  ConfirmationGate,
  GateDecision,
  SyncDirection,
  SyncOutcome,
  SyncPlanSummary,
} from './SyncEngine.js';
export { TreeAssembler } from './TreeAssembler.js';
export { extractRelease, parseReleaseTag } from './VersionExtractor.js';
export { runPublish, resolveMode, checkBuildInputs } from './PublishPipeline.js';
export type {
  BuildInputs,
  PublishMode,
  PublishRequest,
  PublishResult,
  PublishDependencies,
} from './PublishPipeline.js';
