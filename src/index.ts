/**
 * mirror-publish
 *
 * Library entry point. The command-line interface lives in ./cli/index.ts.
 */

export * from './publish/index.js';
export { loadPublishConfig, remoteAddress } from './config/PublishConfig.js';
export type { PublishConfig, LoadConfigOptions } from './config/PublishConfig.js';
export { loadStableList, parseStableList, DEFAULT_STABLE_LIST_PATH } from './config/StableList.js';
export type { StableList, StableEntry } from './config/StableList.js';
export * as layout from './config/layout.js';
