export type * from './types.js';

export {
  IdentityTagStore,
  SYSTEM_FOLDER_NAME,
  TAG_FILE_NAME,
  decodeIdentityTag,
  encodeIdentityTag,
} from './service/identity-tags.js';
export { Reconciler } from './service/reconciler.js';
export { TreeReplicator } from './service/replicator.js';
export { ReplicationPlanner, assignLogicalNames } from './service/planner.js';
export { formatRunSummary } from './service/summary.js';
