/**
 * Snapshot Module
 */

export { SnapshotStore, generateSnapshotId } from './store';
export type { SnapshotStoreOptions, PruneOptions, RestoreOptions, SnapshotStats } from './store';
export {
  canonicalize,
  canonicalizeWriteTarget,
  isWithin,
  assertWithinRoots,
  isValidSnapshotId,
} from './path_safety';
