/**
 * Path Safety
 *
 * Canonicalisation and containment checks for paths read back from snapshot
 * manifests. A path is canonicalised by resolving its deepest existing
 * ancestor with realpath and re-appending the remaining segments, so `..`
 * and symlinks are resolved even for paths that no longer exist.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { PathViolationError } from '../errors';

const MAX_LINK_HOPS = 40;

/**
 * Canonical absolute form of a path that may not exist
 */
export async function canonicalize(target: string): Promise<string> {
  let current = path.resolve(target);
  const trailing: string[] = [];
  let hops = 0;

  for (;;) {
    try {
      const real = await fs.realpath(current);
      return trailing.length > 0 ? path.join(real, ...trailing.reverse()) : real;
    } catch (error) {
      if (!isMissing(error)) {
        throw error;
      }
      // A dangling symlink still decides where a write lands
      const link = hops < MAX_LINK_HOPS ? await readLinkIfSymlink(current) : undefined;
      if (link !== undefined) {
        current = path.resolve(path.dirname(current), link);
        hops++;
        continue;
      }
      const parent = path.dirname(current);
      if (parent === current) {
        return path.join(current, ...trailing.reverse());
      }
      trailing.push(path.basename(current));
      current = parent;
    }
  }
}

async function readLinkIfSymlink(target: string): Promise<string | undefined> {
  try {
    const stats = await fs.lstat(target);
    return stats.isSymbolicLink() ? await fs.readlink(target) : undefined;
  } catch (error) {
    if (isMissing(error)) {
      return undefined;
    }
    throw error;
  }
}

function isMissing(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * `candidate` equals `root` or lies below it; both must be canonical
 */
export function isWithin(candidate: string, root: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === '') {
    return true;
  }
  return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

/**
 * Where a write to `target` lands: the canonical parent directory joined
 * with the final segment, which is replaced rather than followed
 */
export async function canonicalizeWriteTarget(target: string): Promise<string> {
  const absolute = path.resolve(target);
  const parent = path.dirname(absolute);
  if (parent === absolute) {
    return absolute;
  }
  return path.join(await canonicalize(parent), path.basename(absolute));
}

/**
 * Canonicalise the write location of `target` and throw PathViolationError
 * unless it lies within one of `roots`
 */
export async function assertWithinRoots(target: string, roots: readonly string[]): Promise<string> {
  const canonical = await canonicalizeWriteTarget(target);
  const canonicalRoots = await Promise.all(roots.map(root => canonicalize(root)));

  if (!canonicalRoots.some(root => isWithin(canonical, root))) {
    throw new PathViolationError(target, roots);
  }
  return canonical;
}

/**
 * Snapshot ids are single path segments without a leading dot
 */
export function isValidSnapshotId(id: string): boolean {
  return id.length > 0 && !id.startsWith('.') && !id.includes('/') && !id.includes('\\') && !id.includes('\0');
}
