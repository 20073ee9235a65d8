import * as path from 'node:path';

/**
 * Resolve `resourceId` to an absolute path and verify it stays within `projectRoot`.
 *
 * - Relative ids are resolved against `projectRoot`.
 * - Absolute ids are accepted as-is, but still validated.
 * - Throws an Error if the resolved path escapes `projectRoot` or is the root itself.
 *
 * @returns The resolved, validated absolute path.
 */
export function resolveAndValidatePath(resourceId: string, projectRoot: string): string {
  const root = path.resolve(projectRoot);
  const resolved = path.isAbsolute(resourceId)
    ? path.resolve(resourceId)
    : path.resolve(root, resourceId);

  // A resource is a file below the root, never the root itself
  if (!resolved.startsWith(root + path.sep)) {
    throw new Error(
      `Resource "${resourceId}" resolves outside the project root and cannot be accessed`,
    );
  }

  return resolved;
}
