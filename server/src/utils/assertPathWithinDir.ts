import path from 'path'

/**
 * Resolve filePath and require it to be dir itself or somewhere below it.
 * Compares whole path segments, so /data/out-2 is not inside /data/out.
 * @returns the resolved path
 * @throws Error if filePath resolves outside dir
 */
export function assertPathWithinDir(dir: string, filePath: string): string {
  const resolvedDir = path.resolve(dir)
  const resolvedPath = path.resolve(resolvedDir, filePath)
  const rel = path.relative(resolvedDir, resolvedPath)
  if (rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    throw new Error('Path must be within allowed directory')
  }
  return resolvedPath
}
