/**
 * Version string helpers.
 */

/** A parsed `[major, minor, patch]` triple. */
export type VersionTriple = [number, number, number]

/**
 * Parse a semver-like version string and return [major, minor, patch].
 * Returns null if unparseable.
 */
export function parseVersion(raw: string): VersionTriple | null {
  const match = /(\d+)\.(\d+)\.(\d+)/.exec(raw)
  if (!match) return null
  const major = parseInt(match[1] ?? '0', 10)
  const minor = parseInt(match[2] ?? '0', 10)
  const patch = parseInt(match[3] ?? '0', 10)
  return [major, minor, patch]
}

/**
 * Returns true if [aMajor, aMinor, aPatch] >= [bMajor, bMinor, bPatch].
 */
export function versionGte(a: VersionTriple, b: VersionTriple): boolean {
  if (a[0] !== b[0]) return a[0] > b[0]
  if (a[1] !== b[1]) return a[1] > b[1]
  return a[2] >= b[2]
}
