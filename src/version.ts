/**
 * cmdgate Version Information
 *
 * The version follows Semantic Versioning (semver.org).
 */

export const VERSION = '0.4.0';

export const VERSION_INFO = {
  major: 0,
  minor: 4,
  patch: 0,
  prerelease: null as string | null,
} as const;

/**
 * Get the full version string
 */
export function getVersion(): string {
  let version = `${VERSION_INFO.major}.${VERSION_INFO.minor}.${VERSION_INFO.patch}`;

  if (VERSION_INFO.prerelease) {
    version += `-${VERSION_INFO.prerelease}`;
  }

  return version;
}
