/**
 * Runtime platform checks.
 */

/** Oldest Node.js release the CLI runs on (JSON module imports). */
export const MINIMUM_NODE_MAJOR = 20;
export const MINIMUM_NODE_MINOR = 11;

/** Get Node.js version info. */
export function getNodeVersionInfo(version: string = process.version): {
  version: string;
  major: number;
  minor: number;
  patch: number;
  meetsMinimum: boolean;
} {
  const bare = version.replace(/^v/, '');
  const [major = 0, minor = 0, patch = 0] = bare.split('.').map(Number);

  return {
    version: bare,
    major,
    minor,
    patch,
    meetsMinimum: major > MINIMUM_NODE_MAJOR || (major === MINIMUM_NODE_MAJOR && minor >= MINIMUM_NODE_MINOR),
  };
}
