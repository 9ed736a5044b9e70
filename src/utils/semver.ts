interface ParsedVersion {
  core: number[];
  prerelease: string[];
}

function parseVersion(version: string): ParsedVersion {
  const withoutBuild = version.trim().replace(/^v/, '').split('+')[0];
  const dash = withoutBuild.indexOf('-');
  const core = dash === -1 ? withoutBuild : withoutBuild.slice(0, dash);
  const prerelease = dash === -1 ? [] : withoutBuild.slice(dash + 1).split('.');
  return {
    core: core.split('.').map((part) => {
      const n = Number.parseInt(part, 10);
      return Number.isNaN(n) ? 0 : n;
    }),
    prerelease,
  };
}

function compareIdentifiers(a: string, b: string): number {
  const aNumeric = /^\d+$/.test(a);
  const bNumeric = /^\d+$/.test(b);
  if (aNumeric && bNumeric) return Math.sign(Number(a) - Number(b));
  // Numeric identifiers rank below alphanumeric ones
  if (aNumeric) return -1;
  if (bNumeric) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Compare two semantic versions.
 * Returns: 1 if a > b, -1 if a < b, 0 if equal
 */
export function compareSemver(a: string, b: string): number {
  const left = parseVersion(a);
  const right = parseVersion(b);

  for (let i = 0; i < Math.max(left.core.length, right.core.length, 3); i++) {
    const numA = left.core[i] ?? 0;
    const numB = right.core[i] ?? 0;
    if (numA > numB) return 1;
    if (numA < numB) return -1;
  }

  if (left.prerelease.length === 0 || right.prerelease.length === 0) {
    // 1.0.0 > 1.0.0-rc.1
    return Math.sign(right.prerelease.length - left.prerelease.length);
  }

  for (let i = 0; i < Math.max(left.prerelease.length, right.prerelease.length); i++) {
    const idA = left.prerelease[i];
    const idB = right.prerelease[i];
    if (idA === undefined) return -1;
    if (idB === undefined) return 1;
    const cmp = compareIdentifiers(idA, idB);
    if (cmp !== 0) return cmp;
  }
  return 0;
}
