export interface ParsedVersion {
  major: number;
  minor: number;
  patch: number;
  prerelease: string[];
}

const SEMVER_PATTERN = /^v?(\d+)\.(\d+)\.(\d+)(?:-([0-9A-Za-z.-]+))?(?:\+[0-9A-Za-z.-]+)?$/;
const EMBEDDED_SEMVER_PATTERN = /\bv?(\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?(?:\+[0-9A-Za-z.-]+)?)/;

export function parseVersion(value: string): ParsedVersion | null {
  const match = value.trim().match(SEMVER_PATTERN);
  if (!match) {
    return null;
  }

  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
    prerelease: match[4] ? match[4].split('.') : []
  };
}

export function isValidVersion(value: string): boolean {
  return parseVersion(value) !== null;
}

/**
 * Ordem semver (build metadata ignorado). Retorna `null` quando um dos lados nao e semver,
 * para que o chamador decida o fallback em vez de cair em comparacao lexicografica.
 */
export function compareVersions(left: string, right: string): number | null {
  const a = parseVersion(left);
  const b = parseVersion(right);
  if (!a || !b) {
    return null;
  }

  if (a.major !== b.major) {
    return a.major - b.major;
  }
  if (a.minor !== b.minor) {
    return a.minor - b.minor;
  }
  if (a.patch !== b.patch) {
    return a.patch - b.patch;
  }

  if (a.prerelease.length === 0 && b.prerelease.length > 0) {
    return 1;
  }
  if (a.prerelease.length > 0 && b.prerelease.length === 0) {
    return -1;
  }

  const size = Math.max(a.prerelease.length, b.prerelease.length);
  for (let i = 0; i < size; i += 1) {
    const leftId = a.prerelease[i];
    const rightId = b.prerelease[i];
    if (leftId === undefined) {
      return -1;
    }
    if (rightId === undefined) {
      return 1;
    }
    if (leftId === rightId) {
      continue;
    }

    const leftNum = /^\d+$/.test(leftId) ? Number(leftId) : null;
    const rightNum = /^\d+$/.test(rightId) ? Number(rightId) : null;
    if (leftNum !== null && rightNum !== null) {
      return leftNum - rightNum;
    }
    if (leftNum !== null) {
      return -1;
    }
    if (rightNum !== null) {
      return 1;
    }
    return leftId < rightId ? -1 : 1;
  }

  return 0;
}

export function isSameVersion(left: string, right: string): boolean {
  const compared = compareVersions(left, right);
  return compared === null ? left.trim() === right.trim() : compared === 0;
}

export function isNewerVersion(candidate: string, current: string): boolean {
  const compared = compareVersions(candidate, current);
  if (compared === null) {
    return candidate.trim() !== current.trim();
  }

  return compared > 0;
}

export function maxVersion(versions: string[]): string | null {
  let best: string | null = null;
  for (const version of versions) {
    if (!isValidVersion(version)) {
      continue;
    }
    if (best === null || (compareVersions(version, best) ?? 0) > 0) {
      best = version;
    }
  }

  return best;
}

export function sortVersionsDescending<T>(items: T[], pick: (item: T) => string): T[] {
  return items.slice().sort((left, right) => compareVersions(pick(right), pick(left)) ?? 0);
}

/** Extrai o primeiro token semver de uma saida como `fleet-agent 1.2.3 (abc123)`. */
export function extractVersion(output: string): string | null {
  for (const raw of output.split('\n')) {
    const line = raw.trim();
    if (!line) {
      continue;
    }
    const match = line.match(EMBEDDED_SEMVER_PATTERN);
    if (match?.[1]) {
      return match[1];
    }
  }

  return null;
}
