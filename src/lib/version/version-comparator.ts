export const UNKNOWN_VERSION = 'Unknown' as const;

export type VersionValue = string;

/** (major, minor, build, revision) */
export type Version = readonly [number, number, number, number];

export type VersionOrdering = 'less' | 'equal' | 'greater';

const MAX_COMPONENTS = 4;
const DIGITS = /^\d+$/;

export class MalformedVersionError extends Error {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`malformed version "${input}": ${reason}`);
    this.name = 'MalformedVersionError';
    this.input = input;
  }
}

export function isUnknownVersion(value: string): boolean {
  return value.trim() === UNKNOWN_VERSION;
}

export function parseVersion(text: string): Version {
  const trimmed = text.trim();
  if (trimmed === UNKNOWN_VERSION) throw new MalformedVersionError(text, 'sentinel is not a version');
  if (trimmed.length === 0) throw new MalformedVersionError(text, 'empty');

  const parts = trimmed.split('.');
  if (parts.length > MAX_COMPONENTS) throw new MalformedVersionError(text, `more than ${MAX_COMPONENTS} components`);

  const components = [0, 0, 0, 0];
  parts.forEach((part, idx) => {
    if (!DIGITS.test(part)) throw new MalformedVersionError(text, `component ${idx + 1} is not numeric`);
    const n = Number(part);
    if (!Number.isSafeInteger(n)) throw new MalformedVersionError(text, `component ${idx + 1} is out of range`);
    components[idx] = n;
  });

  const [major = 0, minor = 0, build = 0, revision = 0] = components;
  return [major, minor, build, revision];
}

export function isWellFormedVersion(text: string): boolean {
  try {
    parseVersion(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Numeric, component-wise ordering. `"2.10"` sorts after `"2.9"`.
 * Throws `MalformedVersionError` for the sentinel or an unparseable string.
 */
export function compareVersions(a: string, b: string): VersionOrdering {
  const left = parseVersion(a);
  const right = parseVersion(b);

  for (let i = 0; i < MAX_COMPONENTS; i++) {
    const l = left[i] ?? 0;
    const r = right[i] ?? 0;
    if (l < r) return 'less';
    if (l > r) return 'greater';
  }
  return 'equal';
}

/** Fails closed: the sentinel and malformed strings never meet a minimum. */
export function meetsMinimum(candidate: string, minimum: string): boolean {
  if (isUnknownVersion(candidate) || isUnknownVersion(minimum)) return false;
  try {
    return compareVersions(candidate, minimum) !== 'less';
  } catch (err) {
    if (err instanceof MalformedVersionError) return false;
    throw err;
  }
}
