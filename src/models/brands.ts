/**
 * Branded types to prevent string mixing
 * Using nominal typing pattern for type safety
 */

export declare const brand: unique symbol;

export type Brand<T, TBrand extends string> = T & { readonly [brand]: TBrand };

export type RunId = Brand<string, 'RunId'>;
export type TagRef = Brand<string, 'TagRef'>;
export type ArtifactName = Brand<string, 'ArtifactName'>;

// Asset names travel into URLs and file paths
const ARTIFACT_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._+-]*$/;

export function isArtifactName(value: unknown): value is ArtifactName {
  return typeof value === 'string' && ARTIFACT_NAME_PATTERN.test(value);
}

export function asArtifactName(value: string): ArtifactName {
  if (!isArtifactName(value)) {
    throw new Error(`Invalid artifact name: ${value}`);
  }
  return value;
}

/**
 * A bare tag name or `refs/tags/<name>`. Other refs, such as the
 * `refs/heads/main` of a branch push, are not tags.
 */
export function isTagRef(value: unknown): value is TagRef {
  if (typeof value !== 'string' || value.trim().length === 0 || /\s/.test(value)) {
    return false;
  }
  if (value.startsWith('refs/')) {
    return value.startsWith('refs/tags/') && value.length > 'refs/tags/'.length;
  }
  return true;
}

export function asTagRef(value: string): TagRef {
  if (!isTagRef(value)) {
    throw new Error(`Invalid tag ref: ${JSON.stringify(value)}`);
  }
  return value;
}

export function isRunId(value: unknown): value is RunId {
  return typeof value === 'string' && /^run_[a-z0-9_]+$/.test(value);
}

export function asRunId(value: string): RunId {
  if (!isRunId(value)) {
    throw new Error(`Invalid RunId: ${value}`);
  }
  return value;
}

/**
 * Bare tag name as release hosts key it (`refs/tags/v1.2.3` -> `v1.2.3`)
 */
export function tagName(tagRef: TagRef): string {
  return tagRef.startsWith('refs/tags/') ? tagRef.slice('refs/tags/'.length) : tagRef;
}
