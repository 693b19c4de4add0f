export type VariantValue = boolean | string;

/**
 * A spec as typed on the command line, before it is matched against
 * anything installed. Every field is optional: `+debug` alone is a valid
 * anonymous spec.
 */
export interface UnresolvedSpec {
  name?: string;
  /** `1.2` (prefix match) or `1.2:1.4` (inclusive range, either side optional) */
  versions?: string;
  variants: Record<string, VariantValue>;
  compiler?: string;
  /** hash prefix given as `/abc123` */
  hash?: string;
}

export interface ResolvedPackage {
  readonly hash: string;
  /** total order: negative, zero or positive like Array.prototype.sort expects */
  compare(other: ResolvedPackage): number;
}

/** One record of the installed-package index file. */
export interface InstalledRecord {
  name: string;
  version: string;
  variants?: Record<string, VariantValue>;
  compiler?: string;
  tags?: string[];
  explicit?: boolean;
  hash?: string;
}
