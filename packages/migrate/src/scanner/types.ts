import type { ExtensionMap } from '@snakify/shared';

export interface WalkOptions {
  /** Recognized extensions; only keys are consulted here */
  extensions: ExtensionMap;
  /** gitignore-style patterns relative to the root */
  excludes?: string[];
}

export interface SourceFile {
  /** Root-relative path with forward slashes */
  path: string;
  absPath: string;
  /** Absolute directory containing the file */
  dir: string;
  /** File name without its extension */
  baseName: string;
  /** Extension including the leading dot */
  ext: string;
}
