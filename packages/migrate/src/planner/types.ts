import type { DiscoveryMode } from '@snakify/shared';
import type { SourceFile } from '../scanner/types';

/**
 * Everything that will happen to one file, computed before anything is written.
 */
export interface PlannedChange {
  file: SourceFile;
  /** Absolute path the file ends up at */
  targetPath: string;
  /** Root-relative form of `targetPath` */
  targetRelativePath: string;
  rewrittenContent: string;
  changedLines: number[];
  contentChanged: boolean;
  renamed: boolean;
}

export interface MigrationPlan {
  root: string;
  mode: DiscoveryMode;
  changes: PlannedChange[];
}
