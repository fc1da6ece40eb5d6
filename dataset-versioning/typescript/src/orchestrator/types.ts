/**
 * Orchestrator inputs and results
 */

export interface InitializeDatasetInput {
  datasetId: string;
  datasetName: string;
  /** Hosting organization the repository lives in. */
  tenant: string;
  /** Bucket (and optional prefix) of the data remote, e.g. `datasets-bucket/team-a`. */
  storagePrefix: string;
  /** Local archive or single file with the initial content. */
  archivePath: string;
  /** Correlation id for logs; generated when omitted. */
  taskId?: string;
}

export interface InitializeDatasetResult {
  datasetId: string;
  repoUrl: string;
  dataRemoteUrl: string;
  commitHash: string;
  fileCount: number;
  totalSize: number;
  versionTag: 'v1';
  status: 'initialized';
}

export interface FileReference {
  /** Relative path inside `data/`. */
  name: string;
  url: string;
  /** Declared size; the recorded size is what was actually written. */
  size?: number;
}

export interface CreateVersionInput {
  datasetId: string;
  repoUrl: string;
  versionId: string;
  versionTag: string;
  commitMessage: string;
  files: FileReference[];
  taskId?: string;
}

export interface CreateVersionResult {
  versionId: string;
  versionTag: string;
  commitHash: string;
  fileCount: number;
  totalSize: number;
  skippedFiles: string[];
  status: 'completed';
}

export interface VersionSummary {
  tag: string;
  commitHash: string;
  createdAt: string;
}

export interface VersionFile {
  path: string;
  size: number;
  checksum?: string;
}

export interface VersionFileList {
  files: VersionFile[];
  totalCount: number;
  totalSize: number;
}

export interface CleanupInput {
  datasetId: string;
  tenant: string;
}

export interface CleanupResult {
  datasetId: string;
  status: 'deleted';
  /** False when the repository was already gone. */
  repoDeleted: boolean;
}
