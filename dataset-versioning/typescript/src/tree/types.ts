/**
 * File tree types
 */

export type FileEntryType = 'file' | 'directory';

/**
 * One entry of a flat listing.
 */
export interface FileRecord {
  path: string;
  type: FileEntryType;
  size?: number;
  checksum?: string;
  modifiedTime?: Date;
  /** Content lives in the data remote rather than in git. */
  dvcTracked?: boolean;
}

/**
 * Directories always carry `children` (possibly empty); files never do.
 */
export interface FileTreeNode {
  name: string;
  path: string;
  type: FileEntryType;
  size?: number;
  dvcTracked: boolean;
  children?: FileTreeNode[];
}

export interface FileTree {
  versionTag: string;
  root: FileTreeNode;
  totalFiles: number;
  totalSize: number;
}

export interface DirectoryItem {
  name: string;
  path: string;
  type: FileEntryType;
  size?: number;
  checksum?: string;
  modifiedTime?: Date;
  dvcTracked: boolean;
}

export interface DirectoryListing {
  currentPath: string;
  parentPath?: string;
  items: DirectoryItem[];
  totalFiles: number;
  totalDirectories: number;
  totalSize: number;
}
