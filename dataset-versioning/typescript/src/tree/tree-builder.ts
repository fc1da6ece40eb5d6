/**
 * Turns flat file listings into sorted trees and single-level listings.
 *
 * Both builders share one node arena: a map from normalized path to node.
 * Records are inserted in a single pass; missing ancestors are created on the
 * way and attached to their parent (found by map lookup) exactly once. Every
 * directory is sorted once after the pass.
 *
 * @module tree/tree-builder
 */

import { ValidationError } from '../errors/index.js';
import type {
  DirectoryItem,
  DirectoryListing,
  FileEntryType,
  FileRecord,
  FileTree,
  FileTreeNode,
} from './types.js';

/**
 * Collapses separators and `.` segments into `/a/b` form. The root is `/`.
 */
export function normalizePath(value: string): string {
  const segments = value
    .replace(/\\/g, '/')
    .split('/')
    .filter((segment) => segment.length > 0 && segment !== '.');
  return '/' + segments.join('/');
}

/**
 * Parent of a path: `undefined` for `/`, `/` for top-level entries.
 */
export function parentPathOf(value: string): string | undefined {
  const normalized = normalizePath(value);
  if (normalized === '/') return undefined;
  const index = normalized.lastIndexOf('/');
  return index === 0 ? '/' : normalized.slice(0, index);
}

function joinPath(parent: string, name: string): string {
  return parent === '/' ? `/${name}` : `${parent}/${name}`;
}

function baseName(path: string): string {
  return path === '/' ? '/' : path.slice(path.lastIndexOf('/') + 1);
}

/**
 * Directories first, then by lower-cased name.
 */
export function compareEntries(
  a: { type: FileEntryType; name: string },
  b: { type: FileEntryType; name: string }
): number {
  if (a.type !== b.type) {
    return a.type === 'directory' ? -1 : 1;
  }
  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

type RecordMetadata = Pick<FileRecord, 'checksum' | 'modifiedTime'>;

/** Marks paths as tracked regardless of what their records say. */
export type TrackedPathRule = (path: string) => boolean;

const NOTHING_TRACKED: TrackedPathRule = () => false;

class NodeArena {
  readonly root: FileTreeNode;
  totalFiles = 0;
  totalSize = 0;
  private readonly nodes = new Map<string, FileTreeNode>();
  private readonly metadata = new Map<string, RecordMetadata>();
  private readonly isTracked: TrackedPathRule;

  constructor(rootPath: string, isTracked: TrackedPathRule = NOTHING_TRACKED) {
    const path = normalizePath(rootPath);
    this.isTracked = isTracked;
    this.root = { name: baseName(path), path, type: 'directory', dvcTracked: isTracked(path), children: [] };
    this.nodes.set(path, this.root);
  }

  insert(record: FileRecord): void {
    const segments = this.relativeSegments(normalizePath(record.path));
    if (segments.length === 0) {
      if (record.type === 'file') {
        throw new ValidationError(`File record '${record.path}' collides with the root directory`);
      }
      return;
    }

    let parentPath = this.root.path;
    segments.forEach((segment, index) => {
      const path = joinPath(parentPath, segment);
      const isLeaf = index === segments.length - 1;
      const type: FileEntryType = isLeaf ? record.type : 'directory';
      const existing = this.nodes.get(path);

      if (existing) {
        if (existing.type !== type) {
          throw new ValidationError(
            isLeaf
              ? `Record '${record.path}' is listed both as a file and a directory`
              : `Record '${record.path}' is nested beneath file '${path}'`
          );
        }
        if (isLeaf && record.dvcTracked === true) markTracked(existing);
      } else {
        this.attach(parentPath, this.createNode(segment, path, type, isLeaf ? record : undefined));
      }
      parentPath = path;
    });
  }

  metadataFor(path: string): RecordMetadata | undefined {
    return this.metadata.get(path);
  }

  sortAll(): void {
    for (const node of this.nodes.values()) {
      node.children?.sort(compareEntries);
    }
  }

  /**
   * Records already carrying the root prefix are stripped of it; anything
   * else is taken as relative to the root.
   */
  private relativeSegments(path: string): string[] {
    const rootPath = this.root.path;
    let relative = path;
    if (rootPath !== '/') {
      if (path === rootPath) {
        relative = '/';
      } else if (path.startsWith(rootPath + '/')) {
        relative = path.slice(rootPath.length);
      }
    }
    return relative.split('/').filter((segment) => segment.length > 0);
  }

  private createNode(name: string, path: string, type: FileEntryType, record?: FileRecord): FileTreeNode {
    const parent = this.nodes.get(parentPathOf(path) ?? '');
    const dvcTracked = record?.dvcTracked === true || parent?.dvcTracked === true || this.isTracked(path);
    const node: FileTreeNode =
      type === 'directory' ? { name, path, type, dvcTracked, children: [] } : { name, path, type, dvcTracked };
    if (record) {
      if (record.size !== undefined) node.size = record.size;
      if (record.checksum !== undefined || record.modifiedTime !== undefined) {
        this.metadata.set(path, { checksum: record.checksum, modifiedTime: record.modifiedTime });
      }
    }
    if (type === 'file') {
      this.totalFiles++;
      this.totalSize += record?.size ?? 0;
    }
    this.nodes.set(path, node);
    return node;
  }

  private attach(parentPath: string, node: FileTreeNode): void {
    const parent = this.nodes.get(parentPath);
    if (!parent?.children) {
      throw new ValidationError(`Parent '${parentPath}' of '${node.path}' is not a directory`);
    }
    parent.children.push(node);
  }
}

/**
 * Tracked status spreads downwards: everything beneath a tracked directory is
 * tracked too.
 */
function markTracked(node: FileTreeNode): void {
  node.dvcTracked = true;
  for (const child of node.children ?? []) {
    markTracked(child);
  }
}

export interface FileTreeOptions {
  rootPath?: string;
  versionTag: string;
  isTracked?: TrackedPathRule;
}

/**
 * Builds the full tree of `records` under `rootPath`.
 */
export function buildFileTree(records: Iterable<FileRecord>, options: FileTreeOptions): FileTree {
  const arena = new NodeArena(options.rootPath ?? '/', options.isTracked);
  for (const record of records) {
    arena.insert(record);
  }
  arena.sortAll();
  return {
    versionTag: options.versionTag,
    root: arena.root,
    totalFiles: arena.totalFiles,
    totalSize: arena.totalSize,
  };
}

/**
 * Builds the one-level listing of `currentPath`. Deeper records contribute
 * their top-level directory only.
 */
export function buildDirectoryListing(
  records: Iterable<FileRecord>,
  currentPath: string,
  options: { isTracked?: TrackedPathRule } = {}
): DirectoryListing {
  const arena = new NodeArena(currentPath, options.isTracked);
  for (const record of records) {
    arena.insert(record);
  }
  arena.sortAll();

  const items: DirectoryItem[] = [];
  let totalFiles = 0;
  let totalDirectories = 0;
  let totalSize = 0;

  for (const child of arena.root.children ?? []) {
    const item: DirectoryItem = { name: child.name, path: child.path, type: child.type, dvcTracked: child.dvcTracked };
    if (child.size !== undefined) item.size = child.size;
    const metadata = arena.metadataFor(child.path);
    if (metadata?.checksum !== undefined) item.checksum = metadata.checksum;
    if (metadata?.modifiedTime !== undefined) item.modifiedTime = metadata.modifiedTime;
    items.push(item);

    if (child.type === 'directory') {
      totalDirectories++;
    } else {
      totalFiles++;
      totalSize += child.size ?? 0;
    }
  }

  const listing: DirectoryListing = {
    currentPath: arena.root.path,
    items,
    totalFiles,
    totalDirectories,
    totalSize,
  };
  const parentPath = parentPathOf(arena.root.path);
  if (parentPath !== undefined) listing.parentPath = parentPath;
  return listing;
}
