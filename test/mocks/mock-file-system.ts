/**
 * Mock File System
 *
 * In-memory file system for testing without touching real files.
 * Paths are POSIX-style and absolute.
 */

import type {
  IFileSystem,
  DirectoryEntry,
} from '../../src/ports/readers/file-system.interface';

export class MockFileSystem implements IFileSystem {
  private files: Map<string, string> = new Map();
  private directories: Set<string> = new Set(['/']);

  // === Setup Methods (for tests) ===

  /**
   * Add a file to the mock filesystem (parent directories are created)
   */
  addFile(path: string, content = ''): void {
    this.files.set(path, content);
    this.ensureParentDirs(path);
  }

  /**
   * Add several empty files at once
   */
  addFiles(...paths: string[]): void {
    for (const path of paths) {
      this.addFile(path);
    }
  }

  addDirectory(path: string): void {
    this.directories.add(path);
    this.ensureParentDirs(path);
  }

  /**
   * Get all files (for assertions)
   */
  getFiles(): Map<string, string> {
    return new Map(this.files);
  }

  private ensureParentDirs(path: string): void {
    const parts = path.split('/').filter(Boolean);
    let current = '';
    for (let i = 0; i < parts.length - 1; i++) {
      current += '/' + parts[i];
      this.directories.add(current);
    }
  }

  // === IFileSystem Implementation ===

  async readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) {
      throw new Error(`ENOENT: no such file or directory, open '${path}'`);
    }
    return content;
  }

  async writeFile(path: string, content: string): Promise<void> {
    this.addFile(path, content);
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path) || this.directories.has(path);
  }

  async isDirectory(path: string): Promise<boolean> {
    return this.directories.has(path);
  }

  async readdir(path: string): Promise<DirectoryEntry[]> {
    if (!this.directories.has(path)) {
      throw new Error(`ENOENT: no such file or directory, scandir '${path}'`);
    }

    const entries: DirectoryEntry[] = [];
    const prefix = path.endsWith('/') ? path : path + '/';

    for (const filePath of this.files.keys()) {
      const relativePath = filePath.slice(prefix.length);
      if (filePath.startsWith(prefix) && !relativePath.includes('/')) {
        entries.push({ name: relativePath, path: filePath, isFile: true, isDirectory: false });
      }
    }

    for (const dirPath of this.directories) {
      const relativePath = dirPath.slice(prefix.length);
      if (dirPath.startsWith(prefix) && dirPath !== path && !relativePath.includes('/')) {
        entries.push({ name: relativePath, path: dirPath, isFile: false, isDirectory: true });
      }
    }

    return entries;
  }
}
