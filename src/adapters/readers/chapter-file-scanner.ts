/**
 * Chapter File Scanner
 *
 * Lists chapter files under a root directory, optionally walking
 * subdirectories. Only names the decoder accepts are returned.
 */

import type { IFileSystem } from '../../ports/readers/file-system.interface';
import type { ScannedChapterFile } from '../../types';
import { decodeChapterName } from '../../core/chapters/name-decoder';

export interface ScanOptions {
  recursive?: boolean;
}

export class ChapterFileScanner {
  constructor(private readonly fs: IFileSystem) {}

  /**
   * @param root Directory to scan
   * @throws If root is not an existing directory
   */
  async scan(root: string, options: ScanOptions = {}): Promise<ScannedChapterFile[]> {
    if (!(await this.fs.isDirectory(root))) {
      throw new Error(`Not a directory: ${root}`);
    }

    const found: ScannedChapterFile[] = [];
    await this.scanDirectory(root, [], options.recursive ?? false, found);
    return found;
  }

  private async scanDirectory(
    dirPath: string,
    folderParts: string[],
    recursive: boolean,
    found: ScannedChapterFile[]
  ): Promise<void> {
    const entries = await this.fs.readdir(dirPath);
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (entry.isFile) {
        const decoded = decodeChapterName(entry.name);
        if (decoded) {
          found.push({
            path: entry.path,
            filename: entry.name,
            relativeFolder: folderParts.join('/'),
            ...decoded,
          });
        }
      } else if (entry.isDirectory && recursive) {
        await this.scanDirectory(entry.path, [...folderParts, entry.name], recursive, found);
      }
    }
  }
}
