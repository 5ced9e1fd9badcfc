/**
 * File System Interface
 *
 * Abstraction over the filesystem operations the timeline needs,
 * so scanning and output can be tested in memory.
 */

/**
 * Directory entry
 */
export interface DirectoryEntry {
  name: string;
  path: string;
  isFile: boolean;
  isDirectory: boolean;
}

export interface IFileSystem {
  /**
   * Read a file as a string
   * @param path Path to the file
   * @throws If file doesn't exist or can't be read
   */
  readFile(path: string): Promise<string>;

  /**
   * Write a file, replacing any existing content
   */
  writeFile(path: string, content: string): Promise<void>;

  /**
   * Check if a file or directory exists
   */
  exists(path: string): Promise<boolean>;

  /**
   * Check if a path is an existing directory
   */
  isDirectory(path: string): Promise<boolean>;

  /**
   * Read directory contents
   * @param path Directory path
   * @returns List of directory entries
   */
  readdir(path: string): Promise<DirectoryEntry[]>;
}
