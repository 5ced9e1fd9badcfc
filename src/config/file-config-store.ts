import type { IFileSystem } from '../ports/readers/file-system.interface';

/**
 * File-based configuration source.
 *
 * Reads a JSON object from disk. A missing or empty file is an empty
 * configuration; unreadable or corrupt JSON is reported through `warn`
 * (stderr by default) and treated as empty.
 *
 * @example
 * const store = new FileConfigStore(new NodeFileSystem(), '/path/to/timeline.json');
 * const config = await store.load();
 */
export class FileConfigStore {
  constructor(
    private readonly fs: IFileSystem,
    private readonly configPath: string,
    private readonly warn: (message: string) => void = (message) => console.error(message)
  ) {}

  async load(): Promise<Record<string, unknown>> {
    try {
      if (!(await this.fs.exists(this.configPath))) {
        return {};
      }

      const content = await this.fs.readFile(this.configPath);

      // Handle empty files
      if (!content.trim()) {
        return {};
      }

      const parsed: unknown = JSON.parse(content);
      if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        this.warn(`Ignoring config ${this.configPath}: expected a JSON object`);
        return {};
      }
      return Object.fromEntries(Object.entries(parsed));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.warn(`Failed to load config from ${this.configPath}: ${message}`);
      return {};
    }
  }
}
