import type { FileSystem } from '../file-system';

type FailingOperation = 'read' | 'write';

/**
 * In-memory {@link FileSystem} recording every write.
 */
export class MemoryFileSystem implements FileSystem {
  readonly files: Map<string, string>;

  /**
   * Paths in write order (one entry per write).
   */
  readonly writes: string[] = [];

  private readonly failures = new Map<string, FailingOperation>();

  constructor(initial: Record<string, string> = {}) {
    this.files = new Map(Object.entries(initial));
  }

  /**
   * Makes the next and all later `operation`s on `path` reject.
   */
  failOn(path: string, operation: FailingOperation): void {
    this.failures.set(path, operation);
  }

  async readFile(path: string): Promise<string> {
    if (this.failures.get(path) === 'read') {
      throw new Error(`EACCES: permission denied, open '${path}'`);
    }

    const contents = this.files.get(path);
    if (contents === undefined) {
      throw new Error(`ENOENT: no such file or directory, open '${path}'`);
    }
    return contents;
  }

  async writeFile(path: string, contents: string): Promise<void> {
    if (this.failures.get(path) === 'write') {
      throw new Error(`EACCES: permission denied, open '${path}'`);
    }

    this.files.set(path, contents);
    this.writes.push(path);
  }

  read(path: string): string {
    const contents = this.files.get(path);
    if (contents === undefined) throw new Error(`No file at ${path}`);
    return contents;
  }
}
