import { readFile, writeFile } from 'node:fs/promises';

/**
 * The file operations the pipeline and the patcher perform. Tests pass an
 * in-memory implementation.
 */
export interface FileSystem {
  /**
   * @throws When the file does not exist or cannot be read.
   */
  readFile(path: string): Promise<string>;

  writeFile(path: string, contents: string): Promise<void>;
}

export const nodeFileSystem: FileSystem = {
  readFile: path => readFile(path, 'utf8'),
  writeFile: (path, contents) => writeFile(path, contents, 'utf8')
};
