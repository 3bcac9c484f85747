/**
 * Platform-agnostic file system interface
 */

export interface IFileSystem {
  /**
   * Read file contents as string
   */
  readFile(path: string, encoding?: BufferEncoding): Promise<string>;

  /**
   * Write content to file
   */
  writeFile(path: string, content: string, encoding?: BufferEncoding): Promise<void>;

  /**
   * Check if file or directory exists
   */
  exists(path: string): Promise<boolean>;

  /**
   * Create directory (recursive)
   */
  mkdir(path: string, options?: { recursive?: boolean }): Promise<void>;
}
