import * as fsPromises from 'fs/promises';
import * as path from 'path';

/**
 * Async file system access for the CLI.
 * Kept behind a class so tests can hand the CLI a stand-in.
 */
export class FileSystemService {
  /**
   * Read file contents as UTF-8 string.
   * @throws Error with code 'ENOENT' if file doesn't exist
   */
  async readFile(filePath: string): Promise<string> {
    return fsPromises.readFile(filePath, 'utf-8');
  }

  /**
   * Write string content to file (creates parent directories if needed).
   */
  async writeFile(filePath: string, content: string): Promise<void> {
    await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
    await fsPromises.writeFile(filePath, content, 'utf-8');
  }
}
