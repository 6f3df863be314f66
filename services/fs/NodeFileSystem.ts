import * as fs from 'fs';
import type { IFileSystemService } from './IFileSystemService';

/**
 * Node.js file system implementation
 */
export class NodeFileSystem implements IFileSystemService {
  readFile(filePath: string): string {
    return fs.readFileSync(filePath, 'utf-8');
  }

  exists(filePath: string): boolean {
    return fs.existsSync(filePath);
  }

  isDirectory(filePath: string): boolean {
    return fs.existsSync(filePath) && fs.statSync(filePath).isDirectory();
  }
}
