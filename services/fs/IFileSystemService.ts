/**
 * File access used by the unit loader and the CLI. Synchronous, because
 * units are loaded lazily in the middle of resolution.
 */
export interface IFileSystemService {
  readFile(filePath: string): string;
  exists(filePath: string): boolean;
  isDirectory(filePath: string): boolean;
}
