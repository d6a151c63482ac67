/**
 * Read-only file access used by static file routes. Paths are whatever
 * the route was configured with; no root or traversal checks happen here.
 */

export interface IFileStat {
  size: number
  mtime: Date
  isDirectory: boolean
  isFile: boolean
}

export interface IFileSystem {
  /** Get file statistics. Rejects if the path does not exist. */
  stat(path: string): Promise<IFileStat>

  /** Check if a path exists. */
  exists(path: string): Promise<boolean>

  /** Read a whole file. */
  readFile(path: string): Promise<Uint8Array>
}
