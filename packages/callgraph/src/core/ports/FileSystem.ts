import type { Result } from "@callmap/core";

/**
 * Port for file system reads.
 */
export interface FileSystem {
  read(filePath: string): Result<string, Error>;

  exists(filePath: string): boolean;
}
