export type StorageReadOptions = {
  writeIfMissing?: boolean;
};

export interface StoragePort {
  /** Parsed file contents, or `fallback` when the file is missing or not valid JSON. */
  readJson(path: string, fallback: unknown, options?: StorageReadOptions): Promise<unknown>;
  writeJson(path: string, data: unknown): Promise<void>;
  remove(path: string): Promise<void>;
}
