export interface WriteTextOptions {
  readonly mode?: number;
}

export interface FileSystemPort {
  readText(path: string): Promise<string>;
  exists(path: string): Promise<boolean>;
  /**
   * Expands glob patterns relative to `baseDir` into absolute paths, deduplicated in
   * pattern order. A pattern that matches nothing resolves to its literal path when
   * that file exists.
   */
  expandPatterns(baseDir: string, patterns: ReadonlyArray<string>): Promise<ReadonlyArray<string>>;
  writeText(path: string, contents: string, options?: WriteTextOptions): Promise<void>;
}
