import { readJsonIfExists, writeJsonAtomic } from './files';

/**
 * A JSON file holding state that must survive restarts
 *
 * Content is checked against the validator on read, and replaced atomically on write.
 */
export class CacheFile<A extends object> {
  constructor(
    public readonly fileName: string,
    private readonly validate: (x: unknown) => x is A) {
  }

  /**
   * Read the file, returning undefined if it doesn't exist
   *
   * Throws MalformedCacheFileError if the file is there but not what we expect.
   */
  public async read(): Promise<A | undefined> {
    let content: unknown;
    try {
      content = await readJsonIfExists(this.fileName);
    } catch (e) {
      throw new MalformedCacheFileError(this.fileName, e);
    }
    if (content === undefined) { return undefined; }
    if (!this.validate(content)) {
      throw new MalformedCacheFileError(this.fileName);
    }
    return content;
  }

  public write(content: A) {
    return writeJsonAtomic(this.fileName, content);
  }
}

export class MalformedCacheFileError extends Error {
  constructor(public readonly fileName: string, cause?: unknown) {
    super(cause !== undefined ? `Unreadable cache file ${fileName}: ${cause}` : `Unexpected content in cache file ${fileName}`, { cause });
    this.name = 'MalformedCacheFileError';
  }
}
