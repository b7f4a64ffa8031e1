import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { homedir } from 'os';
import { dirname, join } from 'path';

export interface TokenStore {
  load(): Promise<string | null>;
  save(token: string): Promise<void>;
  clear(): Promise<void>;
}

export const DEFAULT_TOKEN_PATH = join(homedir(), '.quill', 'token');

/** Trimmed token, or null when blank. */
export function parseToken(raw: string): string | null {
  const token = raw.trim();
  return token ? token : null;
}

// fs errors may come from another realm (e.g. a test VM), so match on shape.
function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/** Persists the raw token string in a file (default `~/.quill/token`). */
export class FileTokenStore implements TokenStore {
  constructor(readonly path: string = DEFAULT_TOKEN_PATH) {}

  async load(): Promise<string | null> {
    try {
      return parseToken(await readFile(this.path, 'utf8'));
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  async save(token: string): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, token, { encoding: 'utf8', mode: 0o600 });
  }

  async clear(): Promise<void> {
    await rm(this.path, { force: true });
  }
}

export class MemoryTokenStore implements TokenStore {
  private token: string | null = null;

  async load() {
    return this.token;
  }

  async save(token: string) {
    this.token = parseToken(token);
  }

  async clear() {
    this.token = null;
  }
}
