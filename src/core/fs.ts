import { access, mkdir, readFile, writeFile } from 'node:fs/promises'

export interface FileSystem {
  readText(path: string): Promise<string>;
  readJSON<T>(path: string): Promise<T>;
  writeText(path: string, content: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  mkdir(path: string): Promise<void>;
}

export class NodeFileSystem implements FileSystem {
  async readText(path: string): Promise<string> {
    return readFile(path, 'utf8');
  }

  async readJSON<T>(path: string): Promise<T> {
    return JSON.parse(await this.readText(path)) as T;
  }

  async writeText(path: string, content: string): Promise<void> {
    await writeFile(path, content, 'utf8');
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  async mkdir(path: string): Promise<void> {
    await mkdir(path, { recursive: true });
  }
}

export class MockFileSystem implements FileSystem {
  private files = new Map<string, string>();
  private readOnly = new Set<string>();

  async readText(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) throw new Error(`ENOENT: ${path}`);
    return content;
  }

  async readJSON<T>(path: string): Promise<T> {
    return JSON.parse(await this.readText(path)) as T;
  }

  async writeText(path: string, content: string): Promise<void> {
    if (this.readOnly.has(path)) throw new Error(`EACCES: permission denied, open '${path}'`);
    this.files.set(path, content);
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path);
  }

  async mkdir(_path: string): Promise<void> {}

  setFile(path: string, content: string): void {
    this.files.set(path, content);
  }

  /** Makes later writes to `path` fail with EACCES. */
  denyWrites(path: string): void {
    this.readOnly.add(path);
  }

  getFiles(): Map<string, string> {
    return new Map(this.files);
  }
}
