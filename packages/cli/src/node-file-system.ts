import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { FileSystemPort } from '@trimfit/core';
import { FileSystemError } from '@trimfit/core';

export class NodeFileSystem implements FileSystemPort {
  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async readFile(filePath: string): Promise<Uint8Array> {
    try {
      return new Uint8Array(await fs.readFile(filePath));
    } catch (error) {
      throw new FileSystemError('read', filePath, error);
    }
  }

  async writeFile(filePath: string, data: Uint8Array): Promise<void> {
    try {
      await fs.writeFile(filePath, data);
    } catch (error) {
      throw new FileSystemError('write', filePath, error);
    }
  }

  async mkdir(dirPath: string): Promise<void> {
    try {
      await fs.mkdir(dirPath, { recursive: true });
    } catch (error) {
      throw new FileSystemError('mkdir', dirPath, error);
    }
  }

  async makeTempDir(prefix: string): Promise<string> {
    const base = path.join(os.tmpdir(), prefix);
    try {
      return await fs.mkdtemp(base);
    } catch (error) {
      throw new FileSystemError('mkdtemp', base, error);
    }
  }

  async remove(targetPath: string): Promise<void> {
    try {
      await fs.rm(targetPath, { recursive: true, force: true });
    } catch (error) {
      throw new FileSystemError('delete', targetPath, error);
    }
  }
}
