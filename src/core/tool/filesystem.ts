// src/core/tool/filesystem.ts
import * as fs from 'fs/promises';
import type { PlatformFamily } from '../config/platform.js';

export interface ToolFileSystem {
  /** true only for regular files (directories and missing paths are false) */
  isFile(filePath: string): Promise<boolean>;
  fileSize(filePath: string): Promise<number | null>;
  ensureDir(dir: string): Promise<void>;
  makeExecutable(filePath: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  remove(filePath: string): Promise<void>;
}

export class NodeToolFileSystem implements ToolFileSystem {
  constructor(private readonly family: PlatformFamily) {}

  async isFile(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filePath);
      return stats.isFile();
    } catch {
      return false;
    }
  }

  async fileSize(filePath: string): Promise<number | null> {
    try {
      const stats = await fs.stat(filePath);
      return stats.isFile() ? stats.size : null;
    } catch {
      return null;
    }
  }

  async ensureDir(dir: string): Promise<void> {
    await fs.mkdir(dir, { recursive: true });
  }

  async makeExecutable(filePath: string): Promise<void> {
    // Windows has no executable bit; the .exe extension is enough
    if (this.family === 'windows') return;
    await fs.chmod(filePath, 0o755);
  }

  async rename(from: string, to: string): Promise<void> {
    await fs.rename(from, to);
  }

  async remove(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true });
  }
}
