import fs from "node:fs";
import path from "node:path";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";

export interface AudioStorage {
  exists(audioRef: string): Promise<boolean>;
  remove(audioRef: string): Promise<void>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** Audios enviados ficam como arquivos em um diretorio compartilhado com os workers. */
export class LocalAudioStorage implements AudioStorage {
  readonly directory: string;

  constructor(directory: string, private readonly logger: Logger = silentLogger) {
    this.directory = path.resolve(directory);
  }

  async ensureDirectory(): Promise<void> {
    await fs.promises.mkdir(this.directory, { recursive: true });
  }

  async exists(audioRef: string): Promise<boolean> {
    try {
      const stat = await fs.promises.stat(audioRef);
      return stat.isFile();
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  async remove(audioRef: string): Promise<void> {
    await fs.promises.rm(audioRef, { force: true });
  }

  /** Remove sobras de submissoes que nunca chegaram a um worker. */
  async removeOlderThan(ageMs: number, now = Date.now()): Promise<number> {
    let removed = 0;
    for (const file of await fs.promises.readdir(this.directory)) {
      const fullPath = path.join(this.directory, file);
      try {
        const stat = await fs.promises.stat(fullPath);
        if (stat.isFile() && now - stat.mtimeMs > ageMs) {
          await fs.promises.unlink(fullPath);
          removed++;
        }
      } catch (error) {
        this.logger.warn(`Falha ao limpar ${fullPath}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    return removed;
  }
}
