import { writeFile, readFile, mkdir, rename, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Checkpoint, CheckpointLookup } from '../../domain/model/Checkpoint.js';
import type { CheckpointStore } from '../../domain/ports/CheckpointStore.js';
import { parseCheckpointJson } from '../../domain/model/Checkpoint.js';

export interface FileCheckpointStoreOptions {
  /** Checkpoint file. Default: `'.rowsweep/checkpoint.json'`. */
  readonly path?: string;
}

/**
 * File-based checkpoint store.
 *
 * Writes go to `{path}.{pid}.tmp` first and are renamed over `path`, so a
 * crash mid-write leaves the previous checkpoint intact. A missing file reads
 * as `ABSENT`, anything that is not a valid checkpoint document as
 * `UNPARSABLE`.
 *
 * Node.js only.
 */
export class FileCheckpointStore implements CheckpointStore {
  readonly path: string;

  constructor(options?: FileCheckpointStoreOptions) {
    this.path = options?.path ?? '.rowsweep/checkpoint.json';
  }

  async read(): Promise<CheckpointLookup> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return { found: false, reason: 'ABSENT' };
      }
      return {
        found: false,
        reason: 'UNPARSABLE',
        detail: error instanceof Error ? error.message : String(error),
      };
    }
    return parseCheckpointJson(content);
  }

  async write(checkpoint: Checkpoint): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tempPath = `${this.path}.${String(process.pid)}.tmp`;
    try {
      await writeFile(tempPath, JSON.stringify(checkpoint, null, 2), 'utf-8');
      await rename(tempPath, this.path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
