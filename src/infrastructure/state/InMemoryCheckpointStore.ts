import type { Checkpoint, CheckpointLookup } from '../../domain/model/Checkpoint.js';
import type { CheckpointStore } from '../../domain/ports/CheckpointStore.js';
import { parseCheckpointJson } from '../../domain/model/Checkpoint.js';

/**
 * Non-persistent checkpoint store. Used as the default when no store is
 * configured, and by tests.
 *
 * Keeps the serialized form so a seeded document goes through the same
 * validation as a file or database read.
 */
export class InMemoryCheckpointStore implements CheckpointStore {
  private content: string | null;

  /** @param initial - A checkpoint, or raw text (possibly corrupt) to start with. */
  constructor(initial?: Checkpoint | string) {
    if (initial === undefined) {
      this.content = null;
    } else {
      this.content = typeof initial === 'string' ? initial : JSON.stringify(initial);
    }
  }

  read(): Promise<CheckpointLookup> {
    if (this.content === null) {
      return Promise.resolve({ found: false, reason: 'ABSENT' });
    }
    return Promise.resolve(parseCheckpointJson(this.content));
  }

  write(checkpoint: Checkpoint): Promise<void> {
    this.content = JSON.stringify(checkpoint);
    return Promise.resolve();
  }

  /** Drop the stored checkpoint. */
  clear(): void {
    this.content = null;
  }
}
