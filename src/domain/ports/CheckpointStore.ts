import type { Checkpoint, CheckpointLookup } from '../model/Checkpoint.js';

/**
 * Port for the durable "last committed page" record.
 *
 * `read()` never throws for a missing or unreadable checkpoint: it reports
 * `{ found: false }` with the reason. `write()` must be crash-safe, i.e. a
 * reader sees either the previous checkpoint or the new one, never a torn write.
 */
export interface CheckpointStore {
  read(): Promise<CheckpointLookup>;
  write(checkpoint: Checkpoint): Promise<void>;
}
