import { describe, it, expect } from 'vitest';
import {
  completedCheckpoint,
  parseCheckpoint,
  parseCheckpointJson,
  pendingCheckpoint,
} from '../../../src/domain/model/Checkpoint.js';

describe('Checkpoint', () => {
  it('should build a pending checkpoint', () => {
    expect(pendingCheckpoint(3, 10, 100, 1700000000000)).toEqual({
      lastCommittedPage: 3,
      totalPages: 10,
      pageSize: 100,
      status: 'PENDING',
      timestamp: 1700000000000,
    });
  });

  it('should build the completion sentinel with every page committed', () => {
    expect(completedCheckpoint(10, 100, 1700000000000)).toEqual({
      lastCommittedPage: 10,
      totalPages: 10,
      pageSize: 100,
      status: 'COMPLETE',
      timestamp: 1700000000000,
    });
  });

  it('should accept a well-formed document', () => {
    const checkpoint = pendingCheckpoint(0, 5, 10, 1);

    expect(parseCheckpoint(checkpoint)).toEqual({ found: true, checkpoint });
  });

  it('should decode JSON text', () => {
    const checkpoint = pendingCheckpoint(4, 5, 10, 1);

    expect(parseCheckpointJson(JSON.stringify(checkpoint))).toEqual({ found: true, checkpoint });
  });

  it('should report malformed JSON as unparsable', () => {
    const lookup = parseCheckpointJson('{"lastCommittedPage": 3,');

    expect(lookup.found).toBe(false);
    if (!lookup.found) {
      expect(lookup.reason).toBe('UNPARSABLE');
    }
  });

  it('should report schema violations with the offending field', () => {
    const lookup = parseCheckpoint({ ...pendingCheckpoint(3, 10, 100, 1), lastCommittedPage: -1 });

    expect(lookup.found).toBe(false);
    if (!lookup.found) {
      expect(lookup.reason).toBe('UNPARSABLE');
      expect(lookup.detail).toMatch(/^lastCommittedPage: /);
    }
  });

  it('should reject an unknown status', () => {
    const lookup = parseCheckpoint({ ...pendingCheckpoint(3, 10, 100, 1), status: 'DONE' });

    expect(lookup).toMatchObject({ found: false, reason: 'UNPARSABLE' });
  });

  it('should reject a document that is not an object', () => {
    expect(parseCheckpointJson('42')).toMatchObject({ found: false, reason: 'UNPARSABLE' });
    expect(parseCheckpointJson('null')).toMatchObject({ found: false, reason: 'UNPARSABLE' });
  });
});
