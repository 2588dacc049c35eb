import { describe, it, expect } from 'vitest';
import { StoreError, isTransientError } from '../../../src/domain/errors/StoreError.js';
import { PageCommitError } from '../../../src/domain/errors/PageCommitError.js';

describe('isTransientError', () => {
  it('should use the flag carried by a StoreError', () => {
    expect(isTransientError(new StoreError('timeout', { transient: true }))).toBe(true);
    expect(isTransientError(new StoreError('constraint', { transient: false }))).toBe(false);
  });

  it('should treat unclassified errors as transient', () => {
    expect(isTransientError(new Error('socket hang up'))).toBe(true);
    expect(isTransientError('boom')).toBe(true);
  });

  it('should keep the underlying cause', () => {
    const cause = new Error('ECONNRESET');
    const error = new StoreError('commit failed', { transient: true, cause });

    expect(error.cause).toBe(cause);
    expect(error.name).toBe('StoreError');
  });
});

describe('PageCommitError', () => {
  it('should describe the failed page and the committed range', () => {
    const error = new PageCommitError(4, 3, 3, 'connection lost');

    expect(error.message).toBe('Page 4 failed after 3 attempt(s), pages 1-3 are committed: connection lost');
    expect(error.page).toBe(4);
    expect(error.attempts).toBe(3);
    expect(error.lastCommittedPage).toBe(3);
  });

  it('should say when nothing is committed', () => {
    const error = new PageCommitError(1, 1, 0, 'duplicate key');

    expect(error.message).toBe('Page 1 failed after 1 attempt(s), no pages are committed: duplicate key');
  });
});
