import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../src/application/EventBus.js';
import type { RunLogger } from '../../../src/domain/ports/RunLogger.js';
import type { RunResumedEvent, PageCommittedEvent } from '../../../src/domain/events/DomainEvents.js';

const resumed: RunResumedEvent = {
  type: 'run:resumed',
  runId: 'test-run',
  lastCommittedPage: 3,
  startPage: 4,
  timestamp: 1700000000000,
};

const committed: PageCommittedEvent = {
  type: 'page:committed',
  runId: 'test-run',
  pageIndex: 4,
  rowCount: 100,
  attempts: 1,
  elapsedMs: 12,
  timestamp: 1700000000000,
};

function recordingLogger(): RunLogger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    debug: () => undefined,
    info: () => undefined,
    warn: (message) => {
      warnings.push(message);
    },
    error: () => undefined,
  };
}

describe('EventBus', () => {
  it('should emit events to registered handlers', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('run:resumed', handler);
    bus.emit(resumed);

    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(resumed);
  });

  it('should not call handlers for different event types', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('run:resumed', handler);
    bus.emit(committed);

    expect(handler).not.toHaveBeenCalled();
  });

  it('should call handlers for the same event in registration order', () => {
    const bus = new EventBus();
    const calls: string[] = [];

    bus.on('page:committed', () => calls.push('first'));
    bus.on('page:committed', () => calls.push('second'));
    bus.emit(committed);

    expect(calls).toEqual(['first', 'second']);
  });

  it('should remove handlers with off()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('run:resumed', handler);
    bus.off('run:resumed', handler);
    bus.emit(resumed);

    expect(handler).not.toHaveBeenCalled();
  });

  it('should deliver every event to wildcard handlers until offAny()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);
    bus.emit(resumed);
    bus.emit(committed);
    bus.offAny(handler);
    bus.emit(committed);

    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler).toHaveBeenNthCalledWith(1, resumed);
    expect(handler).toHaveBeenNthCalledWith(2, committed);
  });

  it('should keep delivering when a handler throws and log the failure', () => {
    const logger = recordingLogger();
    const bus = new EventBus(logger);
    const after = vi.fn();
    const wildcard = vi.fn();

    bus.on('page:committed', () => {
      throw new Error('handler bug');
    });
    bus.on('page:committed', after);
    bus.onAny(wildcard);

    expect(() => bus.emit(committed)).not.toThrow();
    expect(after).toHaveBeenCalledOnce();
    expect(wildcard).toHaveBeenCalledOnce();
    expect(logger.warnings).toEqual(["Event handler for 'page:committed' threw"]);
  });
});
