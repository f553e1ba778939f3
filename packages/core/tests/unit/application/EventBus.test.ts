import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../src/application/EventBus.js';
import type { JobStartedEvent, BatchPersistedEvent } from '../../../src/domain/events/DomainEvents.js';

function startedEvent(): JobStartedEvent {
  return {
    type: 'job:started',
    jobId: 'test-job',
    totalRows: 10,
    pendingRows: 10,
    timestamp: Date.now(),
  };
}

describe('EventBus', () => {
  it('should emit events to registered handlers', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('job:started', handler);

    const event = startedEvent();
    bus.emit(event);
    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(event);
  });

  it('should not call handlers for different event types', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('job:started', handler);

    const event: BatchPersistedEvent = {
      type: 'batch:persisted',
      jobId: 'test-job',
      batchIndex: 0,
      rowCount: 1,
      timestamp: Date.now(),
    };

    bus.emit(event);
    expect(handler).not.toHaveBeenCalled();
  });

  it('should remove handlers with off()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('job:started', handler);
    bus.off('job:started', handler);
    bus.emit(startedEvent());

    expect(handler).not.toHaveBeenCalled();
  });

  it('should continue calling other handlers when one throws', () => {
    const bus = new EventBus();
    const handler1 = vi.fn(() => {
      throw new Error('first handler fails');
    });
    const handler2 = vi.fn();

    bus.on('job:started', handler1);
    bus.on('job:started', handler2);

    expect(() => {
      bus.emit(startedEvent());
    }).not.toThrow();
    expect(handler1).toHaveBeenCalledOnce();
    expect(handler2).toHaveBeenCalledOnce();
  });

  it('should report listener errors to onListenerError', () => {
    const onListenerError = vi.fn();
    const bus = new EventBus(onListenerError);
    const failure = new Error('listener exploded');

    bus.onAny(() => {
      throw failure;
    });

    const event = startedEvent();
    bus.emit(event);

    expect(onListenerError).toHaveBeenCalledWith(failure, event);
  });

  it('should call typed handlers before wildcard handlers', () => {
    const bus = new EventBus();
    const calls: string[] = [];

    bus.onAny(() => calls.push('wildcard'));
    bus.on('job:started', () => calls.push('typed'));
    bus.emit(startedEvent());

    expect(calls).toEqual(['typed', 'wildcard']);
  });

  it('should remove onAny handlers with offAny()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);
    bus.offAny(handler);
    bus.emit(startedEvent());

    expect(handler).not.toHaveBeenCalled();
  });
});
