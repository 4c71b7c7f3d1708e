import { describe, it, expect, beforeEach } from 'vitest';
import { SessionEventProcessor } from '../src/session/eventProcessor.js';
import { Session } from '../src/session/session.js';
import { InMemoryTaskStorage } from '../src/storage.js';
import { deferred, flush, waitForAbort } from './helpers.js';

let processor: SessionEventProcessor;

beforeEach(() => {
  processor = new SessionEventProcessor({ contextId: 'ctx-1', taskId: 'task-1', taskStorage: new InMemoryTaskStorage() });
});

describe('Session', () => {
  it('should move from created to started to finished', async () => {
    const gate = deferred();
    const session = new Session(processor, () => gate.promise);
    expect(session.state).toBe('created');
    expect(session.taskId).toBe('task-1');
    expect(session.contextId).toBe('ctx-1');

    session.start();
    expect(session.state).toBe('started');
    expect(session.isActive).toBe(true);

    gate.resolve();
    expect(await session.completion()).toEqual({ status: 'completed' });
    expect(session.state).toBe('finished');
    expect(session.isActive).toBe(false);
  });

  it('should run the job only once', async () => {
    let runs = 0;
    const session = new Session(processor, async () => {
      runs += 1;
    });
    session.start();
    session.start();
    await session.join();
    expect(runs).toBe(1);
  });

  it('join should start a session that was never started', async () => {
    let ran = false;
    const session = new Session(processor, async () => {
      ran = true;
    });
    expect(await session.join()).toEqual({ status: 'completed' });
    expect(ran).toBe(true);
  });

  it('should report a failing job without throwing from join', async () => {
    const failure = new Error('agent crashed');
    const session = new Session(processor, async () => {
      throw failure;
    });
    expect(await session.join()).toEqual({ status: 'failed', error: failure });
  });

  it('close should abort a running job and close the processor', async () => {
    let observedSignal: AbortSignal | undefined;
    const session = new Session(processor, async (signal) => {
      observedSignal = signal;
      await waitForAbort(signal);
    });
    session.start();

    await session.close();
    await session.close();
    expect(observedSignal?.aborted).toBe(true);
    expect(processor.isClosed).toBe(true);
    expect(session.state).toBe('closed');
    expect(await session.join()).toEqual({ status: 'canceled' });
  });

  it('should count as finished after close even if the job ignores the signal', async () => {
    const never = deferred();
    const session = new Session(processor, () => never.promise);
    session.start();
    await session.close();
    expect(await session.completion()).toEqual({ status: 'canceled' });
  });

  it('close before start should keep the job from running', async () => {
    let ran = false;
    const session = new Session(processor, async () => {
      ran = true;
    });
    await session.close();
    session.start();
    expect(await session.join()).toEqual({ status: 'canceled' });
    expect(ran).toBe(false);
  });

  it('join should wait for tracked work', async () => {
    const cleanup = deferred();
    const session = new Session(processor, async () => undefined);
    session.trackCompletion(cleanup.promise);

    let joined = false;
    const joining = session.join().then(() => {
      joined = true;
    });
    await flush();
    expect(joined).toBe(false);

    cleanup.resolve();
    await joining;
    expect(joined).toBe(true);
  });
});
