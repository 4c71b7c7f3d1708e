import { describe, it, expect, beforeEach } from 'vitest';
import { InvalidAgentResponseError, TaskOperationError } from '../src/errors.js';
import {
  ContextMessageStorage,
  ContextTaskStorage,
  InMemoryMessageStorage,
  InMemoryPushNotificationConfigStorage,
  InMemoryTaskStorage,
  applyTaskEvent,
  viewTask,
} from '../src/storage.js';
import type { TaskArtifactUpdateEvent } from '../src/types.js';
import { makeTask, statusUpdate, userMessage } from './helpers.js';

function artifactUpdate(artifactId: string, text: string, append = false): TaskArtifactUpdateEvent {
  return {
    kind: 'artifact-update',
    taskId: 'task-1',
    contextId: 'ctx-1',
    artifact: { artifactId, parts: [{ kind: 'text', text }] },
    append,
  };
}

describe('applyTaskEvent', () => {
  it('should replace status and merge metadata on a status update', () => {
    const task = makeTask('task-1', 'ctx-1', 'submitted', { metadata: { owner: 'a1' } });
    const next = applyTaskEvent(task, statusUpdate('task-1', 'ctx-1', 'working', false, { metadata: { step: 2 } }));
    expect(next.status).toEqual({ state: 'working' });
    expect(next.metadata).toEqual({ owner: 'a1', step: 2 });
  });

  it('should append the status message to history', () => {
    const task = makeTask('task-1', 'ctx-1', 'working', { history: [userMessage('hi')] });
    const reply = userMessage('done', { role: 'agent' });
    const next = applyTaskEvent(task, {
      kind: 'status-update',
      taskId: 'task-1',
      contextId: 'ctx-1',
      status: { state: 'completed', message: reply },
      final: true,
    });
    expect(next.history).toEqual([userMessage('hi'), reply]);
  });

  it('should reject updates for unknown tasks', () => {
    expect(() => applyTaskEvent(null, statusUpdate('task-1', 'ctx-1', 'working'))).toThrow(TaskOperationError);
    expect(() => applyTaskEvent(null, artifactUpdate('a', 'x'))).toThrow(TaskOperationError);
  });

  it('should add, replace and append artifacts by id', () => {
    let task = makeTask('task-1', 'ctx-1', 'working');
    task = applyTaskEvent(task, artifactUpdate('a', 'one'));
    task = applyTaskEvent(task, artifactUpdate('b', 'other'));
    task = applyTaskEvent(task, artifactUpdate('a', 'two', true));
    expect(task.artifacts).toEqual([
      { artifactId: 'a', parts: [{ kind: 'text', text: 'one' }, { kind: 'text', text: 'two' }], metadata: undefined },
      { artifactId: 'b', parts: [{ kind: 'text', text: 'other' }] },
    ]);

    task = applyTaskEvent(task, artifactUpdate('a', 'fresh'));
    expect(task.artifacts?.[0]).toEqual({ artifactId: 'a', parts: [{ kind: 'text', text: 'fresh' }] });
  });
});

describe('viewTask', () => {
  const task = makeTask('task-1', 'ctx-1', 'working', {
    history: [userMessage('one'), userMessage('two'), userMessage('three')],
    artifacts: [{ artifactId: 'a', parts: [{ kind: 'text', text: 'x' }] }],
  });

  it('should omit artifacts unless requested', () => {
    expect(viewTask(task).artifacts).toBeUndefined();
    expect(viewTask(task, { includeArtifacts: true }).artifacts).toHaveLength(1);
  });

  it('should keep the last N history entries', () => {
    expect(viewTask(task).history).toHaveLength(3);
    expect(viewTask(task, { historyLength: 2 }).history).toEqual([userMessage('two'), userMessage('three')]);
    expect(viewTask(task, { historyLength: 0 }).history).toEqual([]);
  });
});

describe('InMemoryTaskStorage', () => {
  let storage: InMemoryTaskStorage;

  beforeEach(() => {
    storage = new InMemoryTaskStorage();
  });

  it('should store and return a task', async () => {
    await storage.update(makeTask('task-1', 'ctx-1'));
    expect(await storage.get('task-1')).toEqual(makeTask('task-1', 'ctx-1'));
    expect(await storage.get('missing')).toBeNull();
  });

  it('should return copies that do not alias stored state', async () => {
    await storage.update(makeTask('task-1', 'ctx-1'));
    const copy = await storage.get('task-1');
    if (copy) copy.status.state = 'failed';
    expect((await storage.get('task-1'))?.status.state).toBe('submitted');
  });

  it('should reject a status update for an unknown task', async () => {
    await expect(storage.update(statusUpdate('task-1', 'ctx-1', 'working'))).rejects.toThrow(TaskOperationError);
  });

  it('should list tasks by context and by ids', async () => {
    await storage.update(makeTask('task-1', 'ctx-1'));
    await storage.update(makeTask('task-2', 'ctx-1'));
    await storage.update(makeTask('task-3', 'ctx-2'));
    expect((await storage.getByContext('ctx-1')).map((task) => task.id)).toEqual(['task-1', 'task-2']);
    expect((await storage.getAll(['task-3', 'missing'])).map((task) => task.id)).toEqual(['task-3']);
  });

  it('should delete a task', async () => {
    await storage.update(makeTask('task-1', 'ctx-1'));
    await storage.delete('task-1');
    expect(await storage.get('task-1')).toBeNull();
  });
});

describe('InMemoryPushNotificationConfigStorage', () => {
  it('should default the config id to the task id and replace configs with the same id', async () => {
    const storage = new InMemoryPushNotificationConfigStorage();
    const stored = await storage.save('task-1', { url: 'https://hooks.test/one' });
    expect(stored.id).toBe('task-1');

    await storage.save('task-1', { url: 'https://hooks.test/two' });
    await storage.save('task-1', { id: 'extra', url: 'https://hooks.test/three' });
    expect(await storage.getAll('task-1')).toEqual([
      { id: 'task-1', url: 'https://hooks.test/two' },
      { id: 'extra', url: 'https://hooks.test/three' },
    ]);
  });

  it('should delete one config or all of them', async () => {
    const storage = new InMemoryPushNotificationConfigStorage();
    await storage.save('task-1', { id: 'a', url: 'https://hooks.test/a' });
    await storage.save('task-1', { id: 'b', url: 'https://hooks.test/b' });

    await storage.delete('task-1', 'a');
    expect((await storage.getAll('task-1')).map((config) => config.id)).toEqual(['b']);
    await storage.delete('task-1');
    expect(await storage.getAll('task-1')).toEqual([]);
  });
});

describe('context-scoped storage', () => {
  it('should hide tasks of other conversations', async () => {
    const tasks = new InMemoryTaskStorage();
    await tasks.update(makeTask('task-1', 'ctx-1'));
    await tasks.update(makeTask('task-2', 'ctx-2'));
    const scoped = new ContextTaskStorage('ctx-1', tasks);

    expect(await scoped.get('task-1')).not.toBeNull();
    expect(await scoped.get('task-2')).toBeNull();
    expect((await scoped.getAll()).map((task) => task.id)).toEqual(['task-1']);
  });

  it('should stamp the conversation id on saved messages and refuse foreign ones', async () => {
    const messages = new InMemoryMessageStorage();
    const scoped = new ContextMessageStorage('ctx-1', messages);

    await scoped.save(userMessage('hello'));
    expect(await messages.getByContext('ctx-1')).toEqual([userMessage('hello', { contextId: 'ctx-1' })]);
    await expect(scoped.save(userMessage('nope', { contextId: 'ctx-2' }))).rejects.toThrow(InvalidAgentResponseError);

    await scoped.replaceAll([userMessage('only')]);
    expect((await scoped.getAll()).map((message) => message.messageId)).toEqual(['msg-only']);
    await scoped.deleteAll();
    expect(await scoped.getAll()).toEqual([]);
  });
});
