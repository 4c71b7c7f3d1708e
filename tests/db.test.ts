import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  closeDb,
  getDb,
  initDb,
  SqliteMessageStorage,
  SqlitePushNotificationConfigStorage,
  SqliteTaskStorage,
} from '../src/db.js';
import { TaskOperationError } from '../src/errors.js';
import { makeTask, statusUpdate, userMessage } from './helpers.js';

beforeEach(() => { initDb(':memory:'); });
afterEach(() => { closeDb(); });

describe('database', () => {
  it('should create all tables', () => {
    const tables = getDb()
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all()
      .map((row) => row.name);
    expect(tables).toContain('tasks');
    expect(tables).toContain('messages');
    expect(tables).toContain('push_configs');
  });
});

describe('SqliteTaskStorage', () => {
  it('should store a task and merge later events into it', async () => {
    const storage = new SqliteTaskStorage();
    await storage.update(makeTask('task-1', 'ctx-1', 'submitted', { history: [userMessage('hi')] }));
    await storage.update(statusUpdate('task-1', 'ctx-1', 'working', false, { metadata: { step: 1 } }));
    await storage.update({
      kind: 'artifact-update',
      taskId: 'task-1',
      contextId: 'ctx-1',
      artifact: { artifactId: 'out', parts: [{ kind: 'text', text: 'part one' }] },
    });
    await storage.update({
      kind: 'artifact-update',
      taskId: 'task-1',
      contextId: 'ctx-1',
      artifact: { artifactId: 'out', parts: [{ kind: 'text', text: 'part two' }] },
      append: true,
    });

    const task = await storage.get('task-1', { includeArtifacts: true });
    expect(task?.status.state).toBe('working');
    expect(task?.metadata).toEqual({ step: 1 });
    expect(task?.history).toEqual([userMessage('hi')]);
    expect(task?.artifacts?.[0].parts).toEqual([
      { kind: 'text', text: 'part one' },
      { kind: 'text', text: 'part two' },
    ]);
    expect((await storage.get('task-1'))?.artifacts).toBeUndefined();
  });

  it('should keep the state column in sync with the snapshot', async () => {
    const storage = new SqliteTaskStorage();
    await storage.update(makeTask('task-1', 'ctx-1'));
    await storage.update(statusUpdate('task-1', 'ctx-1', 'completed', true));
    const row = getDb()
      .prepare<[string], { state: string }>('SELECT state FROM tasks WHERE id = ?')
      .get('task-1');
    expect(row?.state).toBe('completed');
  });

  it('should reject events for unknown tasks', async () => {
    const storage = new SqliteTaskStorage();
    await expect(storage.update(statusUpdate('missing', 'ctx-1', 'working'))).rejects.toThrow(TaskOperationError);
    expect(await storage.get('missing')).toBeNull();
  });

  it('should query by context and ids and delete', async () => {
    const storage = new SqliteTaskStorage();
    await storage.update(makeTask('task-1', 'ctx-1'));
    await storage.update(makeTask('task-2', 'ctx-2'));
    await storage.update(makeTask('task-3', 'ctx-1'));

    expect((await storage.getByContext('ctx-1')).map((task) => task.id).sort()).toEqual(['task-1', 'task-3']);
    expect((await storage.getAll(['task-2', 'nope'])).map((task) => task.id)).toEqual(['task-2']);
    expect(await storage.getAll([])).toEqual([]);

    await storage.delete('task-1');
    expect(await storage.get('task-1')).toBeNull();
  });

  it('should trim history on read', async () => {
    const storage = new SqliteTaskStorage();
    await storage.update(makeTask('task-1', 'ctx-1', 'working', {
      history: [userMessage('one'), userMessage('two')],
    }));
    expect((await storage.get('task-1', { historyLength: 1 }))?.history).toEqual([userMessage('two')]);
  });
});

describe('SqliteMessageStorage', () => {
  it('should keep messages per context in insertion order', async () => {
    const storage = new SqliteMessageStorage();
    await storage.save(userMessage('first', { contextId: 'ctx-1' }));
    await storage.save(userMessage('other', { contextId: 'ctx-2' }));
    await storage.save(userMessage('second', { contextId: 'ctx-1' }));

    expect((await storage.getByContext('ctx-1')).map((message) => message.messageId)).toEqual(['msg-first', 'msg-second']);

    await storage.replaceByContext('ctx-1', [userMessage('replacement', { contextId: 'ctx-1' })]);
    expect((await storage.getByContext('ctx-1')).map((message) => message.messageId)).toEqual(['msg-replacement']);

    await storage.deleteByContext('ctx-1');
    expect(await storage.getByContext('ctx-1')).toEqual([]);
    expect(await storage.getByContext('ctx-2')).toHaveLength(1);
  });
});

describe('SqlitePushNotificationConfigStorage', () => {
  it('should upsert configs by id and delete them', async () => {
    const storage = new SqlitePushNotificationConfigStorage();
    expect(await storage.save('task-1', { url: 'https://hooks.test/a', token: 'test-token' })).toEqual({
      id: 'task-1',
      url: 'https://hooks.test/a',
      token: 'test-token',
    });
    await storage.save('task-1', { url: 'https://hooks.test/b' });
    await storage.save('task-1', { id: 'second', url: 'https://hooks.test/c' });

    expect(await storage.getAll('task-1')).toEqual([
      { id: 'task-1', url: 'https://hooks.test/b' },
      { id: 'second', url: 'https://hooks.test/c' },
    ]);

    await storage.delete('task-1', 'task-1');
    expect((await storage.getAll('task-1')).map((config) => config.id)).toEqual(['second']);
    await storage.delete('task-1');
    expect(await storage.getAll('task-1')).toEqual([]);
  });
});
