import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { TaskStore, decodeRecord, decodeStore, encodeStore } from '../../src/store/task-store.js';
import { TaskStatus } from '../../src/types/task-status.js';
import { StoreRecordMalformedError } from '../../src/errors.js';
import type { Task } from '../../src/types/task.js';

const MINIMAL_JSON =
  '{"id":1,"name":"A","status":"none","priority":"N","created":"2026-02-08","display_order":1,'
  + '"due":null,"updated":null,"completed":null}';

const minimal: Task = {
  id: 1,
  name: 'A',
  status: TaskStatus.None,
  priority: 'N',
  created: '2026-02-08',
  displayOrder: 1,
  due: null,
  updated: null,
  completed: null,
};

function record(fields: Record<string, unknown>): string {
  return JSON.stringify({ ...JSON.parse(MINIMAL_JSON), ...fields });
}

describe('encodeStore', () => {
  it('writes one record per line with nullable dates as null', () => {
    expect(encodeStore([minimal])).toBe(MINIMAL_JSON + '\n');
  });

  it('writes nothing for an empty collection', () => {
    expect(encodeStore([])).toBe('');
  });

  it('omits absent optionals and empty lists', () => {
    const line = encodeStore([{ ...minimal, contexts: [], tags: [] }]).trim();
    expect(JSON.parse(line)).not.toHaveProperty('contexts');
    expect(JSON.parse(line)).not.toHaveProperty('tags');
    expect(JSON.parse(line)).not.toHaveProperty('project');
  });

  it('nests subtasks and keeps extra', () => {
    const tree: Task = {
      ...minimal,
      project: 'home',
      extra: { color: 'red' },
      subtasks: [{ ...minimal, id: 2, name: 'B', displayOrder: 2, status: TaskStatus.Done }],
    };
    const json = JSON.parse(encodeStore([tree]).trim());
    expect(json.project).toBe('home');
    expect(json.extra).toEqual({ color: 'red' });
    expect(json.subtasks).toEqual([
      {
        id: 2, name: 'B', status: 'done', priority: 'N', created: '2026-02-08',
        display_order: 2, due: null, updated: null, completed: null,
      },
    ]);
  });
});

describe('decodeRecord', () => {
  it('decodes a minimal record', () => {
    expect(decodeRecord(MINIMAL_JSON, 1)).toEqual(minimal);
  });

  it('decodes optionals and nested subtasks', () => {
    const task = decodeRecord(record({
      due: '2026-03-01',
      project: 'home',
      contexts: ['phone'],
      tags: ['bills'],
      notes: 'call first',
      subtasks: [JSON.parse(record({ id: 2, name: 'B', display_order: 2, status: 'done' }))],
    }), 1);

    expect(task).toEqual({
      ...minimal,
      due: '2026-03-01',
      project: 'home',
      contexts: ['phone'],
      tags: ['bills'],
      notes: 'call first',
      subtasks: [{ ...minimal, id: 2, name: 'B', displayOrder: 2, status: TaskStatus.Done }],
    });
  });

  it('treats null and empty optionals as absent', () => {
    const task = decodeRecord(record({ project: null, contexts: [], tags: null, subtasks: [] }), 1);
    expect('project' in task).toBe(false);
    expect('contexts' in task).toBe(false);
    expect('tags' in task).toBe(false);
    expect('subtasks' in task).toBe(false);
  });

  it('treats missing nullable dates as null', () => {
    const task = decodeRecord('{"id":3,"name":"C","status":"done","priority":"A","created":"2026-01-01","display_order":1}', 1);
    expect(task.due).toBeNull();
    expect(task.updated).toBeNull();
    expect(task.completed).toBeNull();
  });

  it('accepts status words in any case and the open alias', () => {
    expect(decodeRecord(record({ status: 'DONE' }), 1).status).toBe(TaskStatus.Done);
    expect(decodeRecord(record({ status: 'open' }), 1).status).toBe(TaskStatus.None);
  });

  it('folds unknown keys into extra, letting extra win', () => {
    const task = decodeRecord(record({ color: 'red', size: 2, extra: { color: 'blue' } }), 1);
    expect(task.extra).toEqual({ color: 'blue', size: 2 });
  });

  it('keeps the repeat placeholder', () => {
    expect(decodeRecord(record({ repeat: {} }), 1).repeat).toEqual({});
  });

  // --- Malformed records ---

  it('rejects invalid JSON with the line number', () => {
    expect(() => decodeRecord('{not json', 4)).toThrow(StoreRecordMalformedError);
    expect(() => decodeRecord('{not json', 4)).toThrow(/^Malformed task record on line 4: /);
  });

  it.each([
    ['a missing name', { name: undefined }, 'name: Required'],
    ['an unknown status', { status: 'someday' }, 'status: Unknown status'],
    ['a bad date', { due: '2026-13-01' }, 'due: Expected a yyyy-MM-dd date'],
  ])('rejects %s', (_label, fields, reason) => {
    expect(() => decodeRecord(record(fields), 2)).toThrow(`Malformed task record on line 2: ${reason}`);
  });
});

describe('decodeStore', () => {
  it('skips blank lines', () => {
    const tasks = decodeStore(`\n${MINIMAL_JSON}\n\n${record({ id: 2, name: 'B' })}\n`);
    expect(tasks.map(t => t.name)).toEqual(['A', 'B']);
  });

  it('reports the line of the first bad record', () => {
    let caught: unknown;
    try {
      decodeStore(`${MINIMAL_JSON}\n\n{oops`);
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(StoreRecordMalformedError);
    expect(caught).toMatchObject({ lineNumber: 3 });
  });

  it('round-trips an encoded collection', () => {
    const tasks: Task[] = [
      { ...minimal, project: 'p', notes: '', extra: { k: [1, 2] } },
      { ...minimal, id: 2, name: 'B', displayOrder: 2, due: '2026-05-07' },
    ];
    expect(decodeStore(encodeStore(tasks))).toEqual(tasks);
  });
});

describe('TaskStore', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'tasksync-store-test-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('loads a missing file as an empty store', () => {
    expect(new TaskStore(join(tmpDir, 'none.jsonl')).load()).toEqual([]);
  });

  it('creates parent directories on save', () => {
    const path = join(tmpDir, 'nested', 'dir', 'tasks.jsonl');
    new TaskStore(path).save([minimal]);
    expect(readFileSync(path, 'utf8')).toBe(MINIMAL_JSON + '\n');
  });

  it('replaces the whole file', () => {
    const path = join(tmpDir, 'tasks.jsonl');
    writeFileSync(path, `${MINIMAL_JSON}\n${record({ id: 2 })}\n`);
    const store = new TaskStore(path);
    store.save([{ ...minimal, name: 'Only' }]);
    expect(store.load().map(t => t.name)).toEqual(['Only']);
  });
});
