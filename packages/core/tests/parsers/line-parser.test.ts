import { describe, it, expect } from 'vitest';
import { parseLine, scanExplicitId, stripListMarker } from '../../src/parsers/line-parser.js';
import type { LineParseOptions } from '../../src/parsers/line-parser.js';
import { TaskStatus } from '../../src/types/task-status.js';
import { GrammarMismatchError } from '../../src/errors.js';

const NOW = new Date(2026, 1, 8);

const opts: LineParseOptions = {
  defaultCreated: '2026-02-08',
  displayOrder: 1,
  now: NOW,
};

function parse(line: string) {
  return parseLine(line, opts);
}

describe('parseLine', () => {
  // --- Base shape ---

  it('parses a minimal wiki-style line', () => {
    expect(parse('- [ ] [[Buy milk]]')).toEqual({
      explicitId: null,
      task: {
        name: 'Buy milk',
        status: TaskStatus.None,
        priority: 'N',
        created: '2026-02-08',
        displayOrder: 1,
        due: null,
        updated: null,
        completed: null,
      },
    });
  });

  it('parses every attribute', () => {
    const line = '- [x] (A) [[Ship release]] id:7 due:2026-03-01 +work @office @phone #urgent '
      + 'created:2026-01-15 updated:"" completed:2026-02-07 note:"Say ""hi"" first"';

    expect(parse(line)).toEqual({
      explicitId: 7,
      task: {
        name: 'Ship release',
        status: TaskStatus.Done,
        priority: 'A',
        created: '2026-01-15',
        displayOrder: 1,
        due: '2026-03-01',
        updated: null,
        completed: '2026-02-07',
        project: 'work',
        contexts: ['office', 'phone'],
        tags: ['urgent'],
        notes: 'Say "hi" first',
      },
    });
  });

  it('accepts attributes in any order', () => {
    const { explicitId, task } = parse('- [ ] [[Pay rent]] #home due:2026-03-01 id:4 +flat');
    expect(explicitId).toBe(4);
    expect(task.due).toBe('2026-03-01');
    expect(task.project).toBe('flat');
    expect(task.tags).toEqual(['home']);
  });

  it('uses the display order it is given', () => {
    expect(parseLine('- [ ] [[A]]', { ...opts, displayOrder: 9 }).task.displayOrder).toBe(9);
  });

  it('keeps multi-letter priorities', () => {
    expect(parse('- [ ] (AB) [[Plan]]').task.priority).toBe('AB');
  });

  it('takes the rest of the line verbatim as a plain name', () => {
    const { explicitId, task } = parse('- [ ] Call the bank id:3');
    expect(task.name).toBe('Call the bank id:3');
    expect(explicitId).toBeNull();
  });

  it('prefers the wiki name over a plain name', () => {
    expect(parse('- [ ] [[Call]] the bank').task.name).toBe('Call');
  });

  // --- Status markers ---

  it.each([
    [' ', TaskStatus.None],
    ['p', TaskStatus.Pending],
    ['>', TaskStatus.Doing],
    ['w', TaskStatus.Waiting],
    ['x', TaskStatus.Done],
    ['X', TaskStatus.Done],
    ['c', TaskStatus.Cancelled],
    ['?', TaskStatus.Unknown],
    ['z', TaskStatus.Unknown],
  ])('maps marker %j to %s', (marker, status) => {
    expect(parse(`- [${marker}] [[Task]]`).task.status).toBe(status);
  });

  // --- Attribute edge cases ---

  it('treats due:"" the same as an omitted due', () => {
    expect(parse('- [ ] [[A]] due:""').task.due).toBeNull();
    expect(parse('- [ ] [[A]]').task.due).toBeNull();
  });

  it('treats an unparseable due as absent', () => {
    expect(parse('- [ ] [[A]] due:tomorrow').task.due).toBeNull();
  });

  it('completes a month/day due date with the processing year', () => {
    expect(parse('- [ ] [[A]] due:5/7').task.due).toBe('2026-05-07');
  });

  it('falls back to the default creation date for a bad created:', () => {
    expect(parse('- [ ] [[A]] created:someday').task.created).toBe('2026-02-08');
  });

  it('treats id:0 as unlabeled', () => {
    expect(parse('- [ ] [[A]] id:0').explicitId).toBeNull();
  });

  it('only reads symbols at the start of a token', () => {
    const { task } = parse('- [ ] [[Email]] me@example.com a+b c#d');
    expect(task).not.toHaveProperty('contexts');
    expect(task).not.toHaveProperty('project');
    expect(task).not.toHaveProperty('tags');
  });

  it('keeps only the first project', () => {
    expect(parse('- [ ] [[A]] +alpha +beta').task.project).toBe('alpha');
  });

  it('does not read attributes inside a note', () => {
    const { explicitId, task } = parse('- [ ] [[A]] note:"see id:9 #later"');
    expect(explicitId).toBeNull();
    expect(task.notes).toBe('see id:9 #later');
    expect(task).not.toHaveProperty('tags');
  });

  it('keeps an empty note distinct from no note', () => {
    expect(parse('- [ ] [[A]] note:""').task.notes).toBe('');
    expect(parse('- [ ] [[A]]').task).not.toHaveProperty('notes');
  });

  // --- Grammar mismatches ---

  it('rejects a line without a checkbox', () => {
    expect(() => parse('- Buy milk')).toThrow(GrammarMismatchError);
  });

  it('rejects a line without a name', () => {
    expect(() => parse('- [ ] ')).toThrow(
      new GrammarMismatchError('[ ]'),
    );
  });

  it('names the offending content in the message', () => {
    expect(() => parse('- Buy milk')).toThrow("'Buy milk' does not match the task line format");
  });
});

describe('stripListMarker', () => {
  it('removes indentation and the bullet', () => {
    expect(stripListMarker('        - [x] [[B]]')).toBe('[x] [[B]]');
  });

  it('removes a star bullet', () => {
    expect(stripListMarker('* [ ] [[B]]')).toBe('[ ] [[B]]');
  });
});

describe('scanExplicitId', () => {
  it('finds the id on an indented line', () => {
    expect(scanExplicitId('    - [ ] [[B]] id:12')).toBe(12);
  });

  it('returns null for a line without one', () => {
    expect(scanExplicitId('- [ ] [[B]]')).toBeNull();
  });

  it('returns null for a line that does not parse', () => {
    expect(scanExplicitId('- not a task id:3')).toBeNull();
  });
});
