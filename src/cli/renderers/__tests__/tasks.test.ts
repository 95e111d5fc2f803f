/**
 * Tests for task list and mutation renderers (ASCII, no color).
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import type { Task } from '../../../types/task.js';
import { setDisplayOptions } from '../colors.js';
import {
  renderAdd, renderDeleted, renderEdited, renderList, renderMarked, renderMatches,
  renderSelection, renderTaskGroup, taskLine,
} from '../tasks.js';

const NOW = new Date(2025, 5, 15, 12, 0);

function task(id: number, overrides: Partial<Task> = {}): Task {
  return {
    id,
    description: `Task ${id}`,
    dueDate: null,
    priority: 'normal',
    completed: false,
    createdAt: null,
    completedAt: null,
    ...overrides,
  };
}

beforeAll(() => {
  setDisplayOptions({ color: false, unicode: false });
});

beforeEach(() => {
  vi.useFakeTimers({ toFake: ['Date'] });
  vi.setSystemTime(NOW);
});

afterEach(() => {
  vi.useRealTimers();
});

describe('taskLine', () => {
  it('labels today, overdue and future dates', () => {
    expect(taskLine(task(1, { dueDate: '2025-06-15', priority: 'high' }), NOW)).toBe('  [ ] (H) #1: Task 1 @ Today');
    expect(taskLine(task(2, { dueDate: '2025-06-10' }), NOW)).toBe('  [ ] (N) #2: Task 2 ! Overdue (2025-06-10)');
    expect(taskLine(task(3, { dueDate: '2025-06-10', completed: true, priority: 'low' }), NOW))
      .toBe('  [x] (L) #3: Task 3 @ 2025-06-10');
    expect(taskLine(task(4), NOW)).toBe('  [ ] (N) #4: Task 4');
  });
});

describe('renderAdd', () => {
  const result = {
    added: [task(1, { description: 'Buy milk', dueDate: '2025-06-20', priority: 'high' })],
    skipped: [{ description: '  ', reason: 'empty description' }],
  };

  it('reports each task and the skipped entries', () => {
    expect(renderAdd(result, false).split('\n')).toEqual([
      'Multiple tasks detected. Adding each task separately:',
      'Skipping empty task description.',
      '+ Added task #1: Buy milk',
      '  Due date: 2025-06-20',
      '  Priority: high',
      '  Status: Pending',
      '',
      'Successfully added 1 task(s) and saved to file.',
    ]);
  });

  it('prints ids when quiet', () => {
    expect(renderAdd(result, true)).toBe('1');
  });

  it('names the failing entry', () => {
    const failed = { added: [], skipped: [{ description: 'Buy milk', reason: 'bad date' }] };
    expect(renderAdd(failed, false)).toBe("Error adding task 'Buy milk': bad date");
  });
});

describe('renderList', () => {
  it('groups pending and completed tasks', () => {
    const text = renderList({
      tasks: [task(1, { dueDate: '2025-06-15', priority: 'high' }), task(2, { completed: true })],
      timeFilter: 'today',
      quickInsights: { overdue: 1, dueSoon: 0 },
    }, false);
    expect(text.split('\n')).toEqual([
      "@ Today's Tasks (2025-06-15)",
      '='.repeat(50),
      '',
      '[ ] Pending Tasks (1)',
      '-'.repeat(30),
      '  [ ] (H) #1: Task 1 @ Today',
      '',
      '[x] Completed Tasks (1)',
      '-'.repeat(30),
      '  [x] (N) #2: Task 2',
      '',
      'Total: 2 tasks',
      '',
      '* Quick Insights: 1 overdue',
    ]);
  });

  it('omits quick insights when there is nothing to report', () => {
    const text = renderList({ tasks: [task(1)], timeFilter: 'all', quickInsights: { overdue: 0, dueSoon: 0 } }, false);
    expect(text.split('\n').at(-1)).toBe('Total: 1 tasks');
  });

  it('explains an empty result', () => {
    expect(renderList({ tasks: [], timeFilter: 'week', quickInsights: null }, false))
      .toBe('No tasks match the specified filters.');
  });
});

describe('renderMarked', () => {
  it('shows suggestions after a single completion', () => {
    const text = renderMarked({
      tasks: [task(1)],
      completed: true,
      suggestions: { nextHighPriority: task(5, { description: 'Call Bob' }), nextDueToday: null, suggestCleanup: true },
    }, false);
    expect(text.split('\n')).toEqual([
      '[x] Task #1 [x] completed: Task 1',
      '',
      '* Great job completing: Task 1',
      '* Next suggestions:',
      '   (H) High priority: Call Bob',
      "   * Consider running 'todo delete --completed' to clean up",
    ]);
  });

  it('reports a reopened task', () => {
    expect(renderMarked({ tasks: [task(1)], completed: false, suggestions: null }, false))
      .toBe('[x] Task #1 [ ] marked as incomplete: Task 1');
  });

  it('summarizes a batch', () => {
    expect(renderMarked({ tasks: [task(1), task(2)], completed: false }, false))
      .toBe('[x] Marked as incomplete 2 task(s)');
  });
});

describe('renderEdited', () => {
  it('lists each change', () => {
    const text = renderEdited({
      task: task(1, { dueDate: '2025-07-01' }),
      changes: [{ field: 'dueDate', from: null, to: '2025-07-01' }],
    }, false);
    expect(text.split('\n')).toEqual([
      '* Editing Task #1: Task 1',
      '='.repeat(40),
      '[x] Task updated successfully!',
      '  Due date: none -> 2025-07-01',
    ]);
  });

  it('explains an empty edit', () => {
    expect(renderEdited({ task: task(1), changes: [] }, false).split('\n')[2])
      .toBe('i No changes specified. Use --due, --priority, or --desc flags to edit.');
  });
});

describe('delete renderers', () => {
  it('names a single deletion and counts bulk ones', () => {
    expect(renderDeleted({ tasks: [task(3)], bulk: false }, false)).toBe('[x] Deleted task #3: Task 3');
    expect(renderDeleted({ tasks: [task(3)], bulk: true }, false)).toBe('[x] Successfully deleted 1 task(s).');
  });

  it('reports an empty group', () => {
    expect(renderTaskGroup({ name: 'Completed Tasks', tasks: [] }, false))
      .toBe('No completed tasks found for deletion.');
  });

  it('ranks fuzzy matches', () => {
    const text = renderMatches({
      query: 'report',
      matches: [
        { task: task(2, { description: 'Report' }), score: 1 },
        { task: task(1, { description: 'Write report' }), score: 0.8 },
      ],
    }, false);
    expect(text.split('\n')).toEqual([
      '? Found 2 similar tasks (ranked by relevance):',
      '  1. #2: Report (100% match)',
      '  2. #1: Write report (80% match)',
    ]);
  });

  it('suggests alternatives when nothing matches', () => {
    expect(renderMatches({ query: 'taxes', matches: [] }, false).split('\n')[0])
      .toBe("x No tasks found matching 'taxes'.");
  });
});

describe('renderSelection', () => {
  it('numbers the candidates', () => {
    expect(renderSelection({ tasks: [task(4, { dueDate: '2025-06-20' }), task(7)] }, false).split('\n')).toEqual([
      '+ Batch Task Operations',
      '='.repeat(50),
      'Found 2 pending task(s):',
      '',
      '1. [ ] #4: Task 4 (due: 2025-06-20)',
      '2. [ ] #7: Task 7',
    ]);
  });
});
