import { describe, it, expect, vi, beforeEach } from 'vitest';
import { TaskManager } from '../src/task-manager.js';
import type { Action } from '../src/undo/actions.js';

let manager: TaskManager;

beforeEach(() => {
  manager = new TaskManager();
});

describe('TaskManager', () => {
  it('returns strictly increasing ids with no reuse after removals', () => {
    expect(manager.addTask('a')).toBe(1);
    expect(manager.addTask('b')).toBe(2);
    manager.removeTask(2);
    expect(manager.addTask('c')).toBe(3);
  });

  it('records one history entry per successful mutation', () => {
    manager.addTask('a');
    manager.completeTask(1);
    manager.removeTask(1);
    expect(manager.history.map(a => a.$type)).toEqual(['removed', 'completed', 'added']);
  });

  it('records the id returned by the store for adds', () => {
    manager.addTask('a');
    manager.addTask('b');
    manager.removeTask(1);
    manager.addTask('c');
    expect(manager.history[0]).toEqual({ $type: 'added', taskId: 3 });
  });

  it('does not record failed mutations', () => {
    manager.addTask('a');
    manager.completeTask(1);

    expect(manager.completeTask(1)).toEqual({ type: 'already-completed', taskId: 1 });
    expect(manager.completeTask(7)).toEqual({ type: 'not-found', taskId: 7 });
    expect(manager.removeTask(7)).toEqual({ type: 'not-found', taskId: 7 });
    expect(manager.history).toHaveLength(2);
  });

  it('undoes an add back to the previous state', () => {
    manager.addTask('keep');
    const before = manager.listTasks();
    manager.addTask('X');

    expect(manager.undo().type).toBe('success');
    expect(manager.listTasks()).toEqual(before);
    expect(manager.nextId).toBe(3);
    expect(manager.addTask('next')).toBe(3);
  });

  it('restores a removed task with the same id at the tail', () => {
    expect(manager.addTask('Buy milk')).toBe(1);
    expect(manager.addTask('Wash car')).toBe(2);

    expect(manager.removeTask(1)).toEqual({
      type: 'success',
      task: { id: 1, description: 'Buy milk', completed: false },
    });
    expect(manager.listTasks()).toEqual([{ id: 2, description: 'Wash car', completed: false }]);

    expect(manager.undo()).toMatchObject({ type: 'success', message: "Restored task 'Buy milk' (ID: 1)" });
    expect(manager.listTasks()).toEqual([
      { id: 2, description: 'Wash car', completed: false },
      { id: 1, description: 'Buy milk', completed: false },
    ]);
  });

  it('restores the completed state of a removed task', () => {
    manager.addTask('a');
    manager.completeTask(1);
    manager.removeTask(1);
    manager.undo();
    expect(manager.listTasks()).toEqual([{ id: 1, description: 'a', completed: true }]);
  });

  it('reverts a completion', () => {
    manager.addTask('A');
    expect(manager.completeTask(1).type).toBe('success');
    expect(manager.undo()).toMatchObject({ type: 'success', message: 'Task 1 reverted to pending' });
    expect(manager.listTasks()).toEqual([{ id: 1, description: 'A', completed: false }]);
  });

  it('reports not-found on an empty store and then nothing-to-undo', () => {
    expect(manager.completeTask(99)).toEqual({ type: 'not-found', taskId: 99 });
    expect(manager.history).toEqual([]);
    expect(manager.undo()).toEqual({ type: 'nothing-to-undo' });
  });

  it('unwinds a whole sequence one entry at a time', () => {
    manager.addTask('a');
    manager.addTask('b');
    manager.completeTask(2);
    manager.removeTask(1);

    manager.undo();
    manager.undo();
    manager.undo();
    manager.undo();

    expect(manager.listTasks()).toEqual([]);
    expect(manager.canUndo).toBe(false);
    expect(manager.undo()).toEqual({ type: 'nothing-to-undo' });
  });

  it('honours the history limit', () => {
    const limited = new TaskManager({ historyLimit: 1 });
    limited.addTask('a');
    limited.addTask('b');

    limited.undo();
    expect(limited.undo()).toEqual({ type: 'nothing-to-undo' });
    expect(limited.listTasks()).toEqual([{ id: 1, description: 'a', completed: false }]);
  });

  it('notifies the record listener', () => {
    const recorded: Action[] = [];
    const onRecord = vi.fn((action: Action) => { recorded.push(action); });
    const observed = new TaskManager({ onRecord });

    observed.addTask('a');
    observed.completeTask(5);

    expect(onRecord).toHaveBeenCalledOnce();
    expect(recorded).toEqual([{ $type: 'added', taskId: 1 }]);
  });

  it('clears history without touching tasks', () => {
    manager.addTask('a');
    manager.clearHistory();
    expect(manager.undo()).toEqual({ type: 'nothing-to-undo' });
    expect(manager.listTasks()).toHaveLength(1);
  });
});
