import { TodoError } from "../errors.ts";
import { parseISODate } from "../utils/date.ts";
import type { AddResult, LookupResult, Task, TaskCollection } from "./types.ts";

// Every operation returns a fresh array; the input collection is never mutated.

export function nextId(tasks: TaskCollection): number {
  const id = tasks.reduce((max, t) => Math.max(max, t.id), 0) + 1;
  if (!Number.isSafeInteger(id)) {
    throw new TodoError("data_corruption", `no task identifier left after #${id - 1}`);
  }
  return id;
}

/**
 * Appends a task with the next free identifier. A deadline that is not a
 * valid `YYYY-MM-DD` date is dropped rather than rejected.
 */
export function addTask(tasks: TaskCollection, title: string, deadline?: string): AddResult {
  const id = nextId(tasks);
  const task: Task = {
    id,
    title,
    done: false,
    deadline: deadline ? parseISODate(deadline) : null,
  };
  return { tasks: [...tasks, task], id };
}

export function removeTask(tasks: TaskCollection, id: number): LookupResult {
  const index = tasks.findIndex((t) => t.id === id);
  if (index === -1) return { tasks: [...tasks], found: false };
  return {
    tasks: [...tasks.slice(0, index), ...tasks.slice(index + 1)],
    found: true,
  };
}

export function markDone(tasks: TaskCollection, id: number): LookupResult {
  const index = tasks.findIndex((t) => t.id === id);
  if (index === -1) return { tasks: [...tasks], found: false };
  return {
    tasks: tasks.map((t, i) => (i === index ? { ...t, done: true } : t)),
    found: true,
  };
}

export function clearTasks(): Task[] {
  return [];
}
