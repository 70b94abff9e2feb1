// ── Task interface ───────────────────────────────────

export interface Task {
  id: number;
  title: string;
  done: boolean;
  /** Calendar date as YYYY-MM-DD, or null when the task has no deadline. */
  deadline: string | null;
}

export type TaskCollection = readonly Task[];

// ── Operation results ────────────────────────────────

export interface AddResult {
  tasks: Task[];
  id: number;
}

export interface LookupResult {
  tasks: Task[];
  found: boolean;
}
