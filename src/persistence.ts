import type {
  Collaboration,
  NewTask,
  NewTaskResult,
  Task,
  TaskResult,
} from "./contracts.js";
import { PersistenceError } from "./errors.js";

export interface CreatedTask {
  task: Task;
  results: TaskResult[];
}

/**
 * Task + TaskResult storage. `createTask` and `deleteTask` are single units:
 * readers observe either every row of the unit or none of them.
 */
export interface TaskStore {
  createTask(task: NewTask, results: NewTaskResult[]): Promise<CreatedTask>;
  getTask(taskId: number): Promise<Task | undefined>;
  listTasks(): Promise<Task[]>;
  deleteTask(taskId: number): Promise<boolean>;
  /** `undefined` when the task does not exist. */
  listResultsForTask(taskId: number): Promise<TaskResult[] | undefined>;
}

export interface CollaborationDirectory {
  resolve(collaborationId: number): Promise<Collaboration | undefined>;
}

export function assertDistinctNodes(results: NewTaskResult[]): void {
  const seen = new Set<number>();
  for (const r of results) {
    if (seen.has(r.nodeId)) {
      throw new PersistenceError(`duplicate result for node id=${r.nodeId}`);
    }
    seen.add(r.nodeId);
  }
}

export function toTaskResult(taskId: number, id: number, draft: NewTaskResult): TaskResult {
  return {
    schemaVersion: "1.0",
    id,
    taskId,
    nodeId: draft.nodeId,
    result: null,
    log: null,
    assignedAt: draft.assignedAt,
    startedAt: null,
    finishedAt: null,
  };
}

export class InMemoryTaskStore implements TaskStore {
  private tasks = new Map<number, Task>();
  private results = new Map<number, TaskResult>();
  private resultsByTask = new Map<number, number[]>();
  private taskSeq = 0;
  private resultSeq = 0;

  async createTask(draft: NewTask, drafts: NewTaskResult[]): Promise<CreatedTask> {
    assertDistinctNodes(drafts);

    // Everything below runs without yielding, so the unit lands in one step.
    const task: Task = { ...draft, id: ++this.taskSeq };
    const results = drafts.map((d) => toTaskResult(task.id, ++this.resultSeq, d));

    this.tasks.set(task.id, task);
    for (const r of results) this.results.set(r.id, r);
    this.resultsByTask.set(
      task.id,
      results.map((r) => r.id)
    );

    return { task: { ...task }, results: results.map((r) => ({ ...r })) };
  }

  async getTask(taskId: number): Promise<Task | undefined> {
    const task = this.tasks.get(taskId);
    return task ? { ...task } : undefined;
  }

  async listTasks(): Promise<Task[]> {
    return [...this.tasks.values()].sort((a, b) => a.id - b.id).map((t) => ({ ...t }));
  }

  async deleteTask(taskId: number): Promise<boolean> {
    if (!this.tasks.has(taskId)) return false;

    for (const resultId of this.resultsByTask.get(taskId) ?? []) {
      this.results.delete(resultId);
    }
    this.resultsByTask.delete(taskId);
    this.tasks.delete(taskId);
    return true;
  }

  async listResultsForTask(taskId: number): Promise<TaskResult[] | undefined> {
    if (!this.tasks.has(taskId)) return undefined;
    return (this.resultsByTask.get(taskId) ?? [])
      .map((id) => this.results.get(id))
      .filter((r): r is TaskResult => r !== undefined)
      .map((r) => ({ ...r }));
  }

  /** Total result rows across all tasks. */
  countResults(): number {
    return this.results.size;
  }
}

export class InMemoryCollaborationDirectory implements CollaborationDirectory {
  private collaborations = new Map<number, Collaboration>();

  constructor(seed: Collaboration[] = []) {
    for (const c of seed) this.upsert(c);
  }

  upsert(collaboration: Collaboration): void {
    this.collaborations.set(collaboration.id, {
      ...collaboration,
      nodes: collaboration.nodes.map((n) => ({ ...n })),
    });
  }

  async resolve(collaborationId: number): Promise<Collaboration | undefined> {
    const c = this.collaborations.get(collaborationId);
    if (!c) return undefined;
    return { ...c, nodes: c.nodes.map((n) => ({ ...n })) };
  }
}
