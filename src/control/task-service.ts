import type { FastifyBaseLogger } from "fastify";
import type { CreateTaskRequest, NewTask, Task, TaskResult, TaskView } from "../contracts.js";
import {
  CollaborationNotFoundError,
  MissingFieldError,
  NotFoundError,
  NotificationError,
  PersistenceError,
} from "../errors.js";
import type { Notifier } from "../notifier.js";
import type { CollaborationDirectory, TaskStore } from "../persistence.js";
import type { TaskHubPluginContext } from "../plugins/types.js";
import {
  NEW_TASK_EVENT,
  collaborationScope,
  normalizeInput,
  planResults,
  snapshotMembers,
} from "./fan-out.js";

export type TaskLogger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;

export interface TaskServiceDeps {
  store: TaskStore;
  directory: CollaborationDirectory;
  notifier: Notifier;
  logger: TaskLogger;
  events?: TaskHubPluginContext;
  notifyTimeoutMs?: number;
}

export interface CreateTaskContext {
  /** Acting principal, recorded in the audit log only. */
  principal?: string;
}

function withTimeout<T>(work: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

export class TaskService {
  private readonly store: TaskStore;
  private readonly directory: CollaborationDirectory;
  private readonly notifier: Notifier;
  private readonly logger: TaskLogger;
  private readonly events: TaskHubPluginContext | undefined;
  private readonly notifyTimeoutMs: number;

  constructor(deps: TaskServiceDeps) {
    this.store = deps.store;
    this.directory = deps.directory;
    this.notifier = deps.notifier;
    this.logger = deps.logger;
    this.events = deps.events;
    this.notifyTimeoutMs = deps.notifyTimeoutMs ?? 2_000;
  }

  async createTask(request: CreateTaskRequest, context: CreateTaskContext = {}): Promise<Task> {
    const collaborationId = request.collaboration_id;
    if (collaborationId === undefined || collaborationId === null) {
      this.logger.error({ body: request }, "task request without collaboration_id");
      throw new MissingFieldError("collaboration_id");
    }

    const collaboration = await this.directory.resolve(collaborationId);
    if (!collaboration) throw new CollaborationNotFoundError(collaborationId);

    const now = Date.now();
    const draft: NewTask = {
      schemaVersion: "1.0",
      collaborationId: collaboration.id,
      name: request.name ?? "",
      description: request.description ?? "",
      image: request.image ?? "",
      input: normalizeInput(request.input),
      status: "open",
      createdAt: now,
    };
    const members = snapshotMembers(collaboration);

    let created: Task;
    try {
      ({ task: created } = await this.store.createTask(draft, planResults(members, now)));
    } catch (err) {
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(
        `could not create task for collaboration id=${collaboration.id}`,
        { cause: err }
      );
    }

    this.logger.info(
      { taskId: created.id, collaborationId: collaboration.id },
      `New task created for collaboration '${collaboration.name}'`
    );
    this.logger.debug(
      { taskId: created.id, principal: context.principal ?? null, name: created.name, image: created.image },
      `Assigning task to ${members.length} nodes`
    );
    this.events?.emit({
      type: "task.created",
      at: Date.now(),
      taskId: created.id,
      collaborationId: collaboration.id,
      detail: { results: members.length },
    });

    await this.notifyNewTask(created);
    return created;
  }

  async getTask(taskId: number, includeResults = false): Promise<TaskView> {
    const task = await this.store.getTask(taskId);
    if (!task) throw new NotFoundError(taskId);
    return includeResults ? this.withResults(task) : task;
  }

  async listTasks(includeResults = false): Promise<TaskView[]> {
    const tasks = await this.store.listTasks();
    if (!includeResults) return tasks;
    return Promise.all(tasks.map((t) => this.withResults(t)));
  }

  async getResults(taskId: number): Promise<TaskResult[]> {
    const results = await this.store.listResultsForTask(taskId);
    if (!results) throw new NotFoundError(taskId);
    return results;
  }

  async deleteTask(taskId: number): Promise<string> {
    let deleted: boolean;
    try {
      deleted = await this.store.deleteTask(taskId);
    } catch (err) {
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(`could not delete task id=${taskId}`, { cause: err });
    }
    if (!deleted) throw new NotFoundError(taskId);

    this.events?.emit({ type: "task.deleted", at: Date.now(), taskId });
    return `task id=${taskId} successfully deleted`;
  }

  private async withResults(task: Task): Promise<TaskView> {
    // A concurrent delete between the two reads leaves the task with no rows.
    const results = (await this.store.listResultsForTask(task.id)) ?? [];
    return { ...task, results };
  }

  private async notifyNewTask(task: Task): Promise<void> {
    const scope = collaborationScope(task.collaborationId);
    try {
      await withTimeout(
        Promise.resolve(this.notifier.emit(NEW_TASK_EVENT, task.id, scope)),
        this.notifyTimeoutMs,
        `notify ${scope}`
      );
    } catch (err) {
      const failure = new NotificationError(scope, { cause: err });
      this.logger.warn({ err: failure, taskId: task.id }, failure.message);
      this.events?.emit({
        type: "task.notify_failed",
        at: Date.now(),
        taskId: task.id,
        collaborationId: task.collaborationId,
      });
    }
  }
}
