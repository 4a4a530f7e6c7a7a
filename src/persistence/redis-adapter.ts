import { Redis, type ChainableCommander } from "ioredis";
import {
  assertDistinctNodes,
  toTaskResult,
  type CollaborationDirectory,
  type CreatedTask,
  type TaskStore,
} from "../persistence.js";
import type { Collaboration, NewTask, NewTaskResult, Task, TaskResult } from "../contracts.js";
import { isCollaboration } from "../config.js";
import { PersistenceError } from "../errors.js";

// Keys:
//   seq:task / seq:taskresult   id counters
//   tasks                       zset of task ids, score = id
//   task:<id>                   Task JSON
//   task:<id>:results           list of result ids, fan-out order
//   taskresult:<id>             TaskResult JSON
//   collaboration:<id>          Collaboration JSON, written by the membership service

export class RedisTaskStore implements TaskStore {
  private readonly redis: Redis;

  constructor(redisOrUrl: Redis | string) {
    this.redis = typeof redisOrUrl === "string" ? new Redis(redisOrUrl) : redisOrUrl;
  }

  // ── Tasks ─────────────────────────────────────────────────────────────────

  async createTask(draft: NewTask, drafts: NewTaskResult[]): Promise<CreatedTask> {
    assertDistinctNodes(drafts);

    let taskId: number;
    let lastResultId: number;
    try {
      taskId = await this.redis.incr("seq:task");
      lastResultId = drafts.length > 0 ? await this.redis.incrby("seq:taskresult", drafts.length) : 0;
    } catch (err) {
      throw new PersistenceError("could not reserve task ids", { cause: err });
    }

    const firstResultId = lastResultId - drafts.length + 1;
    const task: Task = { ...draft, id: taskId };
    const results = drafts.map((d, i) => toTaskResult(taskId, firstResultId + i, d));

    // Ids reserved above are never reused, so a failed unit leaves only a gap.
    const taskKeys = [`task:${taskId}`, `task:${taskId}:results`];
    const resultKeys = results.map((r) => `taskresult:${r.id}`);

    const tx = this.redis.multi();
    tx.set(`task:${taskId}`, JSON.stringify(task));
    tx.zadd("tasks", taskId, String(taskId));
    for (const r of results) tx.set(`taskresult:${r.id}`, JSON.stringify(r));
    if (results.length > 0) {
      tx.rpush(`task:${taskId}:results`, ...results.map((r) => String(r.id)));
    }

    try {
      await this.commit(tx, `create task id=${taskId}`);
    } catch (err) {
      // EXEC does not roll back commands that ran before a failing one.
      await this.discardUnit(taskId, [...taskKeys, ...resultKeys], err);
      throw err;
    }

    return { task, results };
  }

  async getTask(taskId: number): Promise<Task | undefined> {
    const raw = await this.redis.get(`task:${taskId}`);
    if (!raw) return undefined;
    return JSON.parse(raw) as Task;
  }

  async listTasks(): Promise<Task[]> {
    const ids = await this.redis.zrange("tasks", 0, -1);
    const raws = await Promise.all(ids.map((id) => this.redis.get(`task:${id}`)));
    return raws.filter((r): r is string => r !== null).map((r) => JSON.parse(r) as Task);
  }

  async deleteTask(taskId: number): Promise<boolean> {
    const resultIds = await this.redis.lrange(`task:${taskId}:results`, 0, -1);

    // The DEL reply decides: of two concurrent deletes only one removes task:<id>.
    const tx = this.redis.multi();
    tx.del(`task:${taskId}`);
    tx.del(`task:${taskId}:results`, ...resultIds.map((id) => `taskresult:${id}`));
    tx.zrem("tasks", String(taskId));
    const replies = await this.commit(tx, `delete task id=${taskId}`);
    return replies[0]?.[1] === 1;
  }

  async listResultsForTask(taskId: number): Promise<TaskResult[] | undefined> {
    const ids = await this.redis.lrange(`task:${taskId}:results`, 0, -1);

    // Task and result rows are written and deleted in one unit, so reading them
    // in one unit gives either the whole set or a missing task.
    const tx = this.redis.multi();
    tx.exists(`task:${taskId}`);
    if (ids.length > 0) tx.mget(...ids.map((id) => `taskresult:${id}`));
    const replies = await this.commit(tx, `read results of task id=${taskId}`);

    if (replies[0]?.[1] !== 1) return undefined;
    const raws = replies[1]?.[1];
    if (!Array.isArray(raws)) return [];
    return raws
      .filter((r): r is string => typeof r === "string")
      .map((r) => JSON.parse(r) as TaskResult);
  }

  // ── Private helpers ───────────────────────────────────────────────────────

  private async commit(tx: ChainableCommander, what: string): Promise<[Error | null, unknown][]> {
    let replies: [Error | null, unknown][] | null;
    try {
      replies = await tx.exec();
    } catch (err) {
      throw new PersistenceError(`${what} failed`, { cause: err });
    }
    if (!replies) throw new PersistenceError(`${what} aborted`);

    const failed = replies.find(([err]) => err !== null);
    if (failed) throw new PersistenceError(`${what} failed`, { cause: failed[0] });
    return replies;
  }

  private async discardUnit(taskId: number, keys: string[], failure: unknown): Promise<void> {
    try {
      await this.redis.del(...keys);
    } catch (err) {
      throw new PersistenceError(`create task id=${taskId} failed and could not be undone`, {
        cause: new AggregateError([failure, err]),
      });
    }
    // The index may itself be the key that broke the unit; listTasks skips ids
    // without a task row, so a dangling member is harmless.
    if ((await this.redis.type("tasks")) === "zset") {
      await this.redis.zrem("tasks", String(taskId));
    }
  }
}

export class RedisCollaborationDirectory implements CollaborationDirectory {
  private readonly redis: Redis;

  constructor(redisOrUrl: Redis | string) {
    this.redis = typeof redisOrUrl === "string" ? new Redis(redisOrUrl) : redisOrUrl;
  }

  async resolve(collaborationId: number): Promise<Collaboration | undefined> {
    const raw = await this.redis.get(`collaboration:${collaborationId}`);
    if (!raw) return undefined;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new PersistenceError(`collaboration id=${collaborationId} record is not JSON`, { cause: err });
    }
    if (!isCollaboration(parsed)) {
      throw new PersistenceError(`collaboration id=${collaborationId} record is malformed`);
    }
    return parsed;
  }

  /** Seeding helper; membership itself is owned by another service. */
  async upsert(collaboration: Collaboration): Promise<void> {
    await this.redis.set(`collaboration:${collaboration.id}`, JSON.stringify(collaboration));
  }
}
