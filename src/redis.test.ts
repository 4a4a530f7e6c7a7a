import test from "node:test";
import assert from "node:assert/strict";
import { Redis } from "ioredis";
// ioredis-mock is CJS; cast to ioredis Redis type so tsc is satisfied
import RedisMockDefault from "ioredis-mock";
const RedisMock = RedisMockDefault as unknown as typeof Redis;
import type { NewTask } from "./contracts.js";
import { PersistenceError } from "./errors.js";
import { RedisCollaborationDirectory, RedisTaskStore } from "./persistence/redis-adapter.js";

async function makeRedis() {
  const mock = new RedisMock();
  await mock.flushall(); // ioredis-mock shares state across instances; flush each time
  return mock;
}

const DRAFT: NewTask = {
  schemaVersion: "1.0",
  collaborationId: 1,
  name: "train",
  description: "",
  image: "",
  input: "",
  status: "open",
  createdAt: 1_000,
};

test("redis: createTask commits the task and its results together", async () => {
  const store = new RedisTaskStore(await makeRedis());
  const { task, results } = await store.createTask(DRAFT, [
    { nodeId: 10, assignedAt: 1_000 },
    { nodeId: 11, assignedAt: 1_000 },
    { nodeId: 12, assignedAt: 1_000 },
  ]);

  assert.equal(task.id, 1);
  assert.deepEqual(
    results.map((r) => r.id),
    [1, 2, 3]
  );

  assert.deepEqual(await store.getTask(1), task);
  const stored = await store.listResultsForTask(1);
  assert.deepEqual(stored, results);
});

test("redis: result ids keep increasing across tasks", async () => {
  const store = new RedisTaskStore(await makeRedis());
  await store.createTask(DRAFT, [
    { nodeId: 10, assignedAt: 1 },
    { nodeId: 11, assignedAt: 1 },
  ]);
  const empty = await store.createTask(DRAFT, []);
  const third = await store.createTask(DRAFT, [{ nodeId: 10, assignedAt: 1 }]);

  assert.equal(empty.task.id, 2);
  assert.deepEqual(await store.listResultsForTask(2), []);
  assert.equal(third.task.id, 3);
  assert.equal(third.results[0]?.id, 3);
});

test("redis: duplicate node ids are rejected before anything is written", async () => {
  const redis = await makeRedis();
  const store = new RedisTaskStore(redis);

  await assert.rejects(
    store.createTask(DRAFT, [
      { nodeId: 10, assignedAt: 1 },
      { nodeId: 10, assignedAt: 1 },
    ]),
    PersistenceError
  );

  assert.equal(await store.getTask(1), undefined);
  assert.deepEqual(await store.listTasks(), []);
  assert.deepEqual(await redis.keys("taskresult:*"), []);
});

test("redis: a command failing inside EXEC leaves none of the unit behind", async () => {
  const redis = await makeRedis();
  await redis.set("tasks", "not-a-sorted-set"); // ZADD inside the unit now fails with WRONGTYPE
  const store = new RedisTaskStore(redis);

  await assert.rejects(
    store.createTask(DRAFT, [
      { nodeId: 10, assignedAt: 1 },
      { nodeId: 11, assignedAt: 1 },
    ]),
    (err: unknown) => err instanceof PersistenceError && err.message === "create task id=1 failed"
  );

  assert.equal(await store.getTask(1), undefined);
  assert.equal(await store.listResultsForTask(1), undefined);
  assert.deepEqual(await redis.keys("task:*"), []);
  assert.deepEqual(await redis.keys("taskresult:*"), []);
});

test("redis: listTasks returns tasks in id order", async () => {
  const store = new RedisTaskStore(await makeRedis());
  for (const name of ["a", "b", "c"]) await store.createTask({ ...DRAFT, name }, []);
  assert.deepEqual(
    (await store.listTasks()).map((t) => t.name),
    ["a", "b", "c"]
  );
});

test("redis: deleteTask removes the task, its result index and every result", async () => {
  const redis = await makeRedis();
  const store = new RedisTaskStore(redis);
  const kept = await store.createTask(DRAFT, [{ nodeId: 10, assignedAt: 1 }]);
  const doomed = await store.createTask(DRAFT, [
    { nodeId: 10, assignedAt: 1 },
    { nodeId: 11, assignedAt: 1 },
  ]);

  assert.equal(await store.deleteTask(doomed.task.id), true);

  assert.equal(await store.getTask(doomed.task.id), undefined);
  assert.equal(await store.listResultsForTask(doomed.task.id), undefined);
  assert.equal(await redis.exists(`task:${doomed.task.id}:results`), 0);
  assert.deepEqual(await redis.keys("taskresult:*"), [`taskresult:${kept.results[0]?.id}`]);
  assert.deepEqual(
    (await store.listTasks()).map((t) => t.id),
    [kept.task.id]
  );

  assert.equal(await store.deleteTask(doomed.task.id), false);
});

test("redis: of two concurrent deletes only one succeeds", async () => {
  const store = new RedisTaskStore(await makeRedis());
  const { task } = await store.createTask(DRAFT, [
    { nodeId: 10, assignedAt: 1 },
    { nodeId: 11, assignedAt: 1 },
  ]);

  const outcomes = await Promise.all([store.deleteTask(task.id), store.deleteTask(task.id)]);

  assert.deepEqual(
    outcomes.filter((ok) => ok),
    [true]
  );
  assert.equal(await store.listResultsForTask(task.id), undefined);
});

test("redis: results of a deleted task are reported missing, not empty", async () => {
  const store = new RedisTaskStore(await makeRedis());
  const { task } = await store.createTask(DRAFT, []);
  assert.deepEqual(await store.listResultsForTask(task.id), []);

  await store.deleteTask(task.id);
  assert.equal(await store.listResultsForTask(task.id), undefined);
});

test("redis: a malformed collaboration record is rejected with its id", async () => {
  const redis = await makeRedis();
  const directory = new RedisCollaborationDirectory(redis);
  await redis.set("collaboration:6", JSON.stringify({ id: 6, name: "no-nodes" }));
  await redis.set("collaboration:7", "{not json");

  await assert.rejects(
    directory.resolve(6),
    (err: unknown) =>
      err instanceof PersistenceError && err.message === "collaboration id=6 record is malformed"
  );
  await assert.rejects(
    directory.resolve(7),
    (err: unknown) =>
      err instanceof PersistenceError && err.message === "collaboration id=7 record is not JSON"
  );
});

test("redis: collaboration directory reads snapshots written by the membership service", async () => {
  const directory = new RedisCollaborationDirectory(await makeRedis());
  await directory.upsert({ id: 4, name: "c4", nodes: [{ id: 40, name: "n40" }] });

  assert.deepEqual(await directory.resolve(4), {
    id: 4,
    name: "c4",
    nodes: [{ id: 40, name: "n40" }],
  });
  assert.equal(await directory.resolve(5), undefined);
});
