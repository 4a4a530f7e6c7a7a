import test from "node:test";
import assert from "node:assert/strict";
import { InMemoryCollaborationDirectory } from "./persistence.js";
import { buildTaskHub } from "./task-hub.js";

function build() {
  const directory = new InMemoryCollaborationDirectory([
    { id: 1, name: "one", nodes: [{ id: 10, name: "n10" }] },
  ]);
  return buildTaskHub({ directory, logLevel: "silent" });
}

function metricValue(body: string, name: string): number | undefined {
  const line = body.split("\n").find((l) => l.startsWith(`${name} `));
  return line === undefined ? undefined : Number(line.slice(name.length + 1));
}

test("GET /metrics returns 200 with Prometheus text content-type", async () => {
  const app = build();
  await app.ready();

  const res = await app.inject({ method: "GET", url: "/metrics" });
  assert.equal(res.statusCode, 200);
  assert.ok(res.headers["content-type"]?.includes("text/plain"));

  await app.close();
});

test("GET /metrics counts created and deleted tasks", async () => {
  const app = build();
  await app.ready();

  for (const name of ["a", "b"]) {
    await app.inject({ method: "POST", url: "/v1/tasks", payload: { collaboration_id: 1, name } });
  }
  await app.inject({ method: "DELETE", url: "/v1/tasks/1" });

  const body = (await app.inject({ method: "GET", url: "/metrics" })).body;
  assert.equal(metricValue(body, "taskhub_tasks_created_total"), 2);
  assert.equal(metricValue(body, "taskhub_tasks_deleted_total"), 1);
  assert.equal(metricValue(body, "taskhub_notify_failures_total"), 0);
  assert.equal(metricValue(body, "taskhub_tasks"), 1);
  assert.notEqual(metricValue(body, "taskhub_http_requests_total"), undefined);

  await app.close();
});

test("GET /v1/plugins/telemetry exposes counters and recent events", async () => {
  const app = build();
  await app.ready();
  await app.inject({ method: "POST", url: "/v1/tasks", payload: { collaboration_id: 1 } });

  const res = await app.inject({ method: "GET", url: "/v1/plugins/telemetry" });
  const body = res.json();
  assert.equal(body.plugin, "telemetry");
  assert.equal(body.counters["event.task.created"], 1);
  assert.equal(body.events[0].type, "task.created");
  assert.equal(body.events[0].taskId, 1);

  await app.close();
});

test("custom plugins replace the default telemetry", async () => {
  const seen: string[] = [];
  const directory = new InMemoryCollaborationDirectory([{ id: 1, name: "one", nodes: [] }]);
  const app = buildTaskHub({
    directory,
    logLevel: "silent",
    plugins: [
      {
        name: "recorder",
        register(_app, ctx) {
          const prev = ctx.emit;
          ctx.emit = (event) => {
            seen.push(event.type);
            prev(event);
          };
        },
      },
    ],
  });
  await app.ready();

  await app.inject({ method: "POST", url: "/v1/tasks", payload: { collaboration_id: 1 } });
  assert.deepEqual(seen, ["task.created"]);

  const body = (await app.inject({ method: "GET", url: "/metrics" })).body;
  assert.equal(metricValue(body, "taskhub_tasks_created_total"), 0);

  await app.close();
});
