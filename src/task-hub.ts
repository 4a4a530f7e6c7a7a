import { PassThrough } from "node:stream";
import Fastify from "fastify";
import type { FastifyError, FastifyInstance } from "fastify";
import type { CreateTaskRequest } from "./contracts.js";
import { loadCollaborations, loadConfig, type TaskHubConfig } from "./config.js";
import { collaborationScope } from "./control/fan-out.js";
import { TaskService } from "./control/task-service.js";
import {
  CollaborationNotFoundError,
  InvalidFieldError,
  MissingFieldError,
  TaskHubError,
} from "./errors.js";
import { RoomNotifier } from "./notifier.js";
import {
  InMemoryCollaborationDirectory,
  InMemoryTaskStore,
  type CollaborationDirectory,
  type TaskStore,
} from "./persistence.js";
import type { TaskHubEvent, TaskHubPlugin } from "./plugins/types.js";
import { createTelemetryPlugin, type TelemetryPlugin } from "./plugins/telemetry-plugin.js";

export interface TaskHubOptions {
  store?: TaskStore;
  directory?: CollaborationDirectory;
  rooms?: RoomNotifier;
  plugins?: TaskHubPlugin[];
  logLevel?: string;
  notifyTimeoutMs?: number;
}

const idParams = {
  type: "object",
  required: ["id"],
  properties: { id: { type: "integer" } },
} as const;

const includeQuery = {
  type: "object",
  properties: { include: { type: "string", enum: ["results"] } },
} as const;

/**
 * Runs before schema validation, which would coerce `true` to 1 and turn an
 * absent body into a generic validation error.
 */
async function checkCreateBody(req: { body: unknown }): Promise<void> {
  const body = req.body;
  if (body === undefined || body === null) throw new MissingFieldError("collaboration_id");
  if (typeof body !== "object" || !("collaboration_id" in body)) return;

  const id = body.collaboration_id;
  if (id !== undefined && id !== null && !Number.isInteger(id)) {
    throw new InvalidFieldError("collaboration_id", "an integer");
  }
}

function principalOf(header: string | string[] | undefined): string | undefined {
  return Array.isArray(header) ? header[0] : header;
}

export function buildTaskHub(options: TaskHubOptions = {}): FastifyInstance {
  const app = Fastify({ logger: { level: options.logLevel ?? "info" } });

  const store = options.store ?? new InMemoryTaskStore();
  const directory = options.directory ?? new InMemoryCollaborationDirectory();
  const rooms = options.rooms ?? new RoomNotifier();

  const ctx = {
    emit(_event: TaskHubEvent) {},
  };

  const defaultTelemetry: TelemetryPlugin | null = options.plugins ? null : createTelemetryPlugin();
  const plugins = options.plugins ?? (defaultTelemetry ? [defaultTelemetry] : []);
  for (const plugin of plugins) {
    plugin.register(app, ctx);
  }

  const tasks = new TaskService({
    store,
    directory,
    notifier: rooms,
    logger: app.log,
    events: ctx,
    notifyTimeoutMs: options.notifyTimeoutMs,
  });

  app.setErrorHandler<FastifyError>((error, req, reply) => {
    if (error instanceof TaskHubError) {
      if (error.statusCode >= 500) req.log.error({ err: error }, error.message);
      return reply.code(error.statusCode).send({ ok: false, error: error.code, msg: error.message });
    }
    if (error.validation) {
      return reply.code(400).send({ ok: false, error: "validation_failed", msg: error.message });
    }

    const status = error.statusCode ?? 500;
    if (status >= 500) req.log.error({ err: error }, "request failed");
    return reply
      .code(status)
      .send({ ok: false, error: status < 500 ? "bad_request" : "internal_error", msg: error.message });
  });

  app.get("/health", async () => ({ ok: true }));

  app.get("/metrics", async (_req, reply) => {
    const allTasks = await store.listTasks();
    const c: Record<string, number> = defaultTelemetry?.snapshot().counters ?? {};

    const lines: string[] = [
      "# HELP taskhub_http_requests_total Total HTTP requests processed",
      "# TYPE taskhub_http_requests_total counter",
      `taskhub_http_requests_total ${c["http.requests.total"] ?? 0}`,
      "# HELP taskhub_tasks_created_total Tasks created since startup",
      "# TYPE taskhub_tasks_created_total counter",
      `taskhub_tasks_created_total ${c["event.task.created"] ?? 0}`,
      "# HELP taskhub_tasks_deleted_total Tasks deleted since startup",
      "# TYPE taskhub_tasks_deleted_total counter",
      `taskhub_tasks_deleted_total ${c["event.task.deleted"] ?? 0}`,
      "# HELP taskhub_notify_failures_total New-task notifications that failed or timed out",
      "# TYPE taskhub_notify_failures_total counter",
      `taskhub_notify_failures_total ${c["event.task.notify_failed"] ?? 0}`,
      "# HELP taskhub_tasks Current number of stored tasks",
      "# TYPE taskhub_tasks gauge",
      `taskhub_tasks ${allTasks.length}`,
      "",
    ];

    reply.header("content-type", "text/plain; version=0.0.4; charset=utf-8");
    return reply.send(lines.join("\n"));
  });

  // ── Notifications ─────────────────────────────────────────────────────────

  app.get<{ Querystring: { collaborationId: number } }>(
    "/v1/events",
    {
      schema: {
        querystring: {
          type: "object",
          required: ["collaborationId"],
          properties: { collaborationId: { type: "integer" } },
        },
      },
    },
    async (req, reply) => {
      const collaborationId = req.query.collaborationId;
      if (!(await directory.resolve(collaborationId))) {
        throw new CollaborationNotFoundError(collaborationId);
      }

      const stream = new PassThrough();
      stream.write(": connected\n\n");

      const unsubscribe = rooms.subscribe(collaborationScope(collaborationId), (event, payload) =>
        stream.write(`event: ${event}\ndata: ${JSON.stringify(payload)}\n\n`)
      );

      const cleanup = () => {
        unsubscribe();
        if (!stream.destroyed) stream.end();
      };
      reply.raw.on("close", cleanup);

      reply.header("content-type", "text/event-stream; charset=utf-8");
      reply.header("cache-control", "no-cache");
      reply.header("x-accel-buffering", "no");
      return reply.send(stream);
    }
  );

  // ── Tasks ─────────────────────────────────────────────────────────────────

  app.get<{ Querystring: { include?: "results" } }>(
    "/v1/tasks",
    { schema: { querystring: includeQuery } },
    async (req) => ({
      ok: true,
      tasks: await tasks.listTasks(req.query.include === "results"),
    })
  );

  app.get<{ Params: { id: number }; Querystring: { include?: "results" } }>(
    "/v1/tasks/:id",
    { schema: { params: idParams, querystring: includeQuery } },
    async (req) => ({
      ok: true,
      task: await tasks.getTask(req.params.id, req.query.include === "results"),
    })
  );

  app.post<{ Body: CreateTaskRequest }>(
    "/v1/tasks",
    {
      preValidation: checkCreateBody,
      schema: {
        body: {
          type: "object",
          properties: {
            collaboration_id: { type: ["integer", "null"] },
            name: { type: "string" },
            description: { type: "string" },
            image: { type: "string" },
            input: {},
          },
        },
      },
    },
    async (req) => {
      const task = await tasks.createTask(req.body, {
        principal: principalOf(req.headers["x-principal"]),
      });
      return { ok: true, task };
    }
  );

  app.delete<{ Params: { id: number } }>(
    "/v1/tasks/:id",
    { schema: { params: idParams } },
    async (req) => ({ ok: true, msg: await tasks.deleteTask(req.params.id) })
  );

  app.get<{ Params: { id: number } }>(
    "/v1/tasks/:id/results",
    { schema: { params: idParams } },
    async (req) => ({ ok: true, results: await tasks.getResults(req.params.id) })
  );

  return app;
}

async function createBackends(
  config: TaskHubConfig
): Promise<{ store: TaskStore; directory: CollaborationDirectory; close(): Promise<void> }> {
  if (config.store === "redis") {
    const { Redis } = await import("ioredis");
    const { RedisTaskStore, RedisCollaborationDirectory } = await import(
      "./persistence/redis-adapter.js"
    );
    const redis = new Redis(config.redisUrl);
    return {
      store: new RedisTaskStore(redis),
      directory: new RedisCollaborationDirectory(redis),
      close: async () => {
        await redis.quit();
      },
    };
  }

  const seed = config.collaborationsFile ? loadCollaborations(config.collaborationsFile) : [];
  return {
    store: new InMemoryTaskStore(),
    directory: new InMemoryCollaborationDirectory(seed),
    close: async () => {},
  };
}

export async function startTaskHub(config: TaskHubConfig = loadConfig()) {
  const backends = await createBackends(config);
  const app = buildTaskHub({
    store: backends.store,
    directory: backends.directory,
    logLevel: config.logLevel,
    notifyTimeoutMs: config.notifyTimeoutMs,
  });
  app.addHook("onClose", async () => backends.close());

  await app.listen({ host: config.host, port: config.port });
  app.log.info(`task hub listening on http://${config.host}:${config.port} (store=${config.store})`);
  return app;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  startTaskHub().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
