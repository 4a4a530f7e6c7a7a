import type { FastifyInstance } from "fastify";
import type { TaskHubEvent, TaskHubPlugin, TaskHubPluginContext } from "./types.js";

export interface TelemetrySnapshot {
  counters: Record<string, number>;
  events: TaskHubEvent[];
}

export interface TelemetryPlugin extends TaskHubPlugin {
  snapshot(): TelemetrySnapshot;
}

export function createTelemetryPlugin(options: { maxEvents?: number } = {}): TelemetryPlugin {
  const maxEvents = options.maxEvents ?? 200;
  const counters = new Map<string, number>();
  const events: TaskHubEvent[] = [];

  const increment = (key: string) => counters.set(key, (counters.get(key) ?? 0) + 1);
  const snapshot = (): TelemetrySnapshot => ({
    counters: Object.fromEntries(counters),
    events: [...events],
  });

  return {
    name: "telemetry",
    snapshot,
    register(app: FastifyInstance, ctx: TaskHubPluginContext) {
      app.addHook("onResponse", async (req, reply) => {
        increment("http.requests.total");
        increment(`http.status.${reply.statusCode}`);
        increment(`http.route.${req.method}:${req.routeOptions.url ?? "unmatched"}`);
      });

      const capture = (event: TaskHubEvent) => {
        increment(`event.${event.type}`);
        events.push(event);
        if (events.length > maxEvents) events.shift();
      };

      const originalEmit = ctx.emit;
      ctx.emit = (event) => {
        capture(event);
        originalEmit(event);
      };

      app.get("/v1/plugins/telemetry", async () => ({ ok: true, plugin: "telemetry", ...snapshot() }));
    },
  };
}
