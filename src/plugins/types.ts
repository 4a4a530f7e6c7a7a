import type { FastifyInstance } from "fastify";

export interface TaskHubEvent {
  type: string;
  at: number;
  taskId?: number;
  collaborationId?: number;
  detail?: Record<string, unknown>;
}

export interface TaskHubPluginContext {
  emit(event: TaskHubEvent): void;
}

export interface TaskHubPlugin {
  name: string;
  register(app: FastifyInstance, ctx: TaskHubPluginContext): void;
}
