export type SchemaVersion = "1.0";

export interface CollaborationNode {
  id: number;
  name: string;
}

/** Point-in-time view of a collaboration and its member nodes. */
export interface Collaboration {
  id: number;
  name: string;
  nodes: CollaborationNode[];
}

export interface CreateTaskRequest {
  collaboration_id?: number | null;
  name?: string;
  description?: string;
  image?: string;
  /** Stored verbatim when a string, serialized to canonical JSON otherwise. */
  input?: unknown;
}

export interface Task {
  schemaVersion: SchemaVersion;
  id: number;
  collaborationId: number;
  name: string;
  description: string;
  image: string;
  input: string;
  /** "open" on creation; later transitions are written by nodes. */
  status: string;
  createdAt: number;
}

export interface TaskResult {
  schemaVersion: SchemaVersion;
  id: number;
  taskId: number;
  nodeId: number;
  result: string | null;
  log: string | null;
  assignedAt: number;
  startedAt: number | null;
  finishedAt: number | null;
}

export type NewTask = Omit<Task, "id">;
export type NewTaskResult = Pick<TaskResult, "nodeId" | "assignedAt">;

export interface TaskView extends Task {
  results?: TaskResult[];
}
