import type { Collaboration, CollaborationNode, NewTaskResult } from "../contracts.js";

export const NEW_TASK_EVENT = "new_task";

export function collaborationScope(collaborationId: number): string {
  return `collaboration_${collaborationId}`;
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries.map(([key, v]) => [key, sortKeys(v)]));
  }
  return value;
}

/**
 * Strings pass through untouched; anything else becomes JSON text with object
 * keys sorted. An absent input is stored as "".
 */
export function normalizeInput(input: unknown): string {
  if (input === undefined) return "";
  if (typeof input === "string") return input;
  return JSON.stringify(sortKeys(input)) ?? "";
}

/** Member nodes with repeated ids dropped, first occurrence wins. */
export function snapshotMembers(collaboration: Collaboration): CollaborationNode[] {
  const seen = new Set<number>();
  const members: CollaborationNode[] = [];
  for (const node of collaboration.nodes) {
    if (seen.has(node.id)) continue;
    seen.add(node.id);
    members.push({ ...node });
  }
  return members;
}

export function planResults(members: CollaborationNode[], assignedAt: number): NewTaskResult[] {
  return members.map((node) => ({ nodeId: node.id, assignedAt }));
}
