import type { Socket } from "socket.io";
import { createLogger } from "../lib/logging";
import type { Orchestrator } from "../lib/orchestrator";

const logger = createLogger("socket");

export type Ack<T> = (response: { success: true; data: T } | { success: false; error: string }) => void;

type Payload = Record<string, unknown>;

function asPayload(data: unknown): Payload {
  return typeof data === "object" && data !== null && !Array.isArray(data) ? Object.fromEntries(Object.entries(data)) : {};
}

function readId(payload: Payload, key: string): number {
  const value = payload[key];
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new Error(`${key} must be a positive integer`);
  }
  return value;
}

function readOptionalInt(payload: Payload, key: string): number | undefined {
  const value = payload[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new Error(`${key} must be an integer`);
  }
  return value;
}

function handle<T>(label: string, run: (payload: Payload) => T | Promise<T>) {
  return async (data: unknown, callback: Ack<T>) => {
    try {
      const result = await run(asPayload(data));
      callback({
        success: true,
        data: result
      });
    } catch (error) {
      logger.error(`${label} error:`, error instanceof Error ? error.message : error);
      callback({
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error occurred'
      });
    }
  };
}

export function createDeployHandlers(orchestrator: Orchestrator) {
  return {
    // Queue a manual deployment
    "deploy:trigger": handle("Trigger deployment", (payload) => {
      const repositoryId = readId(payload, "repositoryId");
      return { repositoryId, result: orchestrator.triggerDeploy(repositoryId, readOptionalInt(payload, "priority")) };
    }),

    // Deployment history, newest first
    "deploy:list": handle("List deployments", (payload) =>
      orchestrator.listDeployments({
        repositoryId: payload.repositoryId === undefined ? undefined : readId(payload, "repositoryId"),
        limit: readOptionalInt(payload, "limit"),
      })
    ),

    "deploy:get": handle("Get deployment", (payload) =>
      orchestrator.getDeployment(readId(payload, "deploymentId"))
    ),

    "deploy:repositories": handle("List repositories", () => orchestrator.getRepositoryStates()),

    "deploy:repository": handle("Get repository", (payload) =>
      orchestrator.getRepositoryState(readId(payload, "repositoryId"))
    ),

    "deploy:container-logs": handle("Container logs", (payload) => {
      const containerId = payload.containerId;
      if (typeof containerId !== "string" || containerId === "") {
        throw new Error("containerId is required");
      }
      return orchestrator.tailContainerLogs(containerId, readOptionalInt(payload, "lines") ?? 100);
    }),
  };
}

export default (socket: Socket, orchestrator: Orchestrator) => {
  for (const [event, handler] of Object.entries(createDeployHandlers(orchestrator))) {
    socket.on(event, handler);
  }
}
