import type { ProjectConfig } from "../types/config.js";
import { AGUIClient } from "./agui.js";
import type { AgentClient } from "./types.js";

export * from "./agui.js";
export * from "./events.js";
export * from "./types.js";

export interface CreateClientOptions {
  onDebug?: (message: string) => void;
}

/**
 * Create an agent client based on target type
 */
export function createClient(
  config: ProjectConfig,
  options: CreateClientOptions = {}
): AgentClient {
  const target = config.target;
  if (!target) {
    throw new Error("No target configured: add a target to the config file or use --replay");
  }

  switch (target.type) {
    case "agui":
      return new AGUIClient({
        endpoint: target.endpoint,
        agentId: target.agentId,
        headers: target.headers,
        forwardedProps: target.forwardedProps,
        state: target.state,
        maxRetries: target.maxRetries,
        onDebug: options.onDebug,
      });

    default: {
      // Exhaustive check - TypeScript will error if we miss a case
      const _exhaustive: never = target;
      throw new Error(`Unknown target: ${JSON.stringify(_exhaustive)}`);
    }
  }
}
