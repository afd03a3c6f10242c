/**
 * Shared types for tool registration.
 */

import type { McpServer } from "@repograph/core";
import type { IndexHolder } from "../infrastructure/IndexHolder.js";

export interface ToolRegistrar {
  (server: McpServer, holder: IndexHolder): void;
}
