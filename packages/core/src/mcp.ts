/**
 * Tool response helpers shared by the MCP tools.
 */

import type { Result } from "./result.js";

export type TextContent = { type: "text"; text: string };

/**
 * Shape accepted by McpServer tool callbacks. The index signature keeps it
 * assignable to the SDK's passthrough result type.
 */
export type ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> = {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
  isError?: boolean;
};

export function errorResponse(message: string): ToolResponse<{ success: false; error: string }> {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { success: false, error: message },
    isError: true,
  };
}

export function successResponse<T extends Record<string, unknown>>(
  text: string,
  data: T
): ToolResponse<T & { success: true }> {
  return {
    content: [{ type: "text", text }],
    structuredContent: { ...data, success: true },
  };
}

/**
 * Turn a Result into a tool response: the formatter handles success, the
 * error message becomes an error response.
 */
export function resultToResponse<T, E extends Error | string>(
  result: Result<T, E>,
  formatter: (value: T) => ToolResponse
): ToolResponse {
  if (result.ok) {
    return formatter(result.value);
  }
  return errorResponse(result.error instanceof Error ? result.error.message : result.error);
}
