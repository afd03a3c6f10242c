/**
 * Stdio MCP server lifecycle.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createLogger } from "./logger.js";

const log = createLogger("server");

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;
  createServices: () => S | Promise<S>;
  registerTools: (server: McpServer, services: S) => void;
  /** Runs before the transport connects. */
  onStartup?: (services: S) => Promise<void> | void;
  onShutdown?: (services: S) => Promise<void> | void;
}

/**
 * Create services, register tools, install signal handlers and connect the
 * stdio transport.
 *
 * @example
 * ```typescript
 * await bootstrapServer({
 *   config: { name: "repograph", version: "0.1.0" },
 *   createServices: () => ({ holder: new IndexHolder() }),
 *   registerTools: registerAllTools,
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;

  const services = await createServices();
  const server = new McpServer({ name: config.name, version: config.version });
  registerTools(server, services);

  const transport = new StdioServerTransport();

  const shutdown = async (): Promise<void> => {
    await onShutdown?.(services);
    await server.close();
    process.exit(0);
  };
  const onSignal = (signal: string): void => {
    log.info(`Received ${signal}, shutting down`);
    shutdown().catch((error: unknown) => {
      log.error("Shutdown failed", { error: String(error) });
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  await onStartup?.(services);
  await server.connect(transport);
  log.info(`${config.name} ${config.version} listening on stdio`);
}

/**
 * Entry point wrapper: any bootstrap failure is logged and exits with 1.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    log.error("Fatal error", { error: error instanceof Error ? error.stack ?? error.message : String(error) });
    process.exit(1);
  });
}

export { McpServer };
