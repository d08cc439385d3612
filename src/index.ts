#!/usr/bin/env node
import "./utils/dotenv-config.js";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { formatPackageDetails, formatPackageRow } from "./commands.js";
import { loadConfig } from "./utils/dotenv-config.js";
import { errorMessage } from "./utils/errors.js";
import { createSubLogger } from "./utils/logger.js";
import { MIN_QUERY_LENGTH, PackageManager, PackageNameSchema } from "./utils/pacman.js";
import { openQueue, type PackageQueue } from "./utils/queue.js";
import { isMainModule, systemRunner, type CommandRunner } from "./utils/system.js";
import {
  executeOperation,
  installQueue,
  operationTitle,
  transactionLogsDir,
  type OperationRequest,
  type TransactionOptions,
  type TransactionResult,
} from "./utils/transaction.js";

const log = createSubLogger("mcp");

export const SERVER_NAME = "dastore";
export const SERVER_VERSION = "2.0.0";

export interface ToolDependencies {
  manager: PackageManager;
  queue: PackageQueue;
  runner: CommandRunner;
  elevateCommand: string;
  logsDir?: string;
}

/**
 * The part of the SDK's per-request context the tools use. Its signal fires
 * when the client cancels the call.
 */
export interface ToolCallExtra {
  signal?: AbortSignal;
}

function text(lines: string[] | string): CallToolResult {
  return {
    content: [{ type: "text", text: Array.isArray(lines) ? lines.join("\n") : lines }],
  };
}

function failure(error: unknown): CallToolResult {
  return { ...text(`Error: ${errorMessage(error)}`), isError: true };
}

function describeResult(title: string, result: TransactionResult): CallToolResult {
  const summary =
    result.status === "succeeded"
      ? `${title}: completed successfully`
      : result.status === "cancelled"
        ? `${title}: cancelled`
        : `${title}: failed${result.exitCode !== null ? ` (exit code ${result.exitCode})` : ""}`;
  return { ...text([summary, "", result.log.trimEnd()]), isError: result.status !== "succeeded" };
}

/**
 * Tool implementations, independent of the transport
 */
export function createToolHandlers(deps: ToolDependencies) {
  const { manager, queue } = deps;

  const guard = async (fn: () => Promise<CallToolResult>): Promise<CallToolResult> => {
    try {
      return await fn();
    } catch (error) {
      log.warn("Tool call failed", { error });
      return failure(error);
    }
  };

  const transactionOptions = (extra?: ToolCallExtra): TransactionOptions => ({
    runner: deps.runner,
    elevateCommand: deps.elevateCommand,
    logsDir: deps.logsDir,
    signal: extra?.signal,
  });

  const operate = (request: OperationRequest, extra?: ToolCallExtra) =>
    guard(async () => {
      const result = await executeOperation(request, transactionOptions(extra));
      return describeResult(operationTitle(request), result);
    });

  return {
    searchPackages: ({ query }: { query: string }) =>
      guard(async () => {
        if (query.trim().length < MIN_QUERY_LENGTH) {
          return failure(`Search query must be at least ${MIN_QUERY_LENGTH} characters`);
        }
        const packages = await manager.search(query);
        if (packages.length === 0) {
          return text("No packages found");
        }
        return text(packages.flatMap((pkg) => formatPackageRow(pkg)));
      }),

    packageDetails: ({ name }: { name: string }) =>
      guard(async () => text(formatPackageDetails(await manager.details(name)))),

    installPackage: ({ name }: { name: string }, extra?: ToolCallExtra) =>
      operate({ type: "install", package: name }, extra),

    uninstallPackage: ({ name }: { name: string }, extra?: ToolCallExtra) =>
      operate({ type: "uninstall", package: name }, extra),

    updatePackage: ({ name }: { name: string }, extra?: ToolCallExtra) =>
      operate({ type: "update", package: name }, extra),

    systemUpdate: (extra?: ToolCallExtra) => operate({ type: "system_update" }, extra),

    queueAdd: ({ names }: { names: string[] }) =>
      guard(async () => {
        const lines: string[] = [];
        for (const name of names) {
          const pkg = await manager.details(name);
          if (pkg.installed) {
            lines.push(`${name} is already installed`);
          } else if (queue.add(pkg)) {
            lines.push(`Added ${name} to queue`);
          } else {
            lines.push(`${name} is already in the queue`);
          }
        }
        return text(lines);
      }),

    queueRemove: ({ names }: { names: string[] }) =>
      guard(async () =>
        text(
          names.map((name) => {
            if (!queue.has(name)) {
              return `${name} is not in the queue`;
            }
            queue.remove(name);
            return `Removed ${name} from queue`;
          })
        )
      ),

    queueList: () =>
      guard(async () =>
        queue.size === 0 ? text("Queue is empty") : text(queue.packages.flatMap((pkg) => formatPackageRow(pkg)))
      ),

    queueClear: () =>
      guard(async () => {
        queue.clear();
        return text("Queue cleared");
      }),

    queueInstall: (extra?: ToolCallExtra) =>
      guard(async () => {
        if (queue.size === 0) {
          return failure("Queue is empty");
        }
        const result = await installQueue(queue, transactionOptions(extra));
        return describeResult("Installing Queue", result);
      }),
  };
}

const packageName = PackageNameSchema.describe("Exact package name, e.g. firefox");
const packageNames = z.array(PackageNameSchema).min(1).describe("Package names");

/**
 * Creates the MCP server with every package tool registered
 */
export function createServer(deps: ToolDependencies): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });
  const handlers = createToolHandlers(deps);

  server.tool(
    "search_packages",
    "Search the Arch Linux repositories, most relevant packages first",
    { query: z.string().describe(`Search text, at least ${MIN_QUERY_LENGTH} characters`) },
    handlers.searchPackages
  );
  server.tool(
    "package_details",
    "Show repository, sizes, license and dependencies of a package",
    { name: packageName },
    handlers.packageDetails
  );
  server.tool("install_package", "Install a package with pacman", { name: packageName }, handlers.installPackage);
  server.tool("uninstall_package", "Remove an installed package", { name: packageName }, handlers.uninstallPackage);
  server.tool("update_package", "Update a single package", { name: packageName }, handlers.updatePackage);
  server.tool("system_update", "Update all packages on the system", handlers.systemUpdate);
  server.tool("queue_add", "Add packages to the install queue", { names: packageNames }, handlers.queueAdd);
  server.tool("queue_remove", "Remove packages from the install queue", { names: packageNames }, handlers.queueRemove);
  server.tool("queue_list", "List queued packages", handlers.queueList);
  server.tool("queue_clear", "Empty the install queue", handlers.queueClear);
  server.tool("queue_install", "Install every queued package in one transaction", handlers.queueInstall);

  return server;
}

/**
 * Starts the MCP server on stdio
 */
export async function startMCP(): Promise<void> {
  const config = loadConfig();
  const server = createServer({
    manager: new PackageManager({
      runner: systemRunner,
      searchLimit: config.searchLimit,
      timeoutMs: config.queryTimeoutMs,
    }),
    queue: openQueue(config.stateDir),
    runner: systemRunner,
    elevateCommand: config.elevateCommand,
    logsDir: transactionLogsDir(config.stateDir),
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("Dastore MCP server running on stdio");
}

if (isMainModule(import.meta.url)) {
  startMCP().catch((error) => {
    console.error("Error starting MCP server:", error);
    process.exit(1);
  });
}
