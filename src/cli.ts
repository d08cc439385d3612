#!/usr/bin/env node
import "./utils/dotenv-config.js";

import { createInterface } from "readline";
import { dispatch, parseArgs, type CommandContext, type ParsedArgs } from "./commands.js";
import { startMCP, SERVER_VERSION } from "./index.js";
import { main as runSetup } from "./install.js";
import { loadConfig } from "./utils/dotenv-config.js";
import { DastoreError, errorMessage } from "./utils/errors.js";
import { PackageManager } from "./utils/pacman.js";
import { getUserConfirmation } from "./utils/prompt.js";
import { openQueue } from "./utils/queue.js";
import { isMainModule, systemRunner } from "./utils/system.js";

export function showHelp() {
  console.log(`
Dastore - package manager for Arch Linux

Usage:
  dastore <command> [options]
  dastore                       Start an interactive session

Commands:
  search <query>                Search the repositories
  info <package>                Show package details
  install <package>             Install a package
  remove <package>              Remove an installed package
  update <package>              Update a single package
  upgrade                       Update all packages
  queue [list]                  Show the install queue
  queue add <package...>        Add packages to the queue
  queue remove <package...>     Remove packages from the queue
  queue clear                   Empty the queue
  queue install                 Install every queued package
  setup                         Install Dastore system-wide
  mcp                           Start the MCP server on stdio

Options:
  --yes, -y                     Do not ask for confirmation
  --verbose                     Show pacman output while operations run
  --version, -v                 Show the version
  --help, -h                    Show this help message

Environment Variables:
  You can also set these values using environment variables or a .env file:
  DASTORE_INSTALL_DIR           Installation directory (default: /opt/dastore)
  DASTORE_ELEVATE               Command used to run pacman as root (default: pkexec)
  DASTORE_SUDO                  Command used by the installer (default: sudo)
  DASTORE_AUR_HELPER            AUR helper installed by setup (default: yay)
  DASTORE_SEARCH_LIMIT          Maximum search results (default: 50)
  DASTORE_LOG_LEVEL             debug, info, warn or error (default: warn)
  DASTORE_STATE_DIR             Queue and transaction logs (default: $XDG_STATE_HOME/dastore)
  DASTORE_QUERY_TIMEOUT_MS      Timeout for pacman queries (default: 10000)
  DASTORE_ENV_FILE              .env file to load (default: .env in the install directory)

Examples:
  dastore search firefox
  dastore queue add vlc gimp && dastore queue install --yes
  `);
}

function createContext(confirm: (question: string) => Promise<boolean>, signal?: AbortSignal): CommandContext {
  const config = loadConfig();
  return {
    config,
    runner: systemRunner,
    manager: new PackageManager({
      runner: systemRunner,
      searchLimit: config.searchLimit,
      timeoutMs: config.queryTimeoutMs,
    }),
    queue: openQueue(config.stateDir),
    print: (line) => console.log(line),
    printError: (line) => console.error(line),
    write: (text) => {
      process.stdout.write(text);
    },
    confirm,
    setup: () => runSetup(),
    signal,
  };
}

// Ctrl+C cancels the running transaction instead of killing the CLI outright
async function runWithCancel(
  parsed: ParsedArgs,
  confirm: (question: string) => Promise<boolean>
): Promise<number> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);
  try {
    return await dispatch(createContext(confirm, controller.signal), parsed);
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

export interface InterruptSource {
  on(event: "SIGINT", listener: () => void): unknown;
}

/**
 * Sends Ctrl+C to the command that is running. With nothing running, `idle`
 * is called instead.
 */
export function createInterruptScope(source: InterruptSource, idle: () => void) {
  let current: AbortController | null = null;
  source.on("SIGINT", () => {
    if (current) {
      current.abort();
    } else {
      idle();
    }
  });

  return {
    async run<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
      const controller = new AbortController();
      current = controller;
      try {
        return await task(controller.signal);
      } finally {
        current = null;
      }
    },
  };
}

export interface Questioner {
  question(query: string, options: { signal?: AbortSignal }, callback: (answer: string) => void): void;
}

/**
 * Yes/no confirmation on an open readline session. A cancelled command
 * answers no.
 */
export function askWithSignal(rl: Questioner, signal: AbortSignal) {
  return (question: string) =>
    new Promise<boolean>((resolve) => {
      if (signal.aborted) {
        resolve(false);
        return;
      }
      signal.addEventListener("abort", () => resolve(false), { once: true });
      rl.question(`${question} (y/n): `, { signal }, (answer) => {
        resolve(answer.trim().toLowerCase().startsWith("y"));
      });
    });
}

/**
 * Interactive prompt reading one command per line
 */
async function interactive(): Promise<number> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "dastore> ",
  });
  const scope = createInterruptScope(rl, () => {
    console.log("\nType 'exit' to leave.");
    rl.prompt();
  });

  console.log("Dastore - package manager for Arch Linux. Type 'help' for commands, 'exit' to leave.");
  rl.prompt();
  for await (const line of rl) {
    const words = line.trim().split(/\s+/).filter((word) => word);
    if (words[0] === "exit" || words[0] === "quit") {
      break;
    }
    if (words[0] === "help") {
      showHelp();
    } else if (words.length > 0) {
      const parsed = parseArgs(words);
      if (parsed.command === "mcp") {
        console.error("The MCP server cannot run inside an interactive session");
      } else {
        await scope.run((signal) => dispatch(createContext(askWithSignal(rl, signal), signal), parsed));
      }
    }
    rl.prompt();
  }
  rl.close();
  return 0;
}

export async function run(argv: string[]): Promise<number> {
  const parsed = parseArgs(argv);

  if (parsed.help) {
    showHelp();
    return 0;
  }
  if (parsed.version) {
    console.log(SERVER_VERSION);
    return 0;
  }
  if (parsed.command === undefined) {
    if (process.stdin.isTTY) {
      return interactive();
    }
    showHelp();
    return 1;
  }
  if (parsed.command === "mcp") {
    await startMCP();
    return 0;
  }
  return runWithCancel(parsed, getUserConfirmation);
}

if (isMainModule(import.meta.url)) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(error instanceof DastoreError ? error.exitCode : 1);
    });
}
