import { spawn } from "child_process";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { CommandError } from "./errors.js";
import { createSubLogger } from "./logger.js";

const log = createSubLogger("system");

export interface RunOptions {
  cwd?: string;
  /** Merged over process.env */
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  /** Collect stdout/stderr instead of passing them through to the terminal */
  capture?: boolean;
  /** Written to stdin right after the process starts */
  input?: string;
  /** Called for each output line; a returned string is written to stdin */
  onLine?: (line: string) => string | void;
  signal?: AbortSignal;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Set when the run was stopped through the abort signal */
  aborted?: boolean;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
  /** Whether `command` resolves to an executable on PATH */
  exists(command: string): Promise<boolean>;
}

/**
 * Looks up an executable on a PATH string
 */
export async function findExecutable(
  command: string,
  searchPath: string = process.env.PATH ?? ""
): Promise<string | null> {
  const candidates = command.includes("/")
    ? [command]
    : searchPath
        .split(path.delimiter)
        .filter((dir) => dir)
        .map((dir) => path.join(dir, command));

  for (const candidate of candidates) {
    try {
      await fs.promises.access(candidate, fs.constants.X_OK);
      const stat = await fs.promises.stat(candidate);
      if (stat.isFile()) {
        return candidate;
      }
    } catch {
      // not here, keep looking
    }
  }
  return null;
}

/**
 * Prepends an elevation command (sudo, pkexec) when one is configured
 */
export function withPrefix(prefix: string, command: string, args: string[]): [string, string[]] {
  const parts = prefix.trim().split(/\s+/).filter((part) => part);
  if (parts.length === 0) {
    return [command, args];
  }
  const [head, ...rest] = parts;
  return [head, [...rest, command, ...args]];
}

function splitLines(onLine: (line: string) => void): {
  push: (chunk: string) => void;
  flush: () => void;
} {
  let pending = "";
  return {
    push(chunk) {
      pending += chunk;
      let index = pending.indexOf("\n");
      while (index !== -1) {
        onLine(pending.slice(0, index + 1));
        pending = pending.slice(index + 1);
        index = pending.indexOf("\n");
      }
    },
    flush() {
      if (pending) {
        onLine(pending);
        pending = "";
      }
    },
  };
}

/**
 * Runs commands as child processes
 */
export const systemRunner: CommandRunner = {
  run(command, args, options = {}) {
    const streaming = Boolean(options.capture || options.onLine);
    log.debug(`Running: ${[command, ...args].join(" ")}`, { cwd: options.cwd });

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        stdio: [options.input !== undefined || options.onLine ? "pipe" : "inherit", streaming ? "pipe" : "inherit", streaming ? "pipe" : "inherit"],
        signal: options.signal,
        timeout: options.timeoutMs,
      });

      let stdout = "";
      let stderr = "";
      let aborted = false;

      const writeInput = (text: string): void => {
        if (child.stdin && child.stdin.writable) {
          child.stdin.write(text);
        }
      };

      const handleLine = (line: string): void => {
        const reply = options.onLine?.(line);
        if (typeof reply === "string") {
          writeInput(reply);
        }
      };
      // One buffer per stream so a partial line never absorbs the other stream's output
      const stdoutLines = splitLines(handleLine);
      const stderrLines = splitLines(handleLine);

      child.stdout?.setEncoding("utf8");
      child.stderr?.setEncoding("utf8");
      child.stdout?.on("data", (chunk: string) => {
        stdout += chunk;
        stdoutLines.push(chunk);
      });
      child.stderr?.on("data", (chunk: string) => {
        stderr += chunk;
        stderrLines.push(chunk);
      });
      child.stdin?.on("error", (error) => {
        // The process may exit before reading everything we send
        log.debug("stdin closed early", { command, error });
      });

      if (options.input !== undefined) {
        writeInput(options.input);
      }
      if (options.input !== undefined && !options.onLine) {
        child.stdin?.end();
      }

      child.on("error", (error: NodeJS.ErrnoException) => {
        if (error.name === "AbortError") {
          aborted = true;
          return;
        }
        reject(new CommandError(command, args, 127, error.message, { cause: error }));
      });

      child.on("close", (code, signal) => {
        stdoutLines.flush();
        stderrLines.flush();
        const exitCode = code ?? (signal ? 128 : 1);
        log.debug(`Finished: ${command}`, { exitCode, signal });
        resolve({ exitCode, stdout, stderr, aborted: aborted || undefined });
      });
    });
  },

  async exists(command) {
    return (await findExecutable(command)) !== null;
  },
};

/**
 * Runs a command and throws CommandError when it exits non-zero
 */
export async function runOrThrow(
  runner: CommandRunner,
  command: string,
  args: string[],
  options?: RunOptions
): Promise<CommandResult> {
  const result = await runner.run(command, args, options);
  if (result.exitCode !== 0) {
    throw new CommandError(command, args, result.exitCode, result.stderr);
  }
  return result;
}

/**
 * Whether the module at `metaUrl` is the script node was started with
 */
export function isMainModule(metaUrl: string): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    // bin links point at the real file
    return fileURLToPath(metaUrl) === fs.realpathSync(script);
  } catch {
    return false;
  }
}
