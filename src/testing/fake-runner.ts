import type { CommandResult, CommandRunner, RunOptions } from "../utils/system.js";

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions;
  /** Everything written to stdin: the initial input, then replies to output lines */
  stdin: string[];
}

type Reply = Partial<CommandResult> | undefined;
type Handler = (call: RecordedCall) => Reply | Promise<Reply>;

/**
 * In-process stand-in for pacman, git, sudo and friends
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  readonly executables = new Set<string>();
  private readonly handlers: Array<{ prefix: string[]; handle: Handler }> = [];

  /**
   * Answers every call whose command line starts with `prefix`. Earlier
   * registrations win.
   */
  on(prefix: string[], reply: Handler | Partial<CommandResult>): this {
    const handle: Handler = typeof reply === "function" ? reply : () => reply;
    this.handlers.push({ prefix, handle });
    return this;
  }

  async run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const call: RecordedCall = { command, args, options, stdin: [] };
    this.calls.push(call);
    if (options.input !== undefined) {
      call.stdin.push(options.input);
    }

    const line = [command, ...args];
    const match = this.handlers.find(({ prefix }) => prefix.every((part, i) => line[i] === part));
    const reply = match ? await match.handle(call) : undefined;
    const result: CommandResult = { exitCode: 0, stdout: "", stderr: "", ...reply };

    if (options.onLine && result.stdout) {
      for (const outputLine of result.stdout.split(/(?<=\n)/)) {
        const answer = options.onLine(outputLine);
        if (typeof answer === "string") {
          call.stdin.push(answer);
        }
      }
    }
    return result;
  }

  async exists(command: string): Promise<boolean> {
    return this.executables.has(command);
  }

  commandLines(): string[] {
    return this.calls.map((call) => [call.command, ...call.args].join(" "));
  }
}
