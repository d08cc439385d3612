import { describe, expect, it } from "vitest";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { createServer, createToolHandlers } from "./index.js";
import { FakeRunner } from "./testing/fake-runner.js";
import { PackageManager, createPackageInfo } from "./utils/pacman.js";
import { PackageQueue } from "./utils/queue.js";

function setup(runner = new FakeRunner(), queue = new PackageQueue()) {
  const handlers = createToolHandlers({
    manager: new PackageManager({ runner }),
    queue,
    runner,
    elevateCommand: "pkexec",
  });
  return { handlers, runner, queue };
}

function textOf(result: CallToolResult): string {
  const [first] = result.content;
  return first?.type === "text" ? first.text : "";
}

describe("MCP tool handlers", () => {
  it("should return ranked search results as text", async () => {
    const runner = new FakeRunner().on(["pacman", "-Ss"], {
      stdout: "extra/vlc-git 4.0-1\n    Nightly\nextra/vlc 3.0.21-1\n    Player\n",
    });
    const { handlers } = setup(runner);

    const result = await handlers.searchPackages({ query: "vlc" });

    expect(result.isError).toBeUndefined();
    expect(textOf(result)).toBe("vlc 3.0.21-1 • extra\n    Player\nvlc-git 4.0-1 • extra\n    Nightly");
  });

  it("should flag short queries as errors", async () => {
    const { handlers, runner } = setup();

    const result = await handlers.searchPackages({ query: "v" });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe("Error: Search query must be at least 2 characters");
    expect(runner.calls).toHaveLength(0);
  });

  it("should turn thrown errors into error results", async () => {
    const runner = new FakeRunner().on(["pacman"], { exitCode: 1 });
    const { handlers } = setup(runner);

    const result = await handlers.packageDetails({ name: "nope" });

    expect(result).toEqual({ content: [{ type: "text", text: "Error: Package not found: nope" }], isError: true });
  });

  it("should summarise a finished transaction", async () => {
    const runner = new FakeRunner().on(["pkexec"], { stdout: "done\n" });
    const { handlers } = setup(runner);

    const result = await handlers.installPackage({ name: "vlc" });

    expect(result.isError).toBe(false);
    expect(textOf(result)).toBe(
      [
        "Installing vlc: completed successfully",
        "",
        "Running: pkexec pacman -S --noconfirm -- vlc",
        "",
        "done",
        "",
        "✓ Operation completed successfully!",
      ].join("\n")
    );
  });

  it("should report the exit code of a failed transaction", async () => {
    const runner = new FakeRunner().on(["pkexec"], { exitCode: 1 });
    const { handlers } = setup(runner);

    const result = await handlers.systemUpdate();

    expect(result.isError).toBe(true);
    expect(textOf(result).split("\n")[0]).toBe("System Update: failed (exit code 1)");
  });

  it("should refuse package names that look like options", async () => {
    const { handlers, runner } = setup();

    const install = await handlers.installPackage({ name: "--config=/tmp/evil.conf" });
    const uninstall = await handlers.uninstallPackage({ name: "-dd" });

    expect(install).toEqual({
      content: [{ type: "text", text: "Error: Invalid package name: --config=/tmp/evil.conf" }],
      isError: true,
    });
    expect(textOf(uninstall)).toBe("Error: Invalid package name: -dd");
    expect(runner.calls).toHaveLength(0);
  });

  it("should pass the request's cancellation signal to the transaction", async () => {
    const controller = new AbortController();
    const runner = new FakeRunner().on(["pkexec"], (call) => {
      expect(call.options.signal).toBe(controller.signal);
      controller.abort();
      return { exitCode: 143, aborted: true };
    });
    const { handlers } = setup(runner);

    const result = await handlers.systemUpdate({ signal: controller.signal });

    expect(result.isError).toBe(true);
    expect(textOf(result).split("\n")[0]).toBe("System Update: cancelled");
    expect(runner.calls).toHaveLength(1);
  });

  it("should not start a transaction for an already cancelled request", async () => {
    const controller = new AbortController();
    controller.abort();
    const queue = new PackageQueue([createPackageInfo({ name: "vlc" })]);
    const { handlers, runner } = setup(new FakeRunner(), queue);

    const install = await handlers.installPackage({ name: "vlc" }, { signal: controller.signal });
    const queued = await handlers.queueInstall({ signal: controller.signal });

    expect(textOf(install).split("\n")[0]).toBe("Installing vlc: cancelled");
    expect(textOf(queued).split("\n")[0]).toBe("Installing Queue: cancelled");
    expect(runner.calls).toHaveLength(0);
    expect(queue.size).toBe(1);
  });

  it("should manage the queue", async () => {
    const runner = new FakeRunner()
      .on(["pacman", "-Si", "--", "vlc"], { stdout: "Repository : extra\nVersion : 3.0.21-1\n" })
      .on(["pacman", "-Q", "--", "vlc"], { exitCode: 1 });
    const { handlers, queue } = setup(runner);

    expect(textOf(await handlers.queueList())).toBe("Queue is empty");
    expect(textOf(await handlers.queueAdd({ names: ["vlc"] }))).toBe("Added vlc to queue");
    expect(textOf(await handlers.queueList())).toBe("vlc 3.0.21-1 • extra");
    expect(textOf(await handlers.queueRemove({ names: ["vlc", "gimp"] }))).toBe(
      "Removed vlc from queue\ngimp is not in the queue"
    );
    expect(queue.size).toBe(0);
  });

  it("should install and empty the queue", async () => {
    const queue = new PackageQueue([createPackageInfo({ name: "vlc" })]);
    const { handlers, runner } = setup(new FakeRunner(), queue);

    const result = await handlers.queueInstall();

    expect(textOf(result).split("\n")[0]).toBe("Installing Queue: completed successfully");
    expect(runner.commandLines()).toEqual(["pkexec pacman -S --noconfirm -- vlc"]);
    expect(queue.size).toBe(0);
    expect(textOf(await handlers.queueInstall())).toBe("Error: Queue is empty");
  });
});

describe("createServer", () => {
  it("should build a server without connecting it", () => {
    const runner = new FakeRunner();
    const server = createServer({
      manager: new PackageManager({ runner }),
      queue: new PackageQueue(),
      runner,
      elevateCommand: "pkexec",
    });

    expect(server.isConnected()).toBe(false);
  });
});
