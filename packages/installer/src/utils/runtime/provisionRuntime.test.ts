import { createUnixCapabilities } from "../os/createUnixCapabilities";
import { InstallerError } from "../errors/InstallerError";
import { createFakeCommandRunner, FakeCommandRunner } from "../testing/testUtils";
import { provisionRuntime } from "./provisionRuntime";
import { nodeRequirement } from "./requirements";

describe("provisionRuntime", () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  function createContext(commands: FakeCommandRunner, confirmed: boolean) {
    const confirm = jest.fn(async () => confirmed);
    return {
      capabilities: createUnixCapabilities({
        architecture: "x86_64",
        commands,
        env: {},
        homeDirectory: "/home/test",
        os: "linux",
        useSudo: false,
      }),
      commands,
      confirm,
      env: {},
      isInteractive: false,
      os: "linux" as const,
    };
  }

  it("should use an installed runtime without asking", async () => {
    const commands = createFakeCommandRunner({ versions: { node: "v20.5.0" } });
    const context = createContext(commands, true);

    const runtime = await provisionRuntime(nodeRequirement, context);

    expect(runtime.command).toBe("node");
    expect(context.confirm).not.toHaveBeenCalled();
    expect(commands.runs).toEqual([]);
  });

  it("should fail with manual instructions when the install is declined", async () => {
    const commands = createFakeCommandRunner({ versions: { node: "v16.0.0" } });
    const context = createContext(commands, false);

    const error = await provisionRuntime(nodeRequirement, context).catch(error => error);

    expect(error).toBeInstanceOf(InstallerError);
    expect(error.kind).toBe("environment");
    expect(error.message).toBe("Node.js 18 or newer is required");
    expect(error.hints).toEqual([
      "Install Node.js 18 or newer manually, then run the installer again:",
      "  https://nodejs.org/en/download/",
      "To install it automatically, re-run the installer with --yes",
    ]);
    expect(commands.runs).toEqual([]);
  });

  it("should fail when no package manager is available", async () => {
    const commands = createFakeCommandRunner();
    const context = createContext(commands, true);

    await expect(provisionRuntime(nodeRequirement, context)).rejects.toThrow(
      "No supported package manager found to install Node.js"
    );
  });

  it("should install the pinned version and probe again", async () => {
    const commands = createFakeCommandRunner({
      available: ["apt-get"],
      onRun: (runner, command) => {
        if (command === "apt-get") {
          runner.versions.set("node", "v20.18.0");
        }
      },
    });
    const context = createContext(commands, true);

    const runtime = await provisionRuntime(nodeRequirement, context);

    expect(context.confirm).toHaveBeenCalledWith("Install Node.js 20.18.0 now?");
    expect(commands.runs).toEqual([
      {
        args: ["-c", "curl -fsSL https://deb.nodesource.com/setup_20.x | bash -"],
        command: "bash",
      },
      { args: ["install", "-y", "nodejs"], command: "apt-get" },
    ]);
    expect(runtime.version).toBe("20.18.0");
  });

  it("should stop when the runtime is still missing after the install", async () => {
    const commands = createFakeCommandRunner({ available: ["pacman"] });
    const context = createContext(commands, true);

    const error = await provisionRuntime(nodeRequirement, context).catch(error => error);

    expect(error).toBeInstanceOf(InstallerError);
    expect(error.kind).toBe("provisioning");
  });

  it("should report a failing install step as a provisioning error", async () => {
    const commands = createFakeCommandRunner({ available: ["dnf"] });
    commands.run = jest.fn(async () => {
      throw new Error("Process failed (code: 1)");
    });
    const context = createContext(commands, true);

    const error = await provisionRuntime(nodeRequirement, context).catch(error => error);

    expect(error.kind).toBe("provisioning");
    expect(error.message).toBe("Add the NodeSource repository failed: Process failed (code: 1)");
  });
});
