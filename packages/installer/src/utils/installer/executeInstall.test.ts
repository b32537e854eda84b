import { mkdtemp, remove, writeFile } from "fs-extra";
import { tmpdir } from "os";
import { join } from "path";
import strip from "strip-ansi";
import { ReleaseRegistry } from "../registry/types";
import { createFakeCommandRunner, createZip } from "../testing/testUtils";
import { executeInstall } from "./executeInstall";
import { InstallerDependencies } from "./types";

describe("executeInstall", () => {
  let homeDirectory: string;
  let tempRoot: string;
  let registry: ReleaseRegistry;
  let errorSpy: jest.SpyInstance;
  let logSpy: jest.SpyInstance;

  function getOverrides(): Partial<InstallerDependencies> {
    return {
      commands: createFakeCommandRunner({
        versions: { [join(homeDirectory, ".local", "bin", "bugster")]: "bugster 0.3.25" },
      }),
      env: { SHELL: "/bin/zsh" },
      homeDirectory,
      host: { arch: "arm64", platform: "darwin" },
      installBrowserDependencies: false,
      installDirectory: undefined,
      registry,
      requiredRuntimes: [],
      skipVerification: false,
      tempRoot,
    };
  }

  function getErrorOutput() {
    return errorSpy.mock.calls.map(args => strip(args.join(" ")));
  }

  beforeEach(async () => {
    homeDirectory = await mkdtemp(join(tmpdir(), "bugster-home-test-"));
    tempRoot = await mkdtemp(join(tmpdir(), "bugster-tmp-test-"));
    registry = {
      downloadAsset: jest.fn(async (tag: string, assetName: string, destinationPath: string) => {
        await writeFile(destinationPath, createZip([{ data: tag, name: "bugster" }]));
      }),
      getLatestTag: jest.fn(async () => {
        throw new Error("fetch failed");
      }),
      hasRelease: jest.fn(async () => false),
    };
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
    logSpy = jest.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    errorSpy.mockRestore();
    logSpy.mockRestore();
    await remove(homeDirectory);
    await remove(tempRoot);
  });

  it("should exit with 0 and warn when installing the fallback version", async () => {
    await expect(executeInstall({ version: "latest", yes: true }, getOverrides())).resolves.toBe(0);

    const output = logSpy.mock.calls.map(args => strip(args.join(" ")));
    expect(output).toContain(
      "Could not determine the latest version; installing v0.3.25 instead"
    );
    expect(output).toContain(
      `✔ Installed bugster v0.3.25 to ${join(homeDirectory, ".local", "bin", "bugster")}`
    );
    expect(output).toContain(`Added to PATH in ${join(homeDirectory, ".zprofile")}`);
  });

  it("should exit with 1 when the requested version does not exist", async () => {
    await expect(executeInstall({ version: "v9.9.9", yes: true }, getOverrides())).resolves.toBe(1);

    expect(registry.downloadAsset).not.toHaveBeenCalled();
    expect(getErrorOutput()[0]).toBe("✘ Version v9.9.9 does not exist");
  });

  it("should reject an invalid version before touching anything", async () => {
    await expect(executeInstall({ version: "1.2.3", yes: true }, getOverrides())).resolves.toBe(1);

    expect(registry.getLatestTag).not.toHaveBeenCalled();
    expect(registry.hasRelease).not.toHaveBeenCalled();
    expect(getErrorOutput()).toEqual([
      '✘ Invalid version format: "1.2.3"',
      "Examples of valid versions:",
      "  - v0.2.8",
      "  - v0.2.8-beta.1",
      "  - v0.2.8-rc.1",
      "  - v0.2.8-alpha.1",
      "  - latest",
    ]);
  });
});
