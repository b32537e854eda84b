import { InstallerError } from "../errors/InstallerError";
import { resolveReleaseVersion } from "./resolveReleaseVersion";
import { ReleaseRegistry } from "./types";

function createRegistry(overrides: Partial<ReleaseRegistry> = {}): ReleaseRegistry {
  return {
    downloadAsset: jest.fn(async () => {}),
    getLatestTag: jest.fn(async () => "v0.4.0"),
    hasRelease: jest.fn(async () => true),
    ...overrides,
  };
}

describe("resolveReleaseVersion", () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it("should resolve latest through the registry", async () => {
    await expect(resolveReleaseVersion({ type: "latest" }, createRegistry())).resolves.toEqual({
      degraded: false,
      tag: "v0.4.0",
    });
  });

  it("should fall back to the pinned version when latest can't be looked up", async () => {
    const registry = createRegistry({
      getLatestTag: jest.fn(async () => {
        throw new Error("fetch failed");
      }),
    });

    await expect(resolveReleaseVersion({ type: "latest" }, registry)).resolves.toEqual({
      degraded: true,
      tag: "v0.3.25",
    });
    expect(logSpy).toHaveBeenCalledTimes(1);
  });

  it("should check that a specific version exists", async () => {
    const registry = createRegistry({ hasRelease: jest.fn(async () => false) });

    const error = await resolveReleaseVersion(
      {
        type: "tag",
        tag: "v9.9.9",
        major: 9,
        minor: 9,
        patch: 9,
        prerelease: undefined,
      },
      registry
    ).catch(error => error);

    expect(error).toBeInstanceOf(InstallerError);
    expect(error.kind).toBe("registry");
    expect(error.message).toBe("Version v9.9.9 does not exist");
    expect(registry.getLatestTag).not.toHaveBeenCalled();
  });
});
