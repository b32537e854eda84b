import { mkdtemp, readFile, remove, stat, writeFile } from "fs-extra";
import { tmpdir } from "os";
import { join } from "path";
import { InstallerError } from "../errors/InstallerError";
import { createZip } from "../testing/testUtils";
import { extractArchive, findExtractedExecutable } from "./extractArchive";

describe("extractArchive", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "bugster-extract-test-"));
  });

  afterEach(async () => {
    await remove(directory);
  });

  it("should extract files and keep their permissions", async () => {
    const archivePath = join(directory, "bugster-linux.zip");
    await writeFile(
      archivePath,
      createZip([
        { data: "#!/bin/sh\necho bugster\n", mode: 0o100755, name: "bugster" },
        { name: "docs/" },
        { data: "read me", name: "docs/README.md" },
      ])
    );

    const destination = join(directory, "out");
    const extracted = await extractArchive(archivePath, destination);

    expect(extracted).toEqual([
      join(destination, "bugster"),
      join(destination, "docs", "README.md"),
    ]);
    expect(await readFile(join(destination, "bugster"), "utf8")).toBe("#!/bin/sh\necho bugster\n");
    if (process.platform !== "win32") {
      expect((await stat(join(destination, "bugster"))).mode & 0o777).toBe(0o755);
    }
  });

  it("should refuse entries that escape the destination", async () => {
    const archivePath = join(directory, "evil.zip");
    await writeFile(archivePath, createZip([{ data: "oops", name: "../escaped.txt" }]));

    const error = await extractArchive(archivePath, join(directory, "out")).catch(error => error);

    expect(error).toBeInstanceOf(InstallerError);
    expect(error.kind).toBe("download");
    expect(error.message).toMatch(/^Could not unpack evil\.zip: /);
    await expect(stat(join(directory, "escaped.txt"))).rejects.toThrow();
  });

  it("should report a corrupt archive", async () => {
    const archivePath = join(directory, "corrupt.zip");
    await writeFile(archivePath, "this is not a zip file");

    await expect(extractArchive(archivePath, join(directory, "out"))).rejects.toThrow(
      InstallerError
    );
  });
});

describe("findExtractedExecutable", () => {
  it("should prefer the executable closest to the root", () => {
    expect(
      findExtractedExecutable(
        ["/tmp/out/nested/bugster", "/tmp/out/bugster", "/tmp/out/bugster.md"],
        "bugster"
      )
    ).toBe("/tmp/out/bugster");
    expect(findExtractedExecutable(["/tmp/out/README.md"], "bugster")).toBeUndefined();
  });
});
