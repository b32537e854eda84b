import { logDebug } from "@bugster-installer/shared/logger";
import { chmod, createWriteStream, ensureDir } from "fs-extra";
import { basename, dirname, isAbsolute, relative, resolve } from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import yauzl, { Entry, ZipFile } from "yauzl";
import { InstallerError, getErrorMessage } from "../errors/InstallerError";

function getEntryPath(destination: string, fileName: string) {
  const entryPath = resolve(destination, fileName);

  const relativePath = relative(destination, entryPath);
  if (relativePath.startsWith("..") || isAbsolute(relativePath)) {
    throw new Error(`Entry "${fileName}" would be written outside of ${destination}`);
  }

  return entryPath;
}

async function writeEntry(zipfile: ZipFile, entry: Entry, entryPath: string) {
  await ensureDir(dirname(entryPath));

  const readStream = await new Promise<Readable>((resolvePromise, reject) => {
    zipfile.openReadStream(entry, (error, stream) => {
      if (error || !stream) {
        reject(error ?? new Error(`Could not read ${entry.fileName}`));
      } else {
        resolvePromise(stream);
      }
    });
  });
  await pipeline(readStream, createWriteStream(entryPath));

  // Unix permission bits live in the upper half of the external attributes
  const mode = (entry.externalFileAttributes >>> 16) & 0o777;
  if (mode !== 0) {
    await chmod(entryPath, mode);
  }
}

function extractZip(archivePath: string, destination: string): Promise<string[]> {
  return new Promise((resolvePromise, reject) => {
    yauzl.open(archivePath, { lazyEntries: true }, (error, zipfile) => {
      if (error || !zipfile) {
        reject(error ?? new Error(`Could not open ${archivePath}`));
        return;
      }

      const extracted: string[] = [];
      const fail = (error: unknown) => {
        zipfile.close();
        reject(error);
      };

      zipfile.on("entry", (entry: Entry) => {
        let entryPath: string;
        try {
          entryPath = getEntryPath(destination, entry.fileName);
        } catch (error) {
          fail(error);
          return;
        }

        const write = entry.fileName.endsWith("/")
          ? ensureDir(entryPath)
          : writeEntry(zipfile, entry, entryPath).then(() => {
              extracted.push(entryPath);
            });

        write.then(() => zipfile.readEntry(), fail);
      });
      zipfile.on("end", () => resolvePromise(extracted));
      zipfile.on("error", reject);

      zipfile.readEntry();
    });
  });
}

export async function extractArchive(archivePath: string, destination: string) {
  try {
    await ensureDir(destination);

    const extracted = await extractZip(archivePath, resolve(destination));

    logDebug("ExtractArchive:Extracted", { archivePath, extracted });

    return extracted;
  } catch (error) {
    throw new InstallerError(
      "download",
      `Could not unpack ${basename(archivePath)}: ${getErrorMessage(error)}`,
      ["The download may be corrupt; run the installer again."],
      error
    );
  }
}

// Release archives have the executable at their root, but some builds nest it in a folder
export function findExtractedExecutable(
  extracted: string[],
  binaryName: string
): string | undefined {
  return extracted
    .filter(path => basename(path) === binaryName)
    .sort((a, b) => a.length - b.length)[0];
}
