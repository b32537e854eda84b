import { CommandResult, CommandRunner } from "../system/types";

export type FakeCommandRunner = CommandRunner & {
  // command -> `--version` output; mutate it to simulate an install
  versions: Map<string, string>;
  available: Set<string>;
  runs: Array<{ args: string[]; command: string; env?: NodeJS.ProcessEnv }>;
};

export function createFakeCommandRunner({
  available = [],
  onRun,
  versions = {},
}: {
  available?: string[];
  onRun?: (runner: FakeCommandRunner, command: string, args: string[]) => void;
  versions?: Record<string, string>;
} = {}): FakeCommandRunner {
  const runner: FakeCommandRunner = {
    available: new Set(available),
    runs: [],
    versions: new Map(Object.entries(versions)),

    capture(command): CommandResult {
      const output = runner.versions.get(command);
      if (output === undefined) {
        return {
          error: new Error(`spawnSync ${command} ENOENT`),
          status: null,
          stderr: "",
          stdout: "",
        };
      }

      return { error: undefined, status: 0, stderr: "", stdout: output };
    },

    isAvailable(command) {
      return runner.available.has(command);
    },

    async run(command, args, { env } = {}) {
      runner.runs.push({ args, command, env });
      onRun?.(runner, command, args);
    },
  };

  return runner;
}

type ZipEntry = {
  data?: string | Buffer;
  // Unix permission bits, stored in the upper half of the external attributes
  mode?: number;
  name: string;
};

const CRC_TABLE = Array.from({ length: 256 }, (_, index) => {
  let crc = index;
  for (let bit = 0; bit < 8; bit++) {
    crc = crc & 1 ? 0xedb88320 ^ (crc >>> 1) : crc >>> 1;
  }
  return crc >>> 0;
});

function crc32(buffer: Buffer) {
  let crc = 0xffffffff;
  for (const byte of buffer) {
    crc = CRC_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

// Builds an uncompressed ("stored") zip archive in memory
export function createZip(entries: ZipEntry[]): Buffer {
  const localParts: Buffer[] = [];
  const centralParts: Buffer[] = [];
  let offset = 0;

  for (const { data = "", mode, name } of entries) {
    const content = typeof data === "string" ? Buffer.from(data) : data;
    const fileName = Buffer.from(name);
    const checksum = crc32(content);
    const isDirectory = name.endsWith("/");
    const permissions = mode ?? (isDirectory ? 0o40755 : 0o100644);

    const local = Buffer.alloc(30);
    local.writeUInt32LE(0x04034b50, 0);
    local.writeUInt16LE(20, 4);
    local.writeUInt16LE(0, 6);
    local.writeUInt16LE(0, 8);
    local.writeUInt16LE(0, 10);
    local.writeUInt16LE(0x21, 12);
    local.writeUInt32LE(checksum, 14);
    local.writeUInt32LE(content.length, 18);
    local.writeUInt32LE(content.length, 22);
    local.writeUInt16LE(fileName.length, 26);
    local.writeUInt16LE(0, 28);

    const central = Buffer.alloc(46);
    central.writeUInt32LE(0x02014b50, 0);
    // Made by Unix, zip version 2.0
    central.writeUInt16LE((3 << 8) | 20, 4);
    central.writeUInt16LE(20, 6);
    central.writeUInt16LE(0, 8);
    central.writeUInt16LE(0, 10);
    central.writeUInt16LE(0, 12);
    central.writeUInt16LE(0x21, 14);
    central.writeUInt32LE(checksum, 16);
    central.writeUInt32LE(content.length, 20);
    central.writeUInt32LE(content.length, 24);
    central.writeUInt16LE(fileName.length, 28);
    central.writeUInt16LE(0, 30);
    central.writeUInt16LE(0, 32);
    central.writeUInt16LE(0, 34);
    central.writeUInt16LE(0, 36);
    central.writeUInt32LE((permissions << 16) >>> 0, 38);
    central.writeUInt32LE(offset, 42);

    localParts.push(local, fileName, content);
    centralParts.push(central, fileName);
    offset += local.length + fileName.length + content.length;
  }

  const centralDirectory = Buffer.concat(centralParts);

  const end = Buffer.alloc(22);
  end.writeUInt32LE(0x06054b50, 0);
  end.writeUInt16LE(0, 4);
  end.writeUInt16LE(0, 6);
  end.writeUInt16LE(entries.length, 8);
  end.writeUInt16LE(entries.length, 10);
  end.writeUInt32LE(centralDirectory.length, 12);
  end.writeUInt32LE(offset, 16);
  end.writeUInt16LE(0, 20);

  return Buffer.concat([...localParts, centralDirectory, end]);
}
