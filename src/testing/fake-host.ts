import type { Command, ExecResult, Runner } from "../exec.js";
import type { HostProbe } from "../platform.js";
import { sha256, type TextFetcher } from "../trust.js";

/**
 * In-process stand-in for a Linux host. Commands act on an in-memory file
 * table and package set; anything else answers "command not found".
 */

type Reply = Partial<Omit<ExecResult, "durationMs">>;

interface Rule {
  prefix: string;
  reply: Reply | ((command: Command) => Reply);
}

const PACKAGE_VERBS = new Set(["install", "remove", "update", "makecache"]);

export const DOCKER_VERSION = "Docker version 27.0.3, build 7d4bcd8";

export const TEST_KEY = [
  "-----BEGIN PGP PUBLIC KEY BLOCK-----",
  "",
  "mQINBFit2ioBEADhWpZ8/wvZ6hUTiXOwQHXMAlaFHcPH9hAtr4F1y2+OYdbtMuth",
  "-----END PGP PUBLIC KEY BLOCK-----",
  "",
].join("\n");

/** What the fake gpg writes for an armored key. */
export function dearmored(armored: string): string {
  return `gpg-binary:${sha256(armored)}`;
}

export class FakeHost implements Runner {
  readonly calls: Command[] = [];
  readonly files = new Map<string, string>();
  readonly modes = new Map<string, string>();
  readonly dirs = new Set<string>();
  readonly installed: Set<string>;
  private readonly rules: Rule[] = [];

  constructor(opts: { installed?: string[] } = {}) {
    this.installed = new Set(opts.installed ?? []);
  }

  /** Answer commands whose argv starts with `prefix`. Later rules win. */
  on(prefix: string, reply: Rule["reply"]): this {
    this.rules.unshift({ prefix, reply });
    return this;
  }

  /** Every command run so far, as a single string. */
  commands(): string[] {
    return this.calls.map((c) => c.argv.join(" "));
  }

  async run(command: Command): Promise<ExecResult> {
    this.calls.push(command);
    const line = command.argv.join(" ");
    const rule = this.rules.find((r) => line.startsWith(r.prefix));
    const reply = rule
      ? typeof rule.reply === "function"
        ? rule.reply(command)
        : rule.reply
      : this.builtin(command);
    return {
      stdout: reply.stdout ?? "",
      stderr: reply.stderr ?? "",
      exitCode: reply.exitCode ?? 0,
      durationMs: 0,
    };
  }

  private builtin(command: Command): Reply {
    const [bin, ...args] = command.argv;
    const last = args[args.length - 1] ?? "";

    switch (bin) {
      case "test": {
        const found = args[0] === "-f" ? this.files.has(last) : this.files.has(last) || this.dirs.has(last);
        return { exitCode: found ? 0 : 1 };
      }
      case "install":
        this.dirs.add(last);
        return {};
      case "tee":
        this.files.set(last, command.stdin ?? "");
        return { stdout: command.stdin ?? "" };
      case "chmod":
        if (!this.files.has(last)) {
          return { exitCode: 1, stderr: `chmod: cannot access '${last}': No such file or directory` };
        }
        this.modes.set(last, args[0]);
        return {};
      case "rm":
        this.files.delete(last);
        this.modes.delete(last);
        return {};
      case "gpg":
        this.files.set(args[args.indexOf("-o") + 1], dearmored(command.stdin ?? ""));
        return {};
      case "dpkg-query":
        return this.installed.has(last)
          ? { stdout: "install ok installed" }
          : { exitCode: 1, stderr: `dpkg-query: no packages found matching ${last}` };
      case "rpm":
        return { exitCode: this.installed.has(last) ? 0 : 1 };
      case "apt-get":
      case "yum":
        this.applyPackageCommand(args);
        return {};
      case "systemctl":
      case "groupadd":
      case "usermod":
      case "git":
        return {};
      case "sh":
        // nothing is on PATH unless a rule says so
        return args[0] === "-c" ? { exitCode: 1 } : {};
      case "docker":
        return args[0] === "--version"
          ? { stdout: `${DOCKER_VERSION}\n` }
          : { stdout: "\nHello from Docker!\n" };
      default:
        return { exitCode: 127, stderr: `${bin}: command not found` };
    }
  }

  private applyPackageCommand(args: string[]): void {
    const verb = args.find((a) => PACKAGE_VERBS.has(a));
    const names = args.filter((a) => !a.startsWith("-") && !PACKAGE_VERBS.has(a));
    for (const name of names) {
      if (verb === "install") this.installed.add(name);
      if (verb === "remove") this.installed.delete(name);
    }
  }
}

export interface FakeProbe extends HostProbe {
  readonly lsbCalls: string[];
}

export function fakeProbe(opts: {
  osRelease?: string | null;
  lsb?: Partial<Record<"c" | "i" | "r", string>>;
  machine?: string;
}): FakeProbe {
  const lsbCalls: string[] = [];
  return {
    lsbCalls,
    readOsRelease: async () => opts.osRelease ?? null,
    lsbRelease: async (flag) => {
      lsbCalls.push(flag);
      return opts.lsb?.[flag] ?? null;
    },
    machine: () => opts.machine ?? "x86_64",
  };
}

export class FakeFetcher {
  readonly calls: string[] = [];

  constructor(private readonly responses: Record<string, string | Error>) {}

  readonly fetch: TextFetcher = async (url) => {
    this.calls.push(url);
    const response = this.responses[url];
    if (response === undefined) throw new Error(`unexpected fetch of ${url}`);
    if (response instanceof Error) throw response;
    return response;
  };
}

export const UBUNTU_NOBLE = [
  'PRETTY_NAME="Ubuntu 24.04 LTS"',
  'NAME="Ubuntu"',
  'VERSION_ID="24.04"',
  "VERSION_CODENAME=noble",
  "ID=ubuntu",
  "ID_LIKE=debian",
  "UBUNTU_CODENAME=noble",
  "",
].join("\n");

export const UBUNTU_WARTY = [
  'NAME="Ubuntu"',
  'VERSION_ID="4.10"',
  "VERSION_CODENAME=warty",
  "ID=ubuntu",
  "ID_LIKE=debian",
  "",
].join("\n");

export const ROCKY_9 = [
  'NAME="Rocky Linux"',
  'VERSION_ID="9.3"',
  'ID="rocky"',
  'ID_LIKE="rhel centos fedora"',
  "",
].join("\n");
