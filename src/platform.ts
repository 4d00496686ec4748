import { readFile } from "node:fs/promises";
import { machine } from "node:os";
import { DetectionError } from "./errors.js";
import type { Runner } from "./exec.js";

export type OsFamily = "debianLike" | "rhelLike" | "unknown";
export type Architecture = "amd64" | "arm64" | "armv7" | "unknown";

export interface PlatformInfo {
  readonly osFamily: OsFamily;
  readonly codename: string;
  readonly architecture: Architecture;
  /** os-release ID (or lsb_release distributor), diagnostic only. */
  readonly distribution: string;
  /** Raw hardware name the architecture was mapped from. */
  readonly machine: string;
}

/** Read-only queries the detector needs from the host. */
export interface HostProbe {
  readOsRelease(): Promise<string | null>;
  /** `lsb_release -s<flag>`, or null when the utility is missing or fails. */
  lsbRelease(flag: "c" | "i" | "r"): Promise<string | null>;
  machine(): string;
}

const OS_RELEASE_PATHS = ["/etc/os-release", "/usr/lib/os-release"];

export const ARCHITECTURES: Readonly<Record<string, Architecture>> = {
  x86_64: "amd64",
  amd64: "amd64",
  aarch64: "arm64",
  arm64: "arm64",
  armv7l: "armv7",
  armv7: "armv7",
  armhf: "armv7",
};

const DEBIAN_IDS = ["debian", "ubuntu"];
const RHEL_IDS = ["rhel", "centos", "fedora", "rocky", "almalinux"];

export function createHostProbe(runner: Runner): HostProbe {
  return {
    async readOsRelease() {
      for (const path of OS_RELEASE_PATHS) {
        try {
          return await readFile(path, "utf-8");
        } catch (err: unknown) {
          if (!isNotFound(err)) throw err;
        }
      }
      return null;
    },
    async lsbRelease(flag) {
      const result = await runner.run({ argv: ["lsb_release", `-s${flag}`] });
      const value = result.stdout.trim();
      return result.exitCode === 0 && value.length > 0 ? value : null;
    },
    machine: () => machine(),
  };
}

/** Parse os-release KEY=value lines, unquoting values. */
export function parseOsRelease(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const match = line.trim().match(/^([A-Z0-9_]+)=(.*)$/);
    if (match) {
      result[match[1]] = match[2].replace(/^["']|["']$/g, "");
    }
  }
  return result;
}

export function resolveFamily(id: string, idLike = ""): OsFamily {
  const candidates = [id, ...idLike.split(/\s+/)]
    .map((s) => s.toLowerCase())
    .filter((s) => s.length > 0);
  if (candidates.some((c) => DEBIAN_IDS.includes(c))) return "debianLike";
  if (candidates.some((c) => RHEL_IDS.includes(c))) return "rhelLike";
  return "unknown";
}

export function mapArchitecture(raw: string): Architecture {
  return ARCHITECTURES[raw.trim().toLowerCase()] ?? "unknown";
}

/**
 * Identify OS family, codename and architecture. Fails only when the host
 * has neither an os-release file nor lsb_release.
 */
export async function detectPlatform(probe: HostProbe): Promise<PlatformInfo> {
  const content = await probe.readOsRelease();
  const fields = content === null ? {} : parseOsRelease(content);

  let distribution = (fields.ID ?? "").toLowerCase();
  if (content === null) {
    const distributor = await probe.lsbRelease("i");
    if (distributor === null) {
      throw new DetectionError(
        "Cannot identify the operating system: no os-release file and no lsb_release utility",
        ["Install the lsb-release package, or run on a distribution that ships /etc/os-release."],
      );
    }
    distribution = distributor.toLowerCase();
  }

  const osFamily = resolveFamily(distribution, fields.ID_LIKE);
  const codename = normalize(await resolveCodename(osFamily, fields, probe));
  const raw = probe.machine();

  return {
    osFamily,
    codename,
    architecture: mapArchitecture(raw),
    distribution,
    machine: raw,
  };
}

async function resolveCodename(
  family: OsFamily,
  fields: Record<string, string>,
  probe: HostProbe,
): Promise<string> {
  if (family === "rhelLike") {
    // yum repositories are keyed by major release
    const version = fields.VERSION_ID ?? (await probe.lsbRelease("r")) ?? "";
    return version.split(".")[0];
  }
  return (
    fields.VERSION_CODENAME ||
    fields.UBUNTU_CODENAME ||
    (await probe.lsbRelease("c")) ||
    ""
  );
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function normalize(codename: string): string {
  return codename.trim().toLowerCase();
}
