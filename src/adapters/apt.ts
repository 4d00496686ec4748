import {
  IndexRefreshError,
  PackageInstallError,
  PackageRemovalError,
} from "../errors.js";
import { describeFailure } from "../exec.js";
import type { Architecture } from "../platform.js";
import { BasePackageManager } from "./base.js";
import type { RemovalReport, RepositorySpec } from "./types.js";

const APT_ENV = { DEBIAN_FRONTEND: "noninteractive" };

// dpkg states in which package files are on disk; not-installed and
// config-files are the only ones that are not
const PRESENT_STATES = new Set([
  "installed",
  "half-installed",
  "unpacked",
  "half-configured",
  "triggers-awaited",
  "triggers-pending",
]);

const DPKG_ARCH: Record<Architecture, string | null> = {
  amd64: "amd64",
  arm64: "arm64",
  armv7: "armhf",
  unknown: null,
};

/** Debian/Ubuntu: index-based, apt semantics. */
export class AptAdapter extends BasePackageManager {
  readonly name = "apt";
  readonly family = "debianLike";
  readonly keyFormat = "binary";
  readonly keyDirectory = "/etc/apt/keyrings";

  async refreshIndex(): Promise<void> {
    const result = await this.run({
      argv: ["apt-get", "update"],
      env: APT_ENV,
      privileged: true,
    });
    if (result.exitCode !== 0) {
      throw new IndexRefreshError(describeFailure(result));
    }
  }

  async installPackages(names: string[]): Promise<void> {
    if (names.length === 0) return;
    const result = await this.run({
      argv: ["apt-get", "install", "-y", ...names],
      env: APT_ENV,
      privileged: true,
    });
    if (result.exitCode !== 0) {
      throw new PackageInstallError(names, describeFailure(result));
    }
  }

  async removePackagesIfPresent(names: string[]): Promise<RemovalReport> {
    const installed: string[] = [];
    const absent: string[] = [];

    for (const name of names) {
      const query = await this.run({
        argv: ["dpkg-query", "-W", "--showformat=${Status}", name],
      });
      // dpkg-query: 0 = known, 1 = no such package, anything else = dpkg itself failed.
      // ${Status} is "<want> <flag> <state>", e.g. "hold ok installed".
      const state = query.stdout.trim().split(/\s+/)[2];
      if (query.exitCode === 0 && PRESENT_STATES.has(state)) {
        installed.push(name);
      } else if (query.exitCode === 0 || query.exitCode === 1) {
        absent.push(name);
      } else {
        throw new PackageRemovalError([name], describeFailure(query));
      }
    }

    if (installed.length > 0) {
      const result = await this.run({
        argv: ["apt-get", "remove", "-y", "--allow-change-held-packages", ...installed],
        env: APT_ENV,
        privileged: true,
      });
      if (result.exitCode !== 0) {
        throw new PackageRemovalError(installed, describeFailure(result));
      }
    }

    return { removed: installed, absent };
  }

  descriptorPath(name: string): string {
    return `/etc/apt/sources.list.d/${name}.list`;
  }

  renderDescriptor(spec: RepositorySpec): string {
    const options: string[] = [];
    const arch = this.architectureLabel(spec.architecture);
    if (arch) options.push(`arch=${arch}`);
    options.push(`signed-by=${this.signedByReference(spec.keyPath)}`);
    return `deb [${options.join(" ")}] ${spec.url} ${spec.suite} ${spec.components.join(" ")}\n`;
  }

  architectureLabel(arch: Architecture): string | null {
    return DPKG_ARCH[arch];
  }

  signedByReference(keyPath: string): string {
    return keyPath;
  }
}
