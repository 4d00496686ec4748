import {
  IndexRefreshError,
  PackageInstallError,
  PackageRemovalError,
} from "../errors.js";
import { describeFailure } from "../exec.js";
import type { Architecture } from "../platform.js";
import { BasePackageManager } from "./base.js";
import type { RemovalReport, RepositorySpec } from "./types.js";

const RPM_ARCH: Record<Architecture, string> = {
  amd64: "x86_64",
  arm64: "aarch64",
  armv7: "armv7hl",
  // let yum substitute the host's own
  unknown: "$basearch",
};

/** RHEL/CentOS/Fedora: repo-file based, yum semantics. */
export class YumAdapter extends BasePackageManager {
  readonly name = "yum";
  readonly family = "rhelLike";
  readonly keyFormat = "armored";
  readonly keyDirectory = "/etc/pki/rpm-gpg";

  async refreshIndex(): Promise<void> {
    const result = await this.run({ argv: ["yum", "-y", "makecache"], privileged: true });
    if (result.exitCode !== 0) {
      throw new IndexRefreshError(describeFailure(result));
    }
  }

  async installPackages(names: string[]): Promise<void> {
    if (names.length === 0) return;
    const result = await this.run({
      argv: ["yum", "install", "-y", ...names],
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
      const query = await this.run({ argv: ["rpm", "-q", "--quiet", name] });
      if (query.exitCode === 0) installed.push(name);
      else if (query.exitCode === 1) absent.push(name);
      else throw new PackageRemovalError([name], describeFailure(query));
    }

    if (installed.length > 0) {
      const result = await this.run({
        argv: ["yum", "remove", "-y", ...installed],
        privileged: true,
      });
      if (result.exitCode !== 0) {
        throw new PackageRemovalError(installed, describeFailure(result));
      }
    }

    return { removed: installed, absent };
  }

  descriptorPath(name: string): string {
    return `/etc/yum.repos.d/${name}.repo`;
  }

  renderDescriptor(spec: RepositorySpec): string {
    const id = `${spec.name}-${spec.components[0]}`;
    return [
      `[${id}]`,
      `name=${spec.label ?? id}`,
      `baseurl=${spec.url}`,
      "enabled=1",
      "gpgcheck=1",
      `gpgkey=${this.signedByReference(spec.keyPath)}`,
      "",
    ].join("\n");
  }

  architectureLabel(arch: Architecture): string {
    return RPM_ARCH[arch];
  }

  signedByReference(keyPath: string): string {
    return `file://${keyPath}`;
  }
}
