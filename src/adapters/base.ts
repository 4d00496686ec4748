import { isAbsolute } from "node:path";
import { RepositoryError } from "../errors.js";
import type { Command, ExecResult, Runner } from "../exec.js";
import type { SystemFiles } from "../files.js";
import type { SupportedFamily } from "../gate.js";
import type { Architecture } from "../platform.js";
import type { PackageManagerAdapter, RemovalReport, RepositorySpec } from "./types.js";

/** Descriptor handling shared by the apt and yum adapters. */
export abstract class BasePackageManager implements PackageManagerAdapter {
  abstract readonly name: "apt" | "yum";
  abstract readonly family: SupportedFamily;
  abstract readonly keyFormat: "binary" | "armored";
  abstract readonly keyDirectory: string;

  constructor(
    protected readonly runner: Runner,
    protected readonly files: SystemFiles,
  ) {}

  abstract refreshIndex(): Promise<void>;
  abstract installPackages(names: string[]): Promise<void>;
  abstract removePackagesIfPresent(names: string[]): Promise<RemovalReport>;
  abstract descriptorPath(name: string): string;
  abstract renderDescriptor(spec: RepositorySpec): string;
  abstract architectureLabel(arch: Architecture): string | null;
  abstract signedByReference(keyPath: string): string;

  async addSignedRepository(spec: RepositorySpec): Promise<string> {
    const path = this.descriptorPath(spec.name);

    if (!spec.url.startsWith("https://")) {
      throw new RepositoryError(path, `refusing non-https source ${spec.url}`);
    }
    if (!isAbsolute(spec.keyPath)) {
      throw new RepositoryError(path, `key path must be absolute, got ${spec.keyPath}`);
    }
    if (!(await this.files.isFile(spec.keyPath))) {
      throw new RepositoryError(
        path,
        `trust material ${spec.keyPath} is missing; refusing to add an unsigned source`,
      );
    }

    await this.files.write(path, this.renderDescriptor(spec), "0644");
    return path;
  }

  protected run(command: Command): Promise<ExecResult> {
    return this.runner.run(command);
  }
}
