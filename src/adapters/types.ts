import type { SupportedFamily } from "../gate.js";
import type { Architecture } from "../platform.js";

/** A third-party package source, already resolved for this host. */
export interface RepositorySpec {
  /** Base name of the descriptor file. */
  name: string;
  label?: string;
  url: string;
  /** apt suite (usually the codename); ignored by yum. */
  suite: string;
  components: string[];
  architecture: Architecture;
  /** Absolute path of previously installed trust material. */
  keyPath: string;
}

export interface RemovalReport {
  removed: string[];
  absent: string[];
}

export interface PackageManagerAdapter {
  readonly name: "apt" | "yum";
  readonly family: SupportedFamily;
  /** Form the trust store expects keys in. */
  readonly keyFormat: "binary" | "armored";
  readonly keyDirectory: string;

  refreshIndex(): Promise<void>;
  installPackages(names: string[]): Promise<void>;
  /** Absent packages are not an error; only genuine failures throw. */
  removePackagesIfPresent(names: string[]): Promise<RemovalReport>;
  /** Writes (overwrites) the descriptor and returns its path. */
  addSignedRepository(spec: RepositorySpec): Promise<string>;

  descriptorPath(name: string): string;
  renderDescriptor(spec: RepositorySpec): string;
  architectureLabel(arch: Architecture): string | null;
  /** How a descriptor refers to a key file. */
  signedByReference(keyPath: string): string;
}
