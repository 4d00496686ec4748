export type Stage =
  | "config"
  | "detect"
  | "gate"
  | "pipeline"
  | "verify"
  | "shell";

export const EXIT_CODES = {
  success: 0,
  unexpected: 1,
  detect: 2,
  gate: 3,
  pipeline: 4,
  verify: 5,
  config: 6,
  shell: 4,
} as const satisfies Record<Stage | "success" | "unexpected", number>;

/** Base for every failure that ends a run with a diagnostic. */
export class ProvisionError extends Error {
  constructor(
    message: string,
    public readonly stage: Stage,
    public readonly hints: string[] = [],
  ) {
    super(message);
    this.name = "ProvisionError";
  }

  get exitCode(): number {
    return EXIT_CODES[this.stage];
  }
}

export class DetectionError extends ProvisionError {
  constructor(message: string, hints: string[] = []) {
    super(message, "detect", hints);
    this.name = "DetectionError";
  }
}

export class UnsupportedPlatformError extends ProvisionError {
  constructor(
    message: string,
    public readonly observed: { osFamily: string; codename: string },
    public readonly supported: string,
  ) {
    super(message, "gate", [`Supported platforms: ${supported}`]);
    this.name = "UnsupportedPlatformError";
  }
}

export class ProfileError extends ProvisionError {
  constructor(message: string) {
    super(message, "config");
    this.name = "ProfileError";
  }
}

export class PackageInstallError extends ProvisionError {
  constructor(
    public readonly packages: string[],
    public readonly exitDetail: string,
  ) {
    super(`Failed to install ${packages.join(", ")}: ${exitDetail}`, "pipeline");
    this.name = "PackageInstallError";
  }
}

export class PackageRemovalError extends ProvisionError {
  constructor(
    public readonly packages: string[],
    public readonly exitDetail: string,
  ) {
    super(`Failed to remove ${packages.join(", ")}: ${exitDetail}`, "pipeline");
    this.name = "PackageRemovalError";
  }
}

export class IndexRefreshError extends ProvisionError {
  constructor(public readonly exitDetail: string) {
    super(`Package index refresh failed: ${exitDetail}`, "pipeline");
    this.name = "IndexRefreshError";
  }
}

export class RepositoryError extends ProvisionError {
  constructor(
    public readonly descriptorPath: string,
    detail: string,
  ) {
    super(`Cannot register repository ${descriptorPath}: ${detail}`, "pipeline");
    this.name = "RepositoryError";
  }
}

export class TrustFetchError extends ProvisionError {
  constructor(
    public readonly url: string,
    public readonly reason: string,
  ) {
    super(`Could not securely fetch ${url}: ${reason}`, "pipeline");
    this.name = "TrustFetchError";
  }
}

export class CommandError extends ProvisionError {
  constructor(
    public readonly argv: readonly string[],
    public readonly exitCodeObserved: number,
    detail: string,
    stage: Stage = "pipeline",
  ) {
    super(
      `\`${argv.join(" ")}\` exited with code ${exitCodeObserved}: ${detail}`,
      stage,
    );
    this.name = "CommandError";
  }
}

export class VerificationFailure extends ProvisionError {
  constructor(message: string) {
    super(message, "verify", [
      "Packages were installed but the runtime does not work.",
    ]);
    this.name = "VerificationFailure";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
