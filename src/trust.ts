import { createHash } from "node:crypto";
import { CommandError, TrustFetchError, errorMessage } from "./errors.js";
import { describeFailure, type Runner } from "./exec.js";
import type { SystemFiles } from "./files.js";
import type { PackageManagerAdapter, RepositorySpec } from "./adapters/types.js";
import type { PlatformInfo } from "./platform.js";
import type { FamilyTarget } from "./schema.js";

export interface TrustMaterial {
  readonly keySourceUrl: string;
  readonly keyInstallPath: string;
  readonly repositoryUrlTemplate: string;
  readonly signedByReference: string;
}

/** Fetches text over an authenticated channel; rejects with TrustFetchError. */
export type TextFetcher = (url: string) => Promise<string>;

const ARMOR_BEGIN = "-----BEGIN PGP PUBLIC KEY BLOCK-----";
const ARMOR_END = "-----END PGP PUBLIC KEY BLOCK-----";

/**
 * https-only fetch. Node's fetch validates the server certificate, so a
 * response here came from the named host.
 */
export const httpsFetcher: TextFetcher = async (url) => {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new TrustFetchError(url, "not a valid URL");
  }
  if (parsed.protocol !== "https:") {
    throw new TrustFetchError(url, "only https sources can be authenticated");
  }

  let response: Response;
  try {
    response = await fetch(parsed, { redirect: "follow" });
  } catch (err: unknown) {
    const cause = err instanceof Error && err.cause instanceof Error ? `: ${err.cause.message}` : "";
    throw new TrustFetchError(url, `${errorMessage(err)}${cause}`);
  }
  if (!response.ok) {
    throw new TrustFetchError(url, `server answered ${response.status} ${response.statusText}`);
  }
  if (!response.url.startsWith("https://")) {
    throw new TrustFetchError(url, `redirected to a non-https location ${response.url}`);
  }
  return response.text();
};

export function sha256(content: string): string {
  return createHash("sha256").update(content, "utf-8").digest("hex");
}

export function renderTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) => vars[key] ?? whole);
}

export interface TrustInstallerOptions {
  keyName: string;
  target: FamilyTarget;
  fetchText?: TextFetcher;
}

export class TrustInstaller {
  private readonly fetchText: TextFetcher;

  constructor(
    private readonly adapter: PackageManagerAdapter,
    private readonly files: SystemFiles,
    private readonly runner: Runner,
    private readonly opts: TrustInstallerOptions,
  ) {
    this.fetchText = opts.fetchText ?? httpsFetcher;
  }

  keyInstallPath(): string {
    const ext = this.adapter.keyFormat === "binary" ? "gpg" : "asc";
    return `${this.adapter.keyDirectory}/${this.opts.keyName}.${ext}`;
  }

  /** What installTrust would return, without fetching or writing anything. */
  plannedMaterial(sourceUrl: string): TrustMaterial {
    const keyPath = this.keyInstallPath();
    return {
      keySourceUrl: sourceUrl,
      keyInstallPath: keyPath,
      repositoryUrlTemplate: this.opts.target.repository.url,
      signedByReference: this.adapter.signedByReference(keyPath),
    };
  }

  /**
   * Fetch the signing key, convert it to the trust store's form and make it
   * world-readable. Nothing is written unless the key was fetched and checked.
   */
  async installTrust(sourceUrl: string): Promise<TrustMaterial> {
    const armored = await this.fetchText(sourceUrl);
    if (!armored.includes(ARMOR_BEGIN) || !armored.includes(ARMOR_END)) {
      throw new TrustFetchError(sourceUrl, "response is not an ASCII-armored public key");
    }
    const pinned = this.opts.target.trust.sha256;
    if (pinned !== undefined) {
      const actual = sha256(armored);
      if (actual !== pinned) {
        throw new TrustFetchError(sourceUrl, `key digest ${actual} does not match pinned ${pinned}`);
      }
    }

    const keyPath = this.keyInstallPath();
    await this.files.ensureDir(this.adapter.keyDirectory, "0755");

    if (this.adapter.keyFormat === "binary") {
      const argv = ["gpg", "--batch", "--yes", "--dearmor", "-o", keyPath];
      const result = await this.runner.run({ argv, stdin: armored, privileged: true });
      if (result.exitCode !== 0) {
        await this.files.remove(keyPath);
        throw new CommandError(argv, result.exitCode, describeFailure(result));
      }
      await this.files.chmod(keyPath, "0644");
    } else {
      await this.files.write(keyPath, armored, "0644");
    }

    return this.plannedMaterial(sourceUrl);
  }

  repositorySpec(material: TrustMaterial, platform: PlatformInfo): RepositorySpec {
    const repo = this.opts.target.repository;
    const vars = {
      codename: platform.codename,
      arch: this.adapter.architectureLabel(platform.architecture) ?? platform.architecture,
      distribution: platform.distribution,
    };
    return {
      name: this.opts.keyName,
      label: repo.label,
      url: renderTemplate(material.repositoryUrlTemplate, vars),
      suite: renderTemplate(repo.suite, vars),
      components: repo.components,
      architecture: platform.architecture,
      keyPath: material.keyInstallPath,
    };
  }

  /** Returns the descriptor path. */
  async registerRepository(material: TrustMaterial, platform: PlatformInfo): Promise<string> {
    return this.adapter.addSignedRepository(this.repositorySpec(material, platform));
  }
}
