import { UnsupportedPlatformError } from "./errors.js";
import type { OsFamily, PlatformInfo } from "./platform.js";
import type { ProvisionProfile } from "./schema.js";

export type SupportedFamily = Exclude<OsFamily, "unknown">;

export interface SupportEntry {
  readonly osFamily: SupportedFamily;
  readonly codename: string;
}

export type SupportMatrix = readonly SupportEntry[];

export type GateResult =
  | { ok: true }
  | { ok: false; error: UnsupportedPlatformError };

export const SUPPORTED_FAMILIES: readonly SupportedFamily[] = ["debianLike", "rhelLike"];

export function supportMatrixOf(profile: ProvisionProfile): SupportMatrix {
  const entries: SupportEntry[] = [];
  for (const osFamily of SUPPORTED_FAMILIES) {
    for (const codename of profile.platforms[osFamily]?.codenames ?? []) {
      entries.push({ osFamily, codename });
    }
  }
  return entries;
}

/** "debianLike: noble, jammy; rhelLike: 9" */
export function formatSupported(matrix: SupportMatrix): string {
  const groups = new Map<SupportedFamily, string[]>();
  for (const entry of matrix) {
    const list = groups.get(entry.osFamily) ?? [];
    list.push(entry.codename);
    groups.set(entry.osFamily, list);
  }
  if (groups.size === 0) return "(none)";
  return [...groups.entries()]
    .map(([family, codenames]) => `${family}: ${codenames.join(", ")}`)
    .join("; ");
}

/**
 * Exact match of (osFamily, codename) against the matrix. Repository URLs are
 * keyed by codename, so a newer point release is rejected, not guessed.
 */
export function checkCompatibility(
  platform: PlatformInfo,
  matrix: SupportMatrix,
): GateResult {
  const supported = formatSupported(matrix);
  const observed = { osFamily: platform.osFamily, codename: platform.codename };
  const shownCodename = platform.codename === "" ? "(none)" : `'${platform.codename}'`;

  if (platform.osFamily === "unknown") {
    const distro = platform.distribution || "unidentified";
    return {
      ok: false,
      error: new UnsupportedPlatformError(
        `Unsupported operating system '${distro}' (codename ${shownCodename}): not a Debian- or RHEL-family distribution`,
        observed,
        supported,
      ),
    };
  }

  const match = matrix.some(
    (e) => e.osFamily === platform.osFamily && e.codename === platform.codename,
  );
  if (match) return { ok: true };

  return {
    ok: false,
    error: new UnsupportedPlatformError(
      `Unsupported ${platform.osFamily} release ${shownCodename}`,
      observed,
      supported,
    ),
  };
}
