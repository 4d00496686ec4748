import type { Runner } from "../exec.js";
import type { SystemFiles } from "../files.js";
import type { OsFamily } from "../platform.js";
import { AptAdapter } from "./apt.js";
import type { PackageManagerAdapter } from "./types.js";
import { YumAdapter } from "./yum.js";

/** One adapter per family; resolveFamily() in platform.ts decides which. */
export function createAdapter(
  family: OsFamily,
  runner: Runner,
  files: SystemFiles,
): PackageManagerAdapter {
  switch (family) {
    case "debianLike":
      return new AptAdapter(runner, files);
    case "rhelLike":
      return new YumAdapter(runner, files);
    case "unknown":
      throw new Error("No package manager adapter for an unknown OS family");
  }
}
