import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { ProfileError } from "./errors.js";
import { ProvisionProfileSchema, type ProvisionProfile } from "./schema.js";

export const DEFAULT_PROFILE = "docker";

const PROFILES_DIR = fileURLToPath(new URL("../profiles/", import.meta.url));
const TEMPLATES_DIR = fileURLToPath(new URL("../templates/", import.meta.url));

/** A path to a JSON file, or the name of a built-in profile. */
export function resolveProfilePath(input: string): string {
  if (input.endsWith(".json") || input.includes("/")) return input;
  return `${PROFILES_DIR}${input}.json`;
}

export async function loadProfile(input: string = DEFAULT_PROFILE): Promise<ProvisionProfile> {
  const profilePath = resolveProfilePath(input);
  if (!existsSync(profilePath)) {
    throw new ProfileError(`Profile not found at ${profilePath}`);
  }
  const raw = await readFile(profilePath, "utf-8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ProfileError(`Invalid JSON in ${profilePath}`);
  }

  const result = ProvisionProfileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ProfileError(`Profile validation failed:\n${issues}`);
  }

  return result.data;
}

export async function loadTemplate(name: string): Promise<string> {
  const path = `${TEMPLATES_DIR}${name}`;
  try {
    return await readFile(path, "utf-8");
  } catch {
    throw new ProfileError(`Template not found at ${path}`);
  }
}
