import { readFileSync, writeFileSync, existsSync, copyFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { ProvisionError } from "./errors.js";

const BEGIN_TAG = (name: string) => `# >>> hostprep: ${name} >>>`;
const END_TAG = (name: string) => `# <<< hostprep: ${name} <<<`;

export const BACKUP_SUFFIX = ".hostprep-backup";

export type UpsertAction = "created" | "appended" | "replaced" | "unchanged";

export interface UpsertResult {
  action: UpsertAction;
  /** Set when this write created the backup of the file as it was before hostprep. */
  backupPath?: string;
}

export function formatBlock(name: string, body: string): string {
  return [BEGIN_TAG(name), body.trimEnd(), END_TAG(name)].join("\n");
}

/**
 * Insert or replace the named block. Re-running with the same body leaves
 * the file untouched. The first real change backs up the previous file;
 * later changes keep that backup. A begin marker without its end marker
 * is refused.
 */
export function upsertManagedBlock(
  profilePath: string,
  name: string,
  body: string,
): UpsertResult {
  const block = formatBlock(name, body);

  if (!existsSync(profilePath)) {
    mkdirSync(dirname(profilePath), { recursive: true });
    writeFileSync(profilePath, block + "\n", "utf-8");
    return { action: "created" };
  }

  const original = readFileSync(profilePath, "utf-8");
  const begin = BEGIN_TAG(name);
  const end = END_TAG(name);

  let content: string;
  let action: UpsertAction;
  if (original.includes(begin)) {
    const regex = new RegExp(
      escapeRegExp(begin) + "[\\s\\S]*?" + escapeRegExp(end),
      "m",
    );
    if (!regex.test(original)) {
      throw new ProvisionError(
        `${profilePath} has a "${begin}" line without a matching "${end}" line`,
        "shell",
        [`Restore the "${end}" line or delete the partial block, then re-run.`],
      );
    }
    content = original.replace(regex, () => block);
    action = "replaced";
  } else {
    content = original.trimEnd() + "\n\n" + block + "\n";
    action = "appended";
  }

  if (content === original) return { action: "unchanged" };

  const backupPath = profilePath + BACKUP_SUFFIX;
  const backedUp = !existsSync(backupPath);
  if (backedUp) copyFileSync(profilePath, backupPath);
  writeFileSync(profilePath, content, "utf-8");
  return backedUp ? { action, backupPath } : { action };
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
