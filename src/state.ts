import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { z } from "zod";

const ProvisionRecordSchema = z.object({
  profile: z.string(),
  runtimeVersion: z.string(),
  platform: z.object({
    osFamily: z.string(),
    codename: z.string(),
    architecture: z.string(),
  }),
  keyPath: z.string(),
  descriptorPath: z.string(),
  packages: z.array(z.string()),
  provisionedAt: z.string(),
});

const StateFileSchema = z.object({
  profiles: z.record(z.string(), ProvisionRecordSchema),
});

export type ProvisionRecord = z.infer<typeof ProvisionRecordSchema>;
export type StateFile = z.infer<typeof StateFileSchema>;

export function stateDir(): string {
  return process.env.HOSTPREP_HOME ?? join(homedir(), ".hostprep");
}

function statePath(): string {
  return join(stateDir(), "state.json");
}

/** A missing or unreadable state file reads as empty. */
export function loadState(): StateFile {
  const path = statePath();
  if (!existsSync(path)) return { profiles: {} };
  try {
    const parsed = StateFileSchema.safeParse(JSON.parse(readFileSync(path, "utf-8")));
    return parsed.success ? parsed.data : { profiles: {} };
  } catch {
    return { profiles: {} };
  }
}

export function saveState(state: StateFile): void {
  mkdirSync(stateDir(), { recursive: true });
  writeFileSync(statePath(), JSON.stringify(state, null, 2) + "\n", "utf-8");
}

export function getRecord(profile: string): ProvisionRecord | undefined {
  return loadState().profiles[profile];
}

export function setRecord(record: ProvisionRecord): void {
  const state = loadState();
  state.profiles[record.profile] = record;
  saveState(state);
}
