import { z } from "zod";

const httpsUrl = z
  .string()
  .url()
  .refine((u) => u.startsWith("https://"), "Must be an https URL");

// --- Packages ---

const PackageSets = z.object({
  conflicting: z
    .array(z.string())
    .default([])
    .describe("Packages removed first if present (best effort)"),
  prerequisites: z.array(z.string()).default([]),
  runtime: z.array(z.string()).min(1),
});

// --- Trust material and repository ---

const Trust = z.object({
  keyUrl: httpsUrl.describe("ASCII-armored signing key"),
  sha256: z
    .string()
    .regex(/^[a-f0-9]{64}$/, "Must be a lowercase hex SHA-256 digest")
    .optional()
    .describe("Pin the fetched key to this digest"),
});

const Repository = z.object({
  url: z
    .string()
    .describe("Base URL; may use {codename}, {arch} and {distribution}"),
  suite: z.string().default("{codename}").describe("apt suite"),
  components: z.array(z.string()).min(1).default(["stable"]),
  label: z.string().optional().describe("yum repository display name"),
});

const FamilyTarget = z.object({
  codenames: z
    .array(z.string().regex(/^[a-z0-9.]+$/, "Codenames are lowercase"))
    .min(1),
  packages: PackageSets,
  trust: Trust,
  repository: Repository,
});

// --- Verification ---

const Verify = z.object({
  smokeTest: z.array(z.string()).min(1).describe("Runs privileged; must exit 0"),
  versionProbe: z.array(z.string()).min(1),
});

// --- Companion shell environment ---

const ShellPlugin = z.object({
  name: z.string().regex(/^[A-Za-z0-9._-]+$/),
  repo: httpsUrl,
});

const Shell = z.object({
  packages: z.array(z.string()).default(["zsh", "curl", "git"]),
  ohMyZsh: z.object({ installerUrl: httpsUrl }),
  starship: z
    .object({
      installerUrl: httpsUrl,
      config: z
        .string()
        .regex(/^[A-Za-z0-9._-]+$/)
        .default("starship.toml")
        .describe("Template under templates/"),
    })
    .optional(),
  theme: z.string().default("clean"),
  plugins: z.array(z.string()).default(["git"]).describe("Oh My Zsh plugins to enable"),
  customPlugins: z.array(ShellPlugin).default([]),
  aliases: z.record(z.string(), z.string()).default({}),
});

// --- Top-level schema ---

export const ProvisionProfileSchema = z.object({
  name: z.string().regex(/^[a-z0-9-]+$/, "Must be lowercase kebab-case"),
  description: z.string(),
  keyName: z
    .string()
    .regex(/^[a-z0-9-]+$/)
    .describe("Base name of the key file and repository descriptor"),

  platforms: z
    .object({
      debianLike: FamilyTarget.optional(),
      rhelLike: FamilyTarget.optional(),
    })
    .refine(
      (p) => p.debianLike !== undefined || p.rhelLike !== undefined,
      "At least one platform family is required",
    ),

  services: z.array(z.string()).default([]).describe("systemd units enabled after install"),
  group: z.string().optional().describe("Group the invoking user is added to"),
  verify: Verify,

  postInstall: z
    .object({
      message: z.union([z.string(), z.array(z.string())]).optional(),
    })
    .optional(),

  shell: Shell.optional(),
});

export type ProvisionProfile = z.infer<typeof ProvisionProfileSchema>;
export type FamilyTarget = z.infer<typeof FamilyTarget>;
export type ShellConfig = z.infer<typeof Shell>;
