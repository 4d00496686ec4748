import chalk from "chalk";
import { createAdapter } from "./adapters/factory.js";
import type { PackageManagerAdapter } from "./adapters/types.js";
import {
  CommandError,
  EXIT_CODES,
  ProvisionError,
  errorMessage,
  type Stage,
} from "./errors.js";
import { describeFailure, type Runner } from "./exec.js";
import { SystemFiles } from "./files.js";
import { checkCompatibility, supportMatrixOf } from "./gate.js";
import type { Reporter } from "./log.js";
import { Pipeline, type InstallStep, type PipelineState, type StepResult } from "./pipeline.js";
import { detectPlatform, type HostProbe, type OsFamily, type PlatformInfo } from "./platform.js";
import type { FamilyTarget, ProvisionProfile } from "./schema.js";
import { setRecord, type ProvisionRecord } from "./state.js";
import { TrustInstaller, type TextFetcher, type TrustMaterial } from "./trust.js";
import { Verifier, assertVerified, type VerificationReport } from "./verify.js";

export interface ProvisionDeps {
  runner: Runner;
  probe: HostProbe;
  reporter: Reporter;
  fetchText?: TextFetcher;
  /** Persists a verified run. Defaults to the state file. */
  record?: (record: ProvisionRecord) => void;
}

export interface ProvisionOptions {
  dryRun?: boolean;
  /** Added to the runtime group; skipped when unset or root. */
  user?: string;
}

/** Mutable scratch space the steps hand results through. */
export interface InstallContext {
  trust?: TrustMaterial;
  descriptorPath?: string;
}

export interface ProvisionOutcome {
  exitCode: number;
  platform?: PlatformInfo;
  pipeline?: PipelineState;
  results: readonly StepResult<InstallContext>[];
  report?: VerificationReport;
  error?: ProvisionError;
}

const STAGE_LABELS: Record<Stage, string> = {
  config: "Configuration",
  detect: "Platform detection",
  gate: "Compatibility check",
  pipeline: "Installation",
  verify: "Verification",
  shell: "Shell setup",
};

export function targetFor(
  profile: ProvisionProfile,
  family: OsFamily,
): FamilyTarget | undefined {
  return family === "unknown" ? undefined : profile.platforms[family];
}

/** Print "<stage> failed: <message>" plus hints, and convert to a ProvisionError. */
export function reportFailure(
  reporter: Reporter,
  err: unknown,
  stepName?: string,
  fallbackStage: Stage = "pipeline",
): ProvisionError {
  const error =
    err instanceof ProvisionError ? err : new ProvisionError(errorMessage(err), fallbackStage);
  const where = stepName ? ` at step "${stepName}"` : "";
  reporter.error(`\n${STAGE_LABELS[error.stage]} failed${where}: ${error.message}`);
  for (const hint of error.hints) reporter.detail(hint);
  return error;
}

export interface StepDeps {
  profile: ProvisionProfile;
  target: FamilyTarget;
  platform: PlatformInfo;
  adapter: PackageManagerAdapter;
  trust: TrustInstaller;
  runner: Runner;
  reporter: Reporter;
  user?: string;
}

export function buildInstallSteps(deps: StepDeps): InstallStep<InstallContext>[] {
  const { profile, target, platform, adapter, trust, runner, reporter } = deps;
  const packages = target.packages;

  const steps: InstallStep<InstallContext>[] = [
    {
      name: "remove-conflicting-packages",
      description: `Remove ${packages.conflicting.length} conflicting packages if present`,
      idempotent: true,
      critical: false,
      async action() {
        const report = await adapter.removePackagesIfPresent(packages.conflicting);
        if (report.removed.length > 0) {
          reporter.detail(`removed: ${report.removed.join(", ")}`);
        }
      },
    },
    {
      name: "install-prerequisites",
      description: `Refresh the ${adapter.name} index and install prerequisites`,
      idempotent: true,
      critical: true,
      async action() {
        await adapter.refreshIndex();
        await adapter.installPackages(packages.prerequisites);
      },
    },
    {
      name: "install-trust",
      description: `Install the signing key from ${target.trust.keyUrl}`,
      idempotent: true,
      critical: true,
      async action(ctx) {
        ctx.trust = await trust.installTrust(target.trust.keyUrl);
        reporter.detail(`key: ${ctx.trust.keyInstallPath}`);
      },
    },
    {
      name: "register-repository",
      description: "Register the signed package repository",
      idempotent: true,
      critical: true,
      async action(ctx) {
        if (!ctx.trust) throw new Error("no trust material was installed");
        ctx.descriptorPath = await trust.registerRepository(ctx.trust, platform);
        reporter.detail(`repository: ${ctx.descriptorPath}`);
      },
    },
    {
      name: "install-runtime",
      description: `Install ${packages.runtime.join(", ")}`,
      idempotent: true,
      critical: true,
      async action() {
        await adapter.refreshIndex();
        await adapter.installPackages(packages.runtime);
      },
    },
  ];

  if (profile.services.length > 0) {
    steps.push({
      name: "enable-services",
      description: `Enable and start ${profile.services.join(", ")}`,
      idempotent: true,
      critical: true,
      async action() {
        for (const unit of profile.services) {
          const argv = ["systemctl", "enable", "--now", unit];
          const result = await runner.run({ argv, privileged: true });
          if (result.exitCode !== 0) {
            throw new CommandError(argv, result.exitCode, describeFailure(result));
          }
        }
      },
    });
  }

  const group = profile.group;
  if (group !== undefined) {
    steps.push({
      name: "configure-group",
      description: `Let ${deps.user ?? "the invoking user"} use the runtime without sudo`,
      idempotent: true,
      critical: false,
      async action() {
        const create = ["groupadd", "-f", group];
        const created = await runner.run({ argv: create, privileged: true });
        if (created.exitCode !== 0) {
          throw new CommandError(create, created.exitCode, describeFailure(created));
        }
        if (!deps.user || deps.user === "root") {
          reporter.detail("no non-root user to add; skipping");
          return;
        }
        const add = ["usermod", "-aG", group, deps.user];
        const added = await runner.run({ argv: add, privileged: true });
        if (added.exitCode !== 0) {
          throw new CommandError(add, added.exitCode, describeFailure(added));
        }
      },
    });
  }

  return steps;
}

function printPlan(
  reporter: Reporter,
  steps: InstallStep<InstallContext>[],
  trust: TrustInstaller,
  target: FamilyTarget,
  adapter: PackageManagerAdapter,
  platform: PlatformInfo,
): void {
  reporter.info(chalk.bold("\nInstall plan:"));
  steps.forEach((step, i) => {
    const flag = step.critical ? "" : chalk.dim(" (best effort)");
    reporter.info(`  ${i + 1}. ${step.name}${flag}: ${step.description}`);
  });

  const material = trust.plannedMaterial(target.trust.keyUrl);
  const spec = trust.repositorySpec(material, platform);
  reporter.info(chalk.bold("\nRepository descriptor:"));
  reporter.detail(adapter.descriptorPath(spec.name));
  reporter.detail(adapter.renderDescriptor(spec).trimEnd());
}

/**
 * Detect, gate, run the install pipeline and verify. Expected failures come
 * back as a non-zero exitCode with the diagnostic already reported.
 */
export async function provision(
  profile: ProvisionProfile,
  deps: ProvisionDeps,
  options: ProvisionOptions = {},
): Promise<ProvisionOutcome> {
  const { reporter, runner } = deps;
  const fail = (
    err: unknown,
    extra: Partial<ProvisionOutcome> = {},
    stepName?: string,
  ): ProvisionOutcome => {
    const error = reportFailure(reporter, err, stepName);
    return { ...extra, results: extra.results ?? [], exitCode: error.exitCode, error };
  };

  let platform: PlatformInfo;
  try {
    platform = await detectPlatform(deps.probe);
  } catch (err: unknown) {
    return fail(err);
  }
  reporter.info(
    `Detected ${chalk.cyan(platform.distribution || platform.osFamily)} ` +
      `${chalk.cyan(platform.codename || "(no codename)")} on ${platform.architecture}` +
      chalk.dim(` (${platform.osFamily}, ${platform.machine})`),
  );

  const gate = checkCompatibility(platform, supportMatrixOf(profile));
  if (!gate.ok) return fail(gate.error, { platform });

  const target = targetFor(profile, platform.osFamily);
  if (!target) {
    return fail(new ProvisionError(`Profile has no ${platform.osFamily} section`, "gate"), {
      platform,
    });
  }

  const files = new SystemFiles(runner);
  const adapter = createAdapter(platform.osFamily, runner, files);
  const trust = new TrustInstaller(adapter, files, runner, {
    keyName: profile.keyName,
    target,
    fetchText: deps.fetchText,
  });
  const steps = buildInstallSteps({
    profile,
    target,
    platform,
    adapter,
    trust,
    runner,
    reporter,
    user: options.user,
  });

  if (options.dryRun) {
    printPlan(reporter, steps, trust, target, adapter, platform);
    reporter.info(chalk.yellow("\nDry run: no changes were made."));
    return { exitCode: EXIT_CODES.success, platform, results: [] };
  }

  const pipeline = new Pipeline<InstallContext>(steps, {
    onStepStart(step, index, total) {
      reporter.step(index, total, step.name);
      reporter.detail(step.description);
    },
    onStepEnd(result) {
      if (result.success) {
        reporter.success(`${result.step.name} ${chalk.dim(`(${result.durationMs}ms)`)}`);
      } else if (!result.step.critical) {
        reporter.warn(`${result.step.name} failed, continuing: ${result.errorDetail}`);
      }
    },
  });
  const ctx: InstallContext = {};
  const state = await pipeline.run(ctx);
  const results = pipeline.stepResults;

  if (state.status === "failedAt") {
    const outcome = fail(state.error, { platform, pipeline: state, results }, state.stepName);
    return { ...outcome, exitCode: EXIT_CODES.pipeline };
  }

  reporter.info(chalk.bold("\nVerifying installation"));
  const verifier = new Verifier(runner, profile.verify);
  const report = await verifier.verify();
  try {
    assertVerified(report, profile.verify);
  } catch (err: unknown) {
    return fail(err, { platform, pipeline: state, results, report });
  }
  reporter.success(`runtime works: ${report.versionString}`);

  const record = deps.record ?? setRecord;
  try {
    record({
      profile: profile.name,
      runtimeVersion: report.versionString ?? "",
      platform: {
        osFamily: platform.osFamily,
        codename: platform.codename,
        architecture: platform.architecture,
      },
      keyPath: ctx.trust?.keyInstallPath ?? "",
      descriptorPath: ctx.descriptorPath ?? "",
      packages: target.packages.runtime,
      provisionedAt: new Date().toISOString(),
    });
  } catch (err: unknown) {
    // the host is provisioned; only the local record is missing
    reporter.warn(`Could not record this run: ${errorMessage(err)}`);
  }

  reporter.info(chalk.bold.green(`\n${profile.name} provisioned successfully.`));
  const message = profile.postInstall?.message;
  for (const line of typeof message === "string" ? [message] : message ?? []) {
    reporter.info(line);
  }

  return { exitCode: EXIT_CODES.success, platform, pipeline: state, results, report };
}
