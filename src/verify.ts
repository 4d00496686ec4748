import { VerificationFailure } from "./errors.js";
import { describeFailure, type Runner } from "./exec.js";

export interface VerificationReport {
  runtimeOK: boolean;
  versionString?: string;
  /** Why the workload probe failed, when it did. */
  workloadDetail?: string;
}

export interface VerifierOptions {
  smokeTest: string[];
  versionProbe: string[];
}

/**
 * "Packages are on disk" is not success; the runtime has to run something.
 * Both probes always run so the report shows each outcome.
 */
export class Verifier {
  constructor(
    private readonly runner: Runner,
    private readonly opts: VerifierOptions,
  ) {}

  async verify(): Promise<VerificationReport> {
    const workload = await this.runner.run({
      argv: this.opts.smokeTest,
      privileged: true,
    });
    const version = await this.runner.run({ argv: this.opts.versionProbe });
    const versionString = version.stdout.trim();

    return {
      runtimeOK: workload.exitCode === 0,
      versionString:
        version.exitCode === 0 && versionString.length > 0 ? versionString : undefined,
      workloadDetail: workload.exitCode === 0 ? undefined : describeFailure(workload),
    };
  }
}

export function assertVerified(report: VerificationReport, opts: VerifierOptions): void {
  if (!report.runtimeOK) {
    throw new VerificationFailure(
      `Smoke test \`${opts.smokeTest.join(" ")}\` failed: ${report.workloadDetail ?? "non-zero exit"}`,
    );
  }
  if (report.versionString === undefined) {
    throw new VerificationFailure(
      `Version probe \`${opts.versionProbe.join(" ")}\` returned no version`,
    );
  }
}
