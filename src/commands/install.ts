import chalk from "chalk";
import { createInterface } from "node:readline";
import { LocalRunner, resolvePrivilege } from "../exec.js";
import { loadProfile } from "../loader.js";
import { createConsoleReporter } from "../log.js";
import { createHostProbe } from "../platform.js";
import { provision, reportFailure } from "../provision.js";
import type { ProvisionProfile } from "../schema.js";

export interface InstallOptions {
  dryRun?: boolean;
  yes?: boolean;
  sudo: boolean;
  user?: string;
  verbose?: boolean;
  quiet?: boolean;
}

async function confirm(message: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(`${message} [y/N] `, (answer) => {
      rl.close();
      resolve(answer.trim().toLowerCase() === "y");
    });
  });
}

export async function installCommand(profileArg: string | undefined, opts: InstallOptions) {
  const reporter = createConsoleReporter({ quiet: opts.quiet });
  reporter.info(chalk.bold("\nhostprep\n"));

  let profile: ProvisionProfile;
  try {
    profile = await loadProfile(profileArg);
  } catch (err: unknown) {
    process.exit(reportFailure(reporter, err, undefined, "config").exitCode);
  }
  reporter.info(`Provisioning ${chalk.cyan(profile.name)}` + chalk.dim(`: ${profile.description}`));

  if (!opts.yes && !opts.dryRun) {
    const ok = await confirm("\nThis installs system packages with the native package manager. Proceed?");
    if (!ok) {
      reporter.info(chalk.yellow("Aborted."));
      return;
    }
  }

  const runner = new LocalRunner({
    privilege: resolvePrivilege(opts.sudo),
    verbose: opts.verbose,
  });
  const outcome = await provision(
    profile,
    { runner, probe: createHostProbe(runner), reporter },
    { dryRun: opts.dryRun, user: opts.user ?? process.env.SUDO_USER ?? process.env.USER },
  );
  process.exit(outcome.exitCode);
}
