import chalk from "chalk";
import { homedir } from "node:os";
import { ProfileError } from "../errors.js";
import { LocalRunner, resolvePrivilege } from "../exec.js";
import { loadProfile } from "../loader.js";
import { createConsoleReporter } from "../log.js";
import { createHostProbe } from "../platform.js";
import { reportFailure } from "../provision.js";
import type { ShellConfig } from "../schema.js";
import { setupShell } from "../shell.js";

export async function shellCommand(
  profileArg: string | undefined,
  opts: { sudo: boolean; verbose?: boolean; quiet?: boolean },
) {
  const reporter = createConsoleReporter({ quiet: opts.quiet });
  reporter.info(chalk.bold("\nhostprep shell\n"));

  let config: ShellConfig;
  try {
    const profile = await loadProfile(profileArg);
    if (!profile.shell) {
      throw new ProfileError(`Profile "${profile.name}" has no shell section`);
    }
    config = profile.shell;
  } catch (err: unknown) {
    process.exit(reportFailure(reporter, err, undefined, "config").exitCode);
  }

  const runner = new LocalRunner({
    privilege: resolvePrivilege(opts.sudo),
    verbose: opts.verbose,
  });
  const outcome = await setupShell(config, {
    runner,
    probe: createHostProbe(runner),
    reporter,
    home: homedir(),
    zshCustom: process.env.ZSH_CUSTOM,
  });
  process.exit(outcome.exitCode);
}
