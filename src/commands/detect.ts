import chalk from "chalk";
import { LocalRunner } from "../exec.js";
import { checkCompatibility, formatSupported, supportMatrixOf } from "../gate.js";
import { loadProfile } from "../loader.js";
import { createConsoleReporter } from "../log.js";
import { createHostProbe, detectPlatform } from "../platform.js";
import { reportFailure } from "../provision.js";

/** Print what the detector sees and whether the profile's gate accepts it. */
export async function detectCommand(profileArg: string | undefined) {
  const reporter = createConsoleReporter();
  const runner = new LocalRunner({ privilege: "none" });

  try {
    const profile = await loadProfile(profileArg);
    const platform = await detectPlatform(createHostProbe(runner));

    console.log(chalk.bold("\nPlatform"));
    console.log(`  OS family:     ${platform.osFamily}`);
    console.log(`  Distribution:  ${platform.distribution || chalk.dim("(unknown)")}`);
    console.log(`  Codename:      ${platform.codename || chalk.dim("(none)")}`);
    console.log(`  Architecture:  ${platform.architecture} ${chalk.dim(`(${platform.machine})`)}`);

    const matrix = supportMatrixOf(profile);
    const gate = checkCompatibility(platform, matrix);
    console.log(chalk.bold(`\nProfile ${profile.name}`));
    console.log(chalk.dim(`  Supports ${formatSupported(matrix)}`));
    if (gate.ok) {
      console.log(`  ${chalk.green("OK")}  supported`);
    } else {
      console.log(`  ${chalk.red("FAIL")}  ${gate.error.message}`);
      process.exit(gate.error.exitCode);
    }
  } catch (err: unknown) {
    process.exit(reportFailure(reporter, err, undefined, "config").exitCode);
  }
}
