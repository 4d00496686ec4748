import chalk from "chalk";
import { errorMessage } from "../errors.js";
import { formatSupported, supportMatrixOf } from "../gate.js";
import { loadProfile, resolveProfilePath } from "../loader.js";

export async function validateCommand(profileArg: string) {
  console.log(chalk.bold(`Validating ${resolveProfilePath(profileArg)}\n`));

  try {
    const profile = await loadProfile(profileArg);
    console.log(chalk.green("Valid!"));
    console.log(`  Name:        ${profile.name}`);
    console.log(`  Description: ${profile.description}`);
    console.log(`  Platforms:   ${formatSupported(supportMatrixOf(profile))}`);

    for (const [family, target] of Object.entries(profile.platforms)) {
      if (!target) continue;
      console.log(
        `  ${family}:`.padEnd(15) +
          `${target.packages.runtime.length} runtime, ` +
          `${target.packages.prerequisites.length} prerequisite, ` +
          `${target.packages.conflicting.length} conflicting packages` +
          (target.trust.sha256 ? chalk.dim(" (key pinned)") : ""),
      );
    }

    if (profile.services.length > 0) {
      console.log(`  Services:    ${profile.services.join(", ")}`);
    }
    console.log(`  Smoke test:  ${profile.verify.smokeTest.join(" ")}`);
    if (profile.shell) {
      console.log(`  Shell:       ${profile.shell.packages.join(", ")}`);
    }
  } catch (err: unknown) {
    console.log(chalk.red("Invalid!"));
    console.log(errorMessage(err));
    process.exit(1);
  }
}
