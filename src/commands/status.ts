import chalk from "chalk";
import { loadState, stateDir } from "../state.js";

export async function statusCommand() {
  const state = loadState();
  const records = Object.values(state.profiles);

  if (records.length === 0) {
    console.log(chalk.dim("\nNothing provisioned yet.\n"));
    return;
  }

  for (const record of records) {
    console.log(chalk.bold(`\n${record.profile}`));
    console.log(`  ${chalk.green("Runtime:")} ${record.runtimeVersion}`);
    console.log(
      chalk.dim(
        `  Platform: ${record.platform.osFamily} ${record.platform.codename} (${record.platform.architecture})`,
      ),
    );
    console.log(chalk.dim(`  Provisioned: ${record.provisionedAt}`));
    console.log(chalk.dim(`  Key: ${record.keyPath}`));
    console.log(chalk.dim(`  Repository: ${record.descriptorPath}`));
    console.log(chalk.dim(`  Packages: ${record.packages.join(", ")}`));
  }
  console.log(chalk.dim(`\nState: ${stateDir()}/state.json`));
}
