import chalk from "chalk";

/** Where the orchestrator sends its human-readable progress. */
export interface Reporter {
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  /** Secondary detail, printed dimmed. */
  detail(msg: string): void;
  step(index: number, total: number, name: string): void;
}

export function createConsoleReporter(opts: { quiet?: boolean } = {}): Reporter {
  const quiet = opts.quiet ?? false;
  return {
    info(msg) {
      if (!quiet) console.log(msg);
    },
    success(msg) {
      if (!quiet) console.log(`  ${chalk.green("OK")}  ${msg}`);
    },
    warn(msg) {
      console.warn(`  ${chalk.yellow("WARN")}  ${msg}`);
    },
    error(msg) {
      console.error(chalk.red(msg));
    },
    detail(msg) {
      if (!quiet) console.log(chalk.dim(`      ${msg}`));
    },
    step(index, total, name) {
      if (!quiet) console.log(chalk.bold(`\n[${index + 1}/${total}] ${name}`));
    },
  };
}

/** Collects lines instead of printing them. */
export class MemoryReporter implements Reporter {
  readonly lines: string[] = [];

  info(msg: string): void {
    this.lines.push(msg);
  }
  success(msg: string): void {
    this.lines.push(`OK ${msg}`);
  }
  warn(msg: string): void {
    this.lines.push(`WARN ${msg}`);
  }
  error(msg: string): void {
    this.lines.push(`ERROR ${msg}`);
  }
  detail(msg: string): void {
    this.lines.push(`  ${msg}`);
  }
  step(index: number, total: number, name: string): void {
    this.lines.push(`[${index + 1}/${total}] ${name}`);
  }
}
