import { spawn } from "node:child_process";
import chalk from "chalk";

/**
 * A structured command. Callers never build shell strings; `privileged`
 * asks the runner to apply its escalation prefix.
 */
export interface Command {
  readonly argv: readonly string[];
  readonly env?: Readonly<Record<string, string>>;
  readonly stdin?: string;
  readonly privileged?: boolean;
  readonly timeoutMs?: number;
}

export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

export interface Runner {
  run(command: Command): Promise<ExecResult>;
}

export type Privilege = "sudo" | "none";

export interface LocalRunnerOptions {
  privilege: Privilege;
  /** Echo each command and its output as it runs. */
  verbose?: boolean;
  defaultTimeoutMs?: number;
}

const COMMAND_NOT_FOUND = 127;
const TIMED_OUT = 124;

/** Runs commands on this machine. Never rejects: failures come back as exit codes. */
export class LocalRunner implements Runner {
  constructor(private readonly opts: LocalRunnerOptions) {}

  run(command: Command): Promise<ExecResult> {
    const argv =
      command.privileged && this.opts.privilege === "sudo"
        ? ["sudo", ...envAssignments(command), ...command.argv]
        : [...command.argv];
    const [cmd, ...args] = argv;
    const timeoutMs = command.timeoutMs ?? this.opts.defaultTimeoutMs ?? 600_000;
    const start = performance.now();

    if (this.opts.verbose) {
      console.error(chalk.dim(`  $ ${argv.join(" ")}`));
    }

    return new Promise<ExecResult>((resolve) => {
      const child = spawn(cmd, args, {
        env: command.env ? { ...process.env, ...command.env } : process.env,
        stdio: ["pipe", "pipe", "pipe"],
      });
      let stdout = "";
      let stderr = "";
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGTERM");
      }, timeoutMs);

      child.stdout.setEncoding("utf-8");
      child.stderr.setEncoding("utf-8");
      child.stdout.on("data", (chunk: string) => {
        stdout += chunk;
        if (this.opts.verbose) process.stderr.write(chalk.dim(chunk));
      });
      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
        if (this.opts.verbose) process.stderr.write(chalk.dim(chunk));
      });

      const finish = (exitCode: number) => {
        clearTimeout(timer);
        resolve({
          stdout,
          stderr,
          exitCode,
          durationMs: Math.round(performance.now() - start),
        });
      };

      child.on("error", (err: NodeJS.ErrnoException) => {
        if (err.code === "ENOENT") {
          stderr += `${cmd}: command not found`;
          finish(COMMAND_NOT_FOUND);
          return;
        }
        stderr += err.message;
        finish(1);
      });
      child.on("close", (code) => {
        if (timedOut) {
          stderr += `\n${cmd}: timed out after ${timeoutMs}ms`;
          finish(TIMED_OUT);
          return;
        }
        finish(code ?? 1);
      });

      child.stdin.on("error", () => {
        // The child exited before reading stdin; its exit code tells the story.
      });
      if (command.stdin !== undefined) {
        child.stdin.end(command.stdin);
      } else {
        child.stdin.end();
      }
    });
  }
}

// sudo resets the environment, so variables have to travel as arguments.
function envAssignments(command: Command): string[] {
  return Object.entries(command.env ?? {}).map(([k, v]) => `${k}=${v}`);
}

/** The most useful single line of a failed command's output. */
export function describeFailure(result: ExecResult): string {
  const lines = `${result.stderr}\n${result.stdout}`
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
  const flagged = lines.find((l) => /^(E:|Error:|error:)/.test(l));
  return flagged ?? lines[lines.length - 1] ?? `exit code ${result.exitCode}`;
}

/** No escalation when asked not to, or when already root. */
export function resolvePrivilege(useSudo: boolean): Privilege {
  return !useSudo || process.getuid?.() === 0 ? "none" : "sudo";
}
