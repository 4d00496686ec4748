import { dirname } from "node:path";
import { CommandError } from "./errors.js";
import { describeFailure, type Runner } from "./exec.js";

/**
 * System file operations routed through the runner, so writes under /etc
 * go through the same privilege escalation as the package manager.
 */
export class SystemFiles {
  constructor(private readonly runner: Runner) {}

  async isFile(path: string): Promise<boolean> {
    const result = await this.runner.run({ argv: ["test", "-f", path] });
    return result.exitCode === 0;
  }

  async ensureDir(path: string, mode = "0755"): Promise<void> {
    await this.must(["install", "-m", mode, "-d", path]);
  }

  /** Overwrite `path` with `content` and set its mode. Creates the parent directory. */
  async write(path: string, content: string, mode: string): Promise<void> {
    await this.ensureDir(dirname(path));
    const result = await this.runner.run({
      argv: ["tee", path],
      stdin: content,
      privileged: true,
    });
    if (result.exitCode !== 0) {
      await this.remove(path);
      throw new CommandError(["tee", path], result.exitCode, describeFailure(result));
    }
    await this.chmod(path, mode);
  }

  async chmod(path: string, mode: string): Promise<void> {
    await this.must(["chmod", mode, path]);
  }

  async remove(path: string): Promise<void> {
    await this.must(["rm", "-f", path]);
  }

  private async must(argv: string[]): Promise<void> {
    const result = await this.runner.run({ argv, privileged: true });
    if (result.exitCode !== 0) {
      throw new CommandError(argv, result.exitCode, describeFailure(result));
    }
  }
}
