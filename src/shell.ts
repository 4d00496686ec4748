import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import chalk from "chalk";
import { createAdapter } from "./adapters/factory.js";
import { upsertManagedBlock } from "./env.js";
import { CommandError, EXIT_CODES, UnsupportedPlatformError, type ProvisionError } from "./errors.js";
import { describeFailure, type Runner } from "./exec.js";
import { SystemFiles } from "./files.js";
import { SUPPORTED_FAMILIES } from "./gate.js";
import { loadTemplate } from "./loader.js";
import type { Reporter } from "./log.js";
import { Pipeline, type InstallStep, type PipelineState } from "./pipeline.js";
import { detectPlatform, type HostProbe, type PlatformInfo } from "./platform.js";
import { reportFailure } from "./provision.js";
import type { ShellConfig } from "./schema.js";
import { httpsFetcher, type TextFetcher } from "./trust.js";

export const SHELL_BLOCK = "shell";

export interface ShellDeps {
  runner: Runner;
  probe: HostProbe;
  reporter: Reporter;
  home: string;
  /** Oh My Zsh custom directory; defaults to ~/.oh-my-zsh/custom. */
  zshCustom?: string;
  fetchText?: TextFetcher;
}

export interface ShellOutcome {
  exitCode: number;
  pipeline?: PipelineState;
  error?: ProvisionError;
}

/** Single-quote for sh. */
function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Body of the managed ~/.zshrc block. */
export function renderZshrc(config: ShellConfig): string {
  const lines = [
    'export ZSH="$HOME/.oh-my-zsh"',
    `ZSH_THEME=${shellQuote(config.theme)}`,
    "plugins=(",
    ...config.plugins.map((p) => `    ${p}`),
    ")",
    "source $ZSH/oh-my-zsh.sh",
  ];
  if (config.starship) {
    lines.push('eval "$(starship init zsh)"');
  }
  for (const [name, command] of Object.entries(config.aliases)) {
    lines.push(`alias ${name}=${shellQuote(command)}`);
  }
  return lines.join("\n");
}

async function runInstaller(
  runner: Runner,
  fetchText: TextFetcher,
  url: string,
  args: string[],
  env: Record<string, string> = {},
): Promise<void> {
  const script = await fetchText(url);
  const argv = ["sh", "-s", "--", ...args];
  const result = await runner.run({ argv, stdin: script, env });
  if (result.exitCode !== 0) {
    throw new CommandError([...argv, `< ${url}`], result.exitCode, describeFailure(result), "shell");
  }
}

export function buildShellSteps(
  config: ShellConfig,
  deps: ShellDeps & { installPackages(): Promise<void> },
): InstallStep<void>[] {
  const { runner, reporter, home } = deps;
  const fetchText = deps.fetchText ?? httpsFetcher;
  const ohMyZshDir = join(home, ".oh-my-zsh");
  const steps: InstallStep<void>[] = [
    {
      name: "install-shell-packages",
      description: `Install ${config.packages.join(", ")}`,
      idempotent: true,
      critical: true,
      action: () => deps.installPackages(),
    },
    {
      name: "configure-zshrc",
      description: "Write the managed block in ~/.zshrc",
      idempotent: true,
      critical: true,
      async action() {
        const result = upsertManagedBlock(join(home, ".zshrc"), SHELL_BLOCK, renderZshrc(config));
        reporter.detail(`~/.zshrc ${result.action}`);
        if (result.backupPath) reporter.detail(`previous version saved to ${result.backupPath}`);
      },
    },
    {
      name: "install-oh-my-zsh",
      description: "Install Oh My Zsh",
      idempotent: true,
      critical: true,
      async action() {
        if (existsSync(ohMyZshDir)) {
          reporter.detail("already installed");
          return;
        }
        // KEEP_ZSHRC leaves the file written by configure-zshrc in place
        await runInstaller(runner, fetchText, config.ohMyZsh.installerUrl, ["--unattended"], {
          RUNZSH: "no",
          CHSH: "no",
          KEEP_ZSHRC: "yes",
        });
      },
    },
  ];

  const starship = config.starship;
  if (starship) {
    steps.push({
      name: "install-starship",
      description: "Install the Starship prompt",
      idempotent: true,
      critical: true,
      async action() {
        const found = await runner.run({ argv: ["sh", "-c", "command -v starship"] });
        if (found.exitCode === 0) {
          reporter.detail("already installed");
          return;
        }
        await runInstaller(runner, fetchText, starship.installerUrl, ["-y"]);
      },
    });
  }

  if (config.customPlugins.length > 0) {
    steps.push({
      name: "install-zsh-plugins",
      description: `Clone ${config.customPlugins.map((p) => p.name).join(", ")}`,
      idempotent: true,
      critical: false,
      async action() {
        const pluginDir = join(deps.zshCustom ?? join(ohMyZshDir, "custom"), "plugins");
        for (const plugin of config.customPlugins) {
          const dest = join(pluginDir, plugin.name);
          if (existsSync(dest)) {
            reporter.detail(`${plugin.name}: already cloned`);
            continue;
          }
          const argv = ["git", "clone", "--depth", "1", plugin.repo, dest];
          const result = await runner.run({ argv });
          if (result.exitCode !== 0) {
            throw new CommandError(argv, result.exitCode, describeFailure(result), "shell");
          }
        }
      },
    });
  }

  if (starship) {
    steps.push({
      name: "configure-starship",
      description: "Write ~/.config/starship.toml",
      idempotent: true,
      critical: false,
      async action() {
        const target = join(home, ".config", "starship.toml");
        if (existsSync(target)) {
          reporter.detail("keeping existing starship.toml");
          return;
        }
        const template = await loadTemplate(starship.config);
        mkdirSync(dirname(target), { recursive: true });
        writeFileSync(target, template, "utf-8");
      },
    });
  }

  return steps;
}

/** Set up zsh, Oh My Zsh and Starship for the invoking user. */
export async function setupShell(config: ShellConfig, deps: ShellDeps): Promise<ShellOutcome> {
  const { reporter, runner } = deps;

  let platform: PlatformInfo;
  try {
    platform = await detectPlatform(deps.probe);
  } catch (err: unknown) {
    const error = reportFailure(reporter, err);
    return { exitCode: error.exitCode, error };
  }
  if (platform.osFamily === "unknown") {
    const error = reportFailure(
      reporter,
      new UnsupportedPlatformError(
        `No supported package manager on '${platform.distribution || "unidentified"}'`,
        { osFamily: platform.osFamily, codename: platform.codename },
        SUPPORTED_FAMILIES.join(", "),
      ),
    );
    return { exitCode: error.exitCode, error };
  }

  const adapter = createAdapter(platform.osFamily, runner, new SystemFiles(runner));
  const steps = buildShellSteps(config, {
    ...deps,
    async installPackages() {
      await adapter.refreshIndex();
      await adapter.installPackages(config.packages);
    },
  });

  const pipeline = new Pipeline<void>(steps, {
    onStepStart(step, index, total) {
      reporter.step(index, total, step.name);
    },
    onStepEnd(result) {
      if (result.success) reporter.success(result.step.name);
      else if (!result.step.critical) {
        reporter.warn(`${result.step.name} failed, continuing: ${result.errorDetail}`);
      }
    },
  });
  const state = await pipeline.run(undefined);

  if (state.status === "failedAt") {
    const error = reportFailure(reporter, state.error, state.stepName, "shell");
    return { exitCode: EXIT_CODES.shell, pipeline: state, error };
  }

  reporter.info(chalk.bold.green("\nShell environment ready."));
  reporter.info("Restart your terminal or run: exec zsh");
  return { exitCode: EXIT_CODES.success, pipeline: state };
}
