import { describe, it, before, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { BACKUP_SUFFIX, formatBlock } from "./env.js";
import { loadProfile, loadTemplate } from "./loader.js";
import { MemoryReporter } from "./log.js";
import type { ShellConfig } from "./schema.js";
import { SHELL_BLOCK, renderZshrc, setupShell } from "./shell.js";
import { FakeFetcher, FakeHost, UBUNTU_NOBLE, fakeProbe } from "./testing/fake-host.js";

const OMZ_URL = "https://raw.githubusercontent.com/ohmyzsh/ohmyzsh/master/tools/install.sh";
const STARSHIP_URL = "https://starship.rs/install.sh";
const SCRIPT = "#!/bin/sh\necho installed\n";

describe("renderZshrc", () => {
  it("renders theme, plugins, prompt and aliases", () => {
    const config: ShellConfig = {
      packages: ["zsh"],
      ohMyZsh: { installerUrl: OMZ_URL },
      starship: { installerUrl: STARSHIP_URL, config: "starship.toml" },
      theme: "clean",
      plugins: ["git", "docker"],
      customPlugins: [],
      aliases: { ll: "ls -lah", greet: "echo 'hi'" },
    };
    assert.equal(
      renderZshrc(config),
      [
        'export ZSH="$HOME/.oh-my-zsh"',
        "ZSH_THEME='clean'",
        "plugins=(",
        "    git",
        "    docker",
        ")",
        "source $ZSH/oh-my-zsh.sh",
        'eval "$(starship init zsh)"',
        "alias ll='ls -lah'",
        "alias greet='echo '\\''hi'\\'''",
      ].join("\n"),
    );
  });

  it("leaves out the prompt hook without starship", () => {
    const config: ShellConfig = {
      packages: ["zsh"],
      ohMyZsh: { installerUrl: OMZ_URL },
      theme: "robbyrussell",
      plugins: [],
      customPlugins: [],
      aliases: {},
    };
    assert.ok(!renderZshrc(config).includes("starship"));
  });
});

describe("setupShell", () => {
  let config: ShellConfig;
  let home: string;

  before(async () => {
    const profile = await loadProfile("docker");
    assert.ok(profile.shell);
    config = profile.shell;
  });

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), "hostprep-shell-"));
  });

  afterEach(() => {
    rmSync(home, { recursive: true, force: true });
  });

  async function run(host: FakeHost, osRelease = UBUNTU_NOBLE) {
    const fetcher = new FakeFetcher({ [OMZ_URL]: SCRIPT, [STARSHIP_URL]: SCRIPT });
    const reporter = new MemoryReporter();
    const outcome = await setupShell(config, {
      runner: host,
      probe: fakeProbe({ osRelease }),
      reporter,
      home,
      fetchText: fetcher.fetch,
    });
    return { outcome, fetcher, reporter };
  }

  it("installs everything on a fresh account", async () => {
    const host = new FakeHost();
    const { outcome, fetcher } = await run(host);

    assert.equal(outcome.exitCode, 0);
    assert.deepEqual(fetcher.calls, [OMZ_URL, STARSHIP_URL]);
    const plugins = join(home, ".oh-my-zsh", "custom", "plugins");
    assert.deepEqual(host.commands(), [
      "apt-get update",
      "apt-get install -y zsh curl git",
      "sh -s -- --unattended",
      "sh -c command -v starship",
      "sh -s -- -y",
      `git clone --depth 1 https://github.com/zsh-users/zsh-autosuggestions ${join(plugins, "zsh-autosuggestions")}`,
      `git clone --depth 1 https://github.com/zsh-users/zsh-syntax-highlighting.git ${join(plugins, "zsh-syntax-highlighting")}`,
    ]);

    const omz = host.calls[2];
    assert.equal(omz.stdin, SCRIPT);
    assert.deepEqual(omz.env, { RUNZSH: "no", CHSH: "no", KEEP_ZSHRC: "yes" });

    assert.equal(
      readFileSync(join(home, ".zshrc"), "utf-8"),
      formatBlock(SHELL_BLOCK, renderZshrc(config)) + "\n",
    );
    assert.equal(
      readFileSync(join(home, ".config", "starship.toml"), "utf-8"),
      await loadTemplate("starship.toml"),
    );
  });

  it("skips what is already installed", async () => {
    mkdirSync(join(home, ".oh-my-zsh", "custom", "plugins", "zsh-autosuggestions"), { recursive: true });
    mkdirSync(join(home, ".oh-my-zsh", "custom", "plugins", "zsh-syntax-highlighting"), { recursive: true });
    mkdirSync(join(home, ".config"), { recursive: true });
    writeFileSync(join(home, ".config", "starship.toml"), "# mine\n");
    const host = new FakeHost().on("sh -c command -v starship", { stdout: "/usr/local/bin/starship\n" });

    const { outcome, fetcher } = await run(host);

    assert.equal(outcome.exitCode, 0);
    assert.deepEqual(fetcher.calls, []);
    assert.deepEqual(host.commands(), [
      "apt-get update",
      "apt-get install -y zsh curl git",
      "sh -c command -v starship",
    ]);
    assert.equal(readFileSync(join(home, ".config", "starship.toml"), "utf-8"), "# mine\n");
  });

  it("keeps the user's own .zshrc lines and a backup", async () => {
    writeFileSync(join(home, ".zshrc"), "export PATH=$HOME/bin:$PATH\n");
    await run(new FakeHost());

    assert.equal(
      readFileSync(join(home, ".zshrc"), "utf-8"),
      "export PATH=$HOME/bin:$PATH\n\n" + formatBlock(SHELL_BLOCK, renderZshrc(config)) + "\n",
    );
    assert.equal(
      readFileSync(join(home, ".zshrc" + BACKUP_SUFFIX), "utf-8"),
      "export PATH=$HOME/bin:$PATH\n",
    );
  });

  it("stops on a managed block that lost its end marker", async () => {
    const rc = join(home, ".zshrc");
    writeFileSync(rc, `# >>> hostprep: ${SHELL_BLOCK} >>>\nexport OLD=1\n`);
    const host = new FakeHost();
    const { outcome, fetcher } = await run(host);

    assert.equal(outcome.exitCode, 4);
    assert.equal(outcome.error?.stage, "shell");
    assert.equal(outcome.pipeline?.status === "failedAt" && outcome.pipeline.stepName, "configure-zshrc");
    assert.deepEqual(fetcher.calls, []);
    assert.equal(readFileSync(rc, "utf-8"), `# >>> hostprep: ${SHELL_BLOCK} >>>\nexport OLD=1\n`);
  });

  it("stops when the Oh My Zsh installer fails", async () => {
    const host = new FakeHost().on("sh -s -- --unattended", {
      exitCode: 1,
      stderr: "Error: git clone of oh-my-zsh repo failed\n",
    });
    const { outcome, reporter } = await run(host);

    assert.equal(outcome.exitCode, 4);
    assert.equal(outcome.error?.stage, "shell");
    assert.equal(outcome.pipeline?.status === "failedAt" && outcome.pipeline.stepName, "install-oh-my-zsh");
    assert.ok(
      reporter.lines.includes(
        `ERROR \nShell setup failed at step "install-oh-my-zsh": \`sh -s -- --unattended < ${OMZ_URL}\` exited with code 1: Error: git clone of oh-my-zsh repo failed`,
      ),
    );
    assert.equal(existsSync(join(home, ".config", "starship.toml")), false);
  });

  it("continues when a plugin cannot be cloned", async () => {
    const host = new FakeHost().on("git clone", {
      exitCode: 128,
      stderr: "fatal: unable to access 'https://github.com/zsh-users/zsh-autosuggestions/': Could not resolve host: github.com\n",
    });
    const { outcome, reporter } = await run(host);

    assert.equal(outcome.exitCode, 0);
    assert.ok(reporter.lines.some((l) => l.startsWith("WARN install-zsh-plugins failed, continuing:")));
    assert.ok(existsSync(join(home, ".config", "starship.toml")));
  });

  it("refuses a host without a supported package manager", async () => {
    const host = new FakeHost();
    const { outcome } = await run(host, "ID=arch\n");

    assert.equal(outcome.exitCode, 3);
    assert.equal(host.calls.length, 0);
    assert.equal(existsSync(join(home, ".zshrc")), false);
  });
});
