#!/usr/bin/env node

import { Command, Options } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Effect } from "effect";
import { spawnSync } from "node:child_process";
import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { fileURLToPath } from "node:url";
import type { UpdateOutcome } from "./applier.js";
import { configPathFor, loadConfig, type DotfilesSyncConfig } from "./config.js";
import { runInstaller, createReload, promptConfirm, spawnDetachedCheck } from "./host.js";
import { createLogger, logPathFor, type Logger } from "./logger.js";
import { formatUpdateSummary } from "./notify.js";
import { describeProbeError } from "./probe.js";
import { formatStatus } from "./status.js";
import { paint } from "./style.js";
import { createDotfilesSync, type DotfilesSync } from "./sync.js";

const SCRIPT_PATH = fileURLToPath(import.meta.url);

type Pkg = { version?: string };

function resolveVersion(): string {
  try {
    const raw = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
    const pkg = JSON.parse(raw) as Pkg;
    return pkg.version || "0.0.0";
  } catch {
    return "0.0.0";
  }
}

type Host = {
  config: DotfilesSyncConfig;
  log: Logger;
  sync: DotfilesSync;
};

async function createHost(): Promise<Host> {
  const config = await loadConfig(homedir());
  const log = createLogger(config.log_enabled, config.cache_dir);
  const sync = createDotfilesSync({
    config,
    log,
    launchCheck: () => spawnDetachedCheck(SCRIPT_PATH, log),
  });
  return { config, log, sync };
}

function withHost(
  body: (host: Host) => Promise<void>,
): Effect.Effect<void, Error> {
  return Effect.tryPromise({
    try: async () => {
      const host = await createHost();
      try {
        await body(host);
      } finally {
        await host.log.flush?.();
      }
    },
    catch: (err: unknown) =>
      err instanceof Error ? err : new Error(String(err)),
  });
}

function reportUpdate(outcome: UpdateOutcome): number {
  switch (outcome.state) {
    case "up-to-date":
      console.log(paint("Your dotfiles are already up to date!", "success"));
      return 0;
    case "declined":
      console.log(paint("Update cancelled.", "info"));
      return 0;
    case "blocked":
      console.log(paint("Error: You have local changes in your dotfiles.", "error"));
      console.log(paint("Please commit or stash them before updating.", "warning"));
      for (const path of outcome.modifiedPaths) console.log(`  ${path}`);
      return 1;
    case "failed":
      if (outcome.stage === "probe") {
        console.log(paint(`Error: ${describeProbeError(outcome.error)}`, "error"));
      } else {
        console.log(paint(`Error: Failed to apply updates: ${outcome.error.detail}`, "error"));
        if (!outcome.error.restored) {
          console.log(
            paint("Warning: the checkout could not be put back at its previous revision.", "warning"),
          );
        }
      }
      return 1;
    case "applied":
      console.log(
        paint(
          `Dotfiles updated successfully! (${outcome.from.slice(0, 7)} → ${outcome.to.slice(0, 7)})`,
          "success",
        ),
      );
      if (outcome.reloadError) {
        console.log(paint(`Warning: reload failed: ${outcome.reloadError}`, "warning"));
      }
      return 0;
  }
}

const sessionStartCommand = Command.make("session-start", {}, () =>
  withHost(async ({ sync }) => {
    const { notification } = await sync.sessionStart();
    if (notification) {
      console.log(`\n${paint(notification, "warning")}\n`);
    }
  }),
).pipe(
  Command.withDescription(
    "Show any pending update notice and start a background check when due",
  ),
);

const checkCommand = Command.make("check", {}, () =>
  withHost(async ({ sync }) => {
    await sync.runCheck();
  }),
).pipe(Command.withDescription("Run one update check in the foreground, silently"));

const checkNowCommand = Command.make("check-now", {}, () =>
  withHost(async ({ sync }) => {
    if (sync.checkNow()) {
      console.log(paint("Checking for updates in background...", "info"));
    } else {
      console.log(paint("Could not start a background check; see the debug log.", "error"));
      process.exitCode = 1;
    }
  }),
).pipe(Command.withDescription("Start a background update check now"));

const yes = Options.boolean("yes").pipe(
  Options.withAlias("y"),
  Options.withDescription("Apply without asking for confirmation"),
);

const updateCommand = Command.make("update", { yes }, ({ yes }) =>
  withHost(async ({ config, sync }) => {
    console.log(paint("Checking for dotfiles updates...", "info"));
    const outcome = await sync.update({
      assumeYes: yes,
      onSummary: (summary) => {
        console.log(`\n${formatUpdateSummary(summary)}\n`);
      },
      confirm: () => promptConfirm("Do you want to apply these updates?"),
      reload: createReload(config.reload_command),
    });
    process.exitCode = reportUpdate(outcome);
  }),
).pipe(Command.withDescription("Fetch, confirm and apply dotfiles updates"));

const statusCommand = Command.make("status", {}, () =>
  withHost(async ({ sync }) => {
    const status = await sync.status();
    console.log(formatStatus(status));
    if (status.comparison.kind === "unknown") {
      process.exitCode = 1;
    }
  }),
).pipe(Command.withDescription("Show branch, remote and how far behind the checkout is"));

const configCommand = Command.make("config", {}, () =>
  withHost(async ({ config }) => {
    console.log("\n[dotfiles-sync] Config\n");
    console.log(`Path: ${configPathFor(homedir())}`);
    console.log(`repo_dir: ${config.repo_dir}`);
    console.log(`remote: ${config.remote} (${config.branch})`);
    console.log(`check_interval_seconds: ${config.check_interval_seconds}`);
    console.log(`auto_apply: ${config.auto_apply}`);
    console.log(`cache_dir: ${config.cache_dir}`);
    console.log(`reload_command: ${config.reload_command ?? "(none)"}`);
    console.log(`log: ${config.log_enabled ? logPathFor(config.cache_dir) : "disabled"}`);
    console.log("");
  }),
).pipe(Command.withDescription("Show resolved configuration"));

const doctorCommand = Command.make("doctor", {}, () =>
  withHost(async ({ config, sync }) => {
    const probe = spawnSync("git", ["--version"], {
      stdio: ["ignore", "pipe", "pipe"],
      encoding: "utf-8",
    });
    if (probe.status !== 0) {
      console.log(paint("[dotfiles-sync] git not found in PATH", "error"));
      process.exitCode = 1;
      return;
    }
    console.log(`[dotfiles-sync] ${(probe.stdout || "").trim()}`);

    if (!(await sync.git.isRepository())) {
      console.log(paint(`[dotfiles-sync] ${config.repo_dir} is not a git checkout`, "error"));
      process.exitCode = 1;
      return;
    }
    console.log(`[dotfiles-sync] checkout: ${config.repo_dir}`);
  }),
).pipe(Command.withDescription("Check that git is available and repo_dir is a checkout"));

const installCommand = Command.make("install", {}, () =>
  withHost(async ({ config, log }) => {
    if (!existsSync(config.repo_dir)) {
      console.log(paint(`Error: Cannot access dotfiles directory at ${config.repo_dir}`, "error"));
      process.exitCode = 1;
      return;
    }
    process.exitCode = runInstaller(config.install_command, config.repo_dir, log);
  }),
).pipe(Command.withDescription("Run the dotfiles installer from repo_dir"));

const root = Command.make("dotfiles-sync", {}).pipe(
  Command.withDescription("Keep a git-tracked dotfiles checkout up to date"),
  Command.withSubcommands([
    sessionStartCommand,
    checkCommand,
    checkNowCommand,
    updateCommand,
    statusCommand,
    configCommand,
    doctorCommand,
    installCommand,
  ]),
);

const cli = Command.run(root, {
  name: "dotfiles-sync",
  version: resolveVersion(),
});

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain);
