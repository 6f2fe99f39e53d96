import { constants as fsConstants } from "node:fs";
import { access } from "node:fs/promises";

import type { ChalkInstance } from "chalk";
import { Command } from "commander";

import { type ShelfConfig, resolveUserPath, toErrorMessage } from "../../core/index.js";
import { loadConfigFile } from "../config-loader.js";
import { findGitHubCredential, maskToken } from "../github-auth.js";
import { type GlobalCliOptions, createUi, getGlobalOptions } from "../helpers.js";

type DoctorStatus = "pass" | "warn" | "fail";

export interface DoctorCheck {
  id: string;
  name: string;
  requirement: string;
  value: string;
  status: DoctorStatus;
  message?: string;
}

interface CommandResult {
  ok: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  errorCode?: string;
  errorMessage?: string;
}

const MINIMUM_NODE_VERSION = "20.0.0";

export function createDoctorCommand(): Command {
  const command = new Command("doctor");

  command.description("Check git, GitHub credentials and the workspace").action(async (_options, cmd: Command) => {
    const globalOptions = getGlobalOptions(cmd);
    const ui = createUi(globalOptions);

    const checks = await runDoctorChecks(globalOptions);
    const allPassed = checks.every((check) => check.status !== "fail");

    if (globalOptions.json) {
      console.log(
        JSON.stringify(
          {
            checks,
            allPassed,
          },
          null,
          2,
        ),
      );
    } else {
      renderDoctorOutput(ui, checks, allPassed);
    }

    if (!allPassed) {
      process.exitCode = 1;
    }
  });

  return command;
}

export async function runDoctorChecks(
  globalOptions: Pick<Required<GlobalCliOptions>, "config">,
): Promise<DoctorCheck[]> {
  const checks: DoctorCheck[] = [];

  const nodeVersion = process.versions.node;
  checks.push({
    id: "node",
    name: "Node.js",
    requirement: `>= ${MINIMUM_NODE_VERSION}`,
    value: `v${nodeVersion}`,
    status: isVersionAtLeast(nodeVersion, MINIMUM_NODE_VERSION) ? "pass" : "fail",
    message: `Node.js ${MINIMUM_NODE_VERSION}+ is required.`,
  });

  const gitResult = await runCommand("git", ["--version"]);
  const gitVersion = extractVersion(gitResult.stdout) ?? "--";
  checks.push({
    id: "git",
    name: "git",
    requirement: "installed",
    value: gitVersion,
    status: gitResult.ok ? "pass" : "fail",
    message: gitResult.ok ? undefined : explainCommandFailure("git", gitResult),
  });

  checks.push(checkGithubAuth());

  const { check: configCheck, config } = await checkConfig(globalOptions.config);
  checks.push(configCheck);
  if (config) {
    checks.push(await checkBaseDir(config));
  }

  return checks;
}

function checkGithubAuth(): DoctorCheck {
  const credential = findGitHubCredential();
  if (credential) {
    return {
      id: "github-auth",
      name: "GitHub auth",
      requirement: "GITHUB_TOKEN, GH_TOKEN or gh",
      value: `${credential.source}:${maskToken(credential.token)}`,
      status: "pass",
    };
  }

  return {
    id: "github-auth",
    name: "GitHub auth",
    requirement: "GITHUB_TOKEN, GH_TOKEN or gh",
    value: "--",
    status: "warn",
    message: "No GitHub token detected; `issues` will not work. Set GITHUB_TOKEN or run `gh auth login`.",
  };
}

async function checkConfig(
  configPath: string,
): Promise<{ check: DoctorCheck; config: ShelfConfig | null }> {
  let missing = false;
  try {
    const config = await loadConfigFile(configPath, {
      onWarning: () => {
        missing = true;
      },
    });
    return {
      check: {
        id: "config",
        name: "Config",
        requirement: "valid or absent",
        value: missing ? "defaults" : configPath,
        status: missing ? "warn" : "pass",
        message: missing ? `No config at ${configPath}. Run \`reposhelf init\`.` : undefined,
      },
      config,
    };
  } catch (error) {
    return {
      check: {
        id: "config",
        name: "Config",
        requirement: "valid or absent",
        value: configPath,
        status: "fail",
        message: toErrorMessage(error),
      },
      config: null,
    };
  }
}

async function checkBaseDir(config: ShelfConfig): Promise<DoctorCheck> {
  const baseDir = resolveUserPath(config.workspace.baseDir);
  try {
    await access(baseDir, fsConstants.W_OK);
    return {
      id: "base-dir",
      name: "Base dir",
      requirement: "writable",
      value: baseDir,
      status: "pass",
    };
  } catch {
    return {
      id: "base-dir",
      name: "Base dir",
      requirement: "writable",
      value: baseDir,
      status: "warn",
      message: `${baseDir} does not exist yet or is not writable; \`clone\` will try to create it.`,
    };
  }
}

function renderDoctorOutput(ui: ChalkInstance, checks: DoctorCheck[], allPassed: boolean): void {
  console.log("Checking environment...");
  console.log("");

  for (const check of checks) {
    const iconMap = { pass: ui.green("[OK]"), warn: ui.yellow("[!]"), fail: ui.red("[X]") };
    const statusMap = { pass: ui.green("PASS"), warn: ui.yellow("WARN"), fail: ui.red("FAIL") };
    const icon = iconMap[check.status];
    const status = statusMap[check.status];

    const name = check.name.padEnd(12, " ");
    const requirement = check.requirement.padEnd(30, " ");
    const value = check.value.padEnd(14, " ");

    console.log(`  ${icon} ${name} ${requirement} ${value} ${status}`);

    if (check.status === "fail" && check.message) {
      console.log(`    ${ui.red(check.message)}`);
    }
    if (check.status === "warn" && check.message) {
      console.log(`    ${ui.yellow(check.message)}`);
    }
  }

  console.log("");
  if (allPassed) {
    console.log(ui.green("All checks passed."));
  } else {
    console.log(ui.red("Some checks failed."));
  }
}

function extractVersion(output: string): string | undefined {
  const match = output.match(/v?(\d+\.\d+\.\d+)/i);
  if (!match) {
    return undefined;
  }

  return `v${match[1]}`;
}

function explainCommandFailure(commandName: string, result: CommandResult): string {
  if (result.errorCode === "ENOENT") {
    return `${commandName} is not installed or not in PATH.`;
  }

  if (result.errorMessage) {
    return result.errorMessage;
  }

  if (result.stderr.trim().length > 0) {
    return result.stderr.trim();
  }

  return `${commandName} exited with code ${String(result.exitCode)}.`;
}

function isVersionAtLeast(version: string, minimum: string): boolean {
  const current = version.split(".").map((part) => Number.parseInt(part, 10));
  const required = minimum.split(".").map((part) => Number.parseInt(part, 10));
  const length = Math.max(current.length, required.length);

  for (let index = 0; index < length; index += 1) {
    const currentPart = current[index] ?? 0;
    const requiredPart = required[index] ?? 0;

    if (currentPart > requiredPart) {
      return true;
    }

    if (currentPart < requiredPart) {
      return false;
    }
  }

  return true;
}

async function runCommand(command: string, args: string[]): Promise<CommandResult> {
  try {
    const { execa } = await import("execa");
    const result = await execa(command, args, {
      reject: false,
      timeout: 30_000,
      stdin: "ignore",
    });
    return {
      ok: result.exitCode === 0,
      exitCode: result.exitCode ?? null,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    return {
      ok: false,
      exitCode: null,
      stdout: "",
      stderr: "",
      errorCode: typeof code === "string" ? code : undefined,
      errorMessage: toErrorMessage(error),
    };
  }
}
