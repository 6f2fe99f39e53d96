import { Command } from "commander";
import { execa } from "execa";

import { isRecord, systemError, toErrorMessage } from "../../core/index.js";
import { resolvePath } from "../../orchestrator/index.js";
import { createUi, getGlobalOptions, loadCliConfig } from "../helpers.js";

export interface EditorLookup {
  configured?: string;
  repoPath: string;
  env?: Record<string, string | undefined>;
  readGitEditor?: (repoPath: string) => Promise<string | undefined>;
}

export function createEditCommand(): Command {
  const command = new Command("edit");

  command
    .description("Open a workspace repository in your editor")
    .argument("<name>", "owner/name, name, or a remote URL")
    .action(async (name: string, _options: Record<string, never>, cmd: Command) => {
      const globalOptions = getGlobalOptions(cmd);
      const ui = createUi(globalOptions);
      const config = await loadCliConfig(globalOptions, ui);

      const repoPath = await resolvePath(config, name);
      const editor = await resolveEditor({ configured: config.editor.command, repoPath });
      if (globalOptions.verbose) {
        console.warn(ui.dim(`[reposhelf] ${editor} ${repoPath}`));
      }
      await openEditor(editor, repoPath);
    });

  return command;
}

/**
 * Editor by priority: `editor.command` from config, `git config core.editor`
 * in the repository, `$EDITOR`, then `$VISUAL`.
 */
export async function resolveEditor(lookup: EditorLookup): Promise<string> {
  const env = lookup.env ?? process.env;
  const readGitEditor = lookup.readGitEditor ?? readGitCoreEditor;

  const candidates: Array<() => Promise<string | undefined>> = [
    async () => lookup.configured,
    () => readGitEditor(lookup.repoPath),
    async () => env.EDITOR,
    async () => env.VISUAL,
  ];

  for (const candidate of candidates) {
    const editor = (await candidate())?.trim();
    if (editor) {
      return editor;
    }
  }

  throw systemError(
    "EDITOR_NOT_FOUND",
    "No editor found. Set editor.command in config, git config core.editor, $EDITOR or $VISUAL.",
  );
}

/** `editor` may carry arguments, e.g. `code --wait`. */
export async function openEditor(editor: string, repoPath: string): Promise<void> {
  const [file, ...args] = editor.split(/\s+/).filter(Boolean);
  if (!file) {
    throw systemError("EDITOR_NOT_FOUND", "Editor command is empty.");
  }

  try {
    await execa(file, [...args, repoPath], { stdio: "inherit" });
  } catch (error) {
    if (isRecord(error) && error.code === "ENOENT") {
      throw systemError("EDITOR_NOT_FOUND", `Editor "${file}" is not installed or not in PATH.`, {
        context: { editor },
        cause: error,
      });
    }
    throw systemError("EDITOR_FAILED", `Failed to open editor "${editor}": ${toErrorMessage(error)}`, {
      context: { editor, repoPath },
      cause: error,
    });
  }
}

async function readGitCoreEditor(repoPath: string): Promise<string | undefined> {
  try {
    const result = await execa("git", ["config", "--get", "core.editor"], {
      cwd: repoPath,
      reject: false,
      stdin: "ignore",
    });
    return result.exitCode === 0 ? result.stdout.trim() : undefined;
  } catch {
    // git missing; fall through to the environment
    return undefined;
  }
}
