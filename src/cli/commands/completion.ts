import { Command } from "commander";

const SUBCOMMANDS = [
  "init",
  "clone",
  "refresh",
  "issues",
  "list",
  "path",
  "shims",
  "edit",
  "doctor",
  "completion",
];

const GLOBAL_OPTIONS = [
  "--config",
  "--verbose",
  "--quiet",
  "--json",
  "--no-color",
  "--help",
  "--version",
];

const COMMAND_OPTIONS: Record<string, string[]> = {
  init: ["--base-dir", "--username"],
  clone: [],
  refresh: ["--all"],
  issues: ["--page-size", "--max-pages"],
  list: ["--path", "--full"],
  path: [],
  shims: [],
  edit: [],
  doctor: [],
};

export function generateBash(): string {
  const cmds = SUBCOMMANDS.join(" ");
  const global = GLOBAL_OPTIONS.join(" ");
  const cases = Object.entries(COMMAND_OPTIONS)
    .map(([cmd, opts]) => {
      const all = [...opts, ...GLOBAL_OPTIONS].join(" ");
      return `      ${cmd}) COMPREPLY=( $(compgen -W "${all}" -- "$cur") ) ;;`;
    })
    .join("\n");

  return `# bash completion for reposhelf
_reposhelf_completions() {
  local cur prev cmds
  cur="\${COMP_WORDS[COMP_CWORD]}"
  prev="\${COMP_WORDS[COMP_CWORD-1]}"
  cmds="${cmds}"

  if [[ \${COMP_CWORD} -eq 1 ]]; then
    COMPREPLY=( $(compgen -W "$cmds ${global}" -- "$cur") )
    return
  fi

  case "\${COMP_WORDS[1]}" in
${cases}
      *) COMPREPLY=( $(compgen -W "${global}" -- "$cur") ) ;;
  esac
}
complete -F _reposhelf_completions reposhelf`;
}

export function generateZsh(): string {
  const cmds = SUBCOMMANDS.map((c) => `'${c}:${c} command'`).join(" ");
  const cases = Object.entries(COMMAND_OPTIONS)
    .map(([cmd, opts]) => {
      const flags = [...opts, ...GLOBAL_OPTIONS].map((o) => `'${o}'`).join(" ");
      return `    ${cmd}) _arguments ${flags} ;;`;
    })
    .join("\n");

  return `#compdef reposhelf
_reposhelf() {
  local -a commands
  commands=(${cmds})

  _arguments '1:command:->cmds' '*::arg:->args'

  case "$state" in
  cmds) _describe 'command' commands ;;
  args)
    case "\${words[1]}" in
${cases}
    esac
    ;;
  esac
}
_reposhelf "$@"`;
}

export function generateFish(): string {
  const lines: string[] = ["# fish completion for reposhelf"];
  for (const cmd of SUBCOMMANDS) {
    lines.push(`complete -c reposhelf -n '__fish_use_subcommand' -a '${cmd}' -d '${cmd} command'`);
  }
  for (const opt of GLOBAL_OPTIONS) {
    const long = opt.replace(/^--/, "");
    lines.push(`complete -c reposhelf -l '${long}'`);
  }
  for (const [cmd, opts] of Object.entries(COMMAND_OPTIONS)) {
    for (const opt of opts) {
      const long = opt.replace(/^--/, "");
      lines.push(`complete -c reposhelf -n '__fish_seen_subcommand_from ${cmd}' -l '${long}'`);
    }
  }
  return lines.join("\n");
}

type Shell = "bash" | "zsh" | "fish";

const GENERATORS: Record<Shell, () => string> = {
  bash: generateBash,
  zsh: generateZsh,
  fish: generateFish,
};

function isShell(value: string): value is Shell {
  return Object.prototype.hasOwnProperty.call(GENERATORS, value);
}

export function createCompletionCommand(): Command {
  const command = new Command("completion");

  command
    .description("Generate shell completion scripts")
    .argument("<shell>", "Shell type: bash, zsh, or fish")
    .action((shell: string) => {
      if (!isShell(shell)) {
        throw new Error(`Unsupported shell "${shell}". Supported: bash, zsh, fish`);
      }
      console.log(GENERATORS[shell]());
    });

  command.addHelpText(
    "after",
    `\nExamples:
  $ reposhelf completion bash >> ~/.bashrc
  $ reposhelf completion zsh >> ~/.zshrc
  $ reposhelf completion fish > ~/.config/fish/completions/reposhelf.fish`,
  );

  return command;
}
