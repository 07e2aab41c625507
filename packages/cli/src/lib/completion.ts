/**
 * Shell completion scripts generated from the commander program
 */

import type { Command } from "commander";

export const SHELLS = ["bash", "zsh", "fish", "powershell"] as const;
export type Shell = (typeof SHELLS)[number];

interface CommandInfo {
  name: string;
  description: string;
  options: Array<{ short?: string; long?: string; description: string }>;
}

export function isShell(value: string): value is Shell {
  return SHELLS.some((shell) => shell === value);
}

function describeCommands(program: Command): CommandInfo[] {
  return program.commands.map((cmd) => ({
    name: cmd.name(),
    description: cmd.description(),
    options: cmd.options.map((option) => ({
      short: option.short,
      long: option.long,
      description: option.description,
    })),
  }));
}

function flags(info: CommandInfo): string[] {
  return info.options.flatMap((option) => [option.short, option.long].filter((flag): flag is string => !!flag));
}

function globalFlags(program: Command): string[] {
  return program.options.flatMap((option) => [option.short, option.long].filter((flag): flag is string => !!flag));
}

function bash(name: string, program: Command, commands: CommandInfo[]): string {
  const fn = `_${name.replace(/[^a-zA-Z0-9_]/g, "_")}`;
  const top = [...commands.map((cmd) => cmd.name), ...globalFlags(program)].join(" ");
  const cases = commands
    .map((cmd) => `    ${cmd.name}) opts="${[...flags(cmd), "--help"].join(" ")}" ;;`)
    .join("\n");
  return `# bash completion for ${name}
${fn}() {
  local cur opts
  cur="\${COMP_WORDS[COMP_CWORD]}"
  if [[ \${COMP_CWORD} -eq 1 ]]; then
    COMPREPLY=( $(compgen -W "${top}" -- "\${cur}") )
    return 0
  fi
  case "\${COMP_WORDS[1]}" in
${cases}
    *) opts="" ;;
  esac
  if [[ "\${cur}" == -* ]]; then
    COMPREPLY=( $(compgen -W "\${opts}" -- "\${cur}") )
  fi
  return 0
}
complete -o default -F ${fn} ${name}
`;
}

function zshQuote(text: string): string {
  return text.replace(/'/g, "'\\''").replace(/:/g, "\\:");
}

function zsh(name: string, commands: CommandInfo[]): string {
  const entries = commands.map((cmd) => `    '${cmd.name}:${zshQuote(cmd.description)}'`).join("\n");
  const cases = commands
    .map((cmd) => `    ${cmd.name}) compadd -- ${[...flags(cmd), "--help"].join(" ")} ;;`)
    .join("\n");
  return `#compdef ${name}
_${name}() {
  local -a commands
  commands=(
${entries}
  )
  if (( CURRENT == 2 )); then
    _describe 'command' commands
    return
  fi
  case $words[2] in
${cases}
  esac
  _files
}
compdef _${name} ${name}
`;
}

function fishQuote(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

function fish(name: string, commands: CommandInfo[]): string {
  const lines = [`# fish completion for ${name}`];
  for (const cmd of commands) {
    lines.push(`complete -c ${name} -f -n __fish_use_subcommand -a ${cmd.name} -d '${fishQuote(cmd.description)}'`);
  }
  for (const cmd of commands) {
    for (const option of cmd.options) {
      const parts = [`complete -c ${name} -n '__fish_seen_subcommand_from ${cmd.name}'`];
      if (option.short) parts.push(`-s ${option.short.replace(/^-/, "")}`);
      if (option.long) parts.push(`-l ${option.long.replace(/^--/, "")}`);
      parts.push(`-d '${fishQuote(option.description)}'`);
      lines.push(parts.join(" "));
    }
  }
  return lines.join("\n") + "\n";
}

function powershell(name: string, program: Command, commands: CommandInfo[]): string {
  const quote = (text: string): string => `'${text.replace(/'/g, "''")}'`;
  const table = commands
    .map((cmd) => `    ${quote(cmd.name)} = @(${[...flags(cmd), "--help"].map(quote).join(", ")})`)
    .join("\n");
  const top = [...commands.map((cmd) => cmd.name), ...globalFlags(program)].map(quote).join(", ");
  return `# PowerShell completion for ${name}
Register-ArgumentCompleter -Native -CommandName ${quote(name)} -ScriptBlock {
  param($wordToComplete, $commandAst, $cursorPosition)
  $commands = @{
${table}
  }
  $words = @($commandAst.CommandElements | Select-Object -Skip 1 | ForEach-Object { $_.ToString() })
  if ($words.Count -eq 0 -or ($words.Count -eq 1 -and $wordToComplete)) {
    $candidates = @(${top})
  } else {
    $candidates = $commands[$words[0]]
  }
  $candidates | Where-Object { $_ -like "$wordToComplete*" } | ForEach-Object {
    [System.Management.Automation.CompletionResult]::new($_, $_, 'ParameterValue', $_)
  }
}
`;
}

/**
 * Completion script for `shell`, covering every subcommand and its options
 */
export function generateCompletion(program: Command, shell: Shell): string {
  const name = program.name();
  const commands = describeCommands(program);
  switch (shell) {
    case "bash":
      return bash(name, program, commands);
    case "zsh":
      return zsh(name, commands);
    case "fish":
      return fish(name, commands);
    case "powershell":
      return powershell(name, program, commands);
  }
}
