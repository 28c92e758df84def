export const SHELLS = ['bash', 'zsh', 'fish'] as const;

export type Shell = (typeof SHELLS)[number];

/** Subcommands offered at the first position */
export const COMMAND_NAMES = [
  'search',
  'install',
  'remove',
  'update',
  'sync',
  'list-packages',
  'completion',
] as const;

/** Subcommands whose arguments are package names */
const PACKAGE_COMMANDS = ['install', 'remove', 'search'];

function bashScript(bin: string): string {
  const fn = `_${bin.replace(/[^A-Za-z0-9_]/g, '_')}`;
  return `# bash completion for ${bin}
${fn}() {
  local cur="\${COMP_WORDS[COMP_CWORD]}"
  if [ "$COMP_CWORD" -eq 1 ]; then
    COMPREPLY=( $(compgen -W "${COMMAND_NAMES.join(' ')}" -- "$cur") )
    return
  fi
  case "\${COMP_WORDS[1]}" in
    ${PACKAGE_COMMANDS.join('|')})
      COMPREPLY=( $(compgen -W "$(${bin} list-packages 2>/dev/null)" -- "$cur") )
      ;;
    completion)
      COMPREPLY=( $(compgen -W "${SHELLS.join(' ')}" -- "$cur") )
      ;;
  esac
}
complete -F ${fn} ${bin}
`;
}

function zshScript(bin: string): string {
  const fn = `_${bin.replace(/[^A-Za-z0-9_]/g, '_')}`;
  return `#compdef ${bin}
${fn}() {
  if (( CURRENT == 2 )); then
    compadd -- ${COMMAND_NAMES.join(' ')}
    return
  fi
  case $words[2] in
    ${PACKAGE_COMMANDS.join('|')})
      compadd -- \${(f)"$(${bin} list-packages 2>/dev/null)"}
      ;;
    completion)
      compadd -- ${SHELLS.join(' ')}
      ;;
  esac
}
compdef ${fn} ${bin}
`;
}

function fishScript(bin: string): string {
  return `# fish completion for ${bin}
complete -c ${bin} -f
complete -c ${bin} -n "__fish_use_subcommand" -a "${COMMAND_NAMES.join(' ')}"
complete -c ${bin} -n "__fish_seen_subcommand_from ${PACKAGE_COMMANDS.join(' ')}" -a "(${bin} list-packages)"
complete -c ${bin} -n "__fish_seen_subcommand_from completion" -a "${SHELLS.join(' ')}"
`;
}

/**
 * Generate a completion script. Package names are completed dynamically
 * through `<bin> list-packages`.
 */
export function generateCompletion(shell: Shell, bin = 'pkgward'): string {
  switch (shell) {
    case 'bash':
      return bashScript(bin);
    case 'zsh':
      return zshScript(bin);
    case 'fish':
      return fishScript(bin);
  }
}
