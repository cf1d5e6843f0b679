import { CLI_NAME } from '../../constants/index.js';

/**
 * Bash glue: hands the raw line and cursor to `<cli> completion` and turns
 * its output into COMPREPLY. Bash splits words at `=`, so candidates are
 * cut back to the part after their last `=` when the typed word has one.
 */
export function renderBashCompletionScript(commandName: string = CLI_NAME): string {
  const fn = `_${commandName.replace(/[^A-Za-z0-9_]/g, '_')}_completions`;
  return `# bash completion for ${commandName}
# source this file, or: eval "$(${commandName} completion --script)"
${fn}() {
    local IFS=$'\\n'
    local cur="\${COMP_WORDS[COMP_CWORD]}"
    local typed="\${COMP_LINE:0:COMP_POINT}"
    typed="\${typed##*[[:space:]]}"
    [[ "$cur" == "=" ]] && cur=""
    local output
    output=$(${commandName} completion --line "$COMP_LINE" --point "$COMP_POINT" 2>/dev/null) || return 0
    local -a candidates=()
    local candidate
    while IFS= read -r candidate; do
        [[ -z "$candidate" ]] && continue
        if [[ "$typed" == *=* ]]; then
            candidate="\${candidate##*=}"
        fi
        candidates+=("$candidate")
    done <<< "$output"
    COMPREPLY=($(compgen -W "\${candidates[*]}" -- "$cur"))
}
complete -o default -F ${fn} ${commandName}
`;
}
