/**
 * Verbose Output Helpers
 *
 * Formats PowerShell scripts for `--verbose` output on stderr. Each script
 * is tagged with the host operation that issued it, so a reader can tell
 * probes apart from mutating calls while a disable/enable run is going.
 */

/**
 * Kind of host call a script belongs to.
 */
export type ScriptKind = 'probe' | 'mutate';

const TAGS: Record<ScriptKind, string> = {
  probe: '[PS?] ',
  mutate: '[PS!] ',
};

/**
 * Continuation lines line up under the first character after the tag.
 */
const CONTINUATION_INDENT = ' '.repeat(TAGS.probe.length);

const ANSI_GRAY = '\x1b[90m';
const ANSI_YELLOW = '\x1b[33m';
const ANSI_RESET = '\x1b[0m';

/**
 * Whether stderr is an interactive terminal that understands ANSI colors.
 */
export function supportsAnsi(): boolean {
  return Boolean(process.stderr.isTTY);
}

/**
 * Format a PowerShell script for verbose output.
 *
 * The block is fenced by blank lines. Probes print gray and mutating
 * scripts print yellow when `ansi` is set.
 */
export function formatCommand(script: string, ansi: boolean, kind: ScriptKind = 'probe'): string {
  const body = script
    .split('\n')
    .map((line, index) => (index === 0 ? TAGS[kind] : CONTINUATION_INDENT) + line)
    .join('\n');

  const plain = `\n${body}\n\n`;
  if (!ansi) {
    return plain;
  }

  const color = kind === 'mutate' ? ANSI_YELLOW : ANSI_GRAY;
  return `${color}${plain}${ANSI_RESET}`;
}
