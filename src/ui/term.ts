/** Terminal name handed to blessed; `PROJNAV_TUI_TERM` wins over detection. */
export function getBlessedTerminalOverride(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const override = env.PROJNAV_TUI_TERM?.trim();
  if (override) return override;

  // blessed ships no terminfo for ghostty.
  const term = (env.TERM ?? "").toLowerCase();
  if (term.includes("ghostty")) return "xterm-256color";

  return undefined;
}
