// pattern: Imperative Shell

// Set from --non-interactive by the root command's preAction hook
let NON_INTERACTIVE = false;

export function setNonInteractive(nonInteractive: boolean): void {
  NON_INTERACTIVE = nonInteractive;
}

/**
 * Whether prompts are disabled, either by flag or because stdio is not a TTY
 */
export function isNonInteractive(): boolean {
  return (
    NON_INTERACTIVE ||
    !process.stdout.isTTY ||
    !process.stdin.isTTY ||
    process.env["NORUN_NON_INTERACTIVE"] === "1"
  );
}
