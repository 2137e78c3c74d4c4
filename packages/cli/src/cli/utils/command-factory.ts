// pattern: Factory

/**
 * Shared help text and option shapes for CLI command definitions
 */

/**
 * Standard help text patterns for command examples
 */
export const HelpTextPatterns = {
  /**
   * Creates standard "Examples:" section for help text
   */
  examples: (examples: string[]): string => `
Examples:
${examples.map(ex => `  ${ex}`).join("\n")}
      `,

  /**
   * Creates standard before-help text with description and details
   */
  beforeHelp: (description: string, details?: string[]): string => {
    let text = `\n${description}\n`;
    if (details) {
      text += `\n${details.join("\n")}\n`;
    }
    return `${text}      `;
  },
};

/**
 * Common command argument patterns
 */
export const CommonArguments = {
  appName: "<name>" as const,
  installer: "<installer>" as const,
} as const;

/**
 * Common command option patterns
 */
export const CommonOptions = {
  yes: ["-y, --yes", "Skip confirmation prompt"] as const,
  sandboxMode: [
    "--sandbox-mode <mode>",
    "Sandbox mode: full (home visible) or strict (home hidden)",
  ] as const,
} as const;
