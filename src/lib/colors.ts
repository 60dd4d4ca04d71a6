/**
 * ANSI color codes for terminal output
 */
export const codes = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
} as const;

/**
 * Check if colors should be enabled based on environment.
 * Hooks print their diagnostics on stderr, so that is the stream checked.
 */
function shouldUseColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }

  // Respect FORCE_COLOR environment variable
  if (process.env.FORCE_COLOR !== undefined) {
    return true;
  }

  return process.stderr.isTTY ?? false;
}

let colorEnabled = shouldUseColors();

/**
 * Enable or disable color output at runtime
 * Used by --no-color flag and NO_COLOR env var handling
 */
export function setColorEnabled(enabled: boolean): void {
  colorEnabled = enabled;
}

/**
 * Wrap text with ANSI color codes
 */
function colorize(text: string, code: string): string {
  if (!colorEnabled) {
    return text;
  }
  return `${code}${text}${codes.reset}`;
}

export function red(text: string): string {
  return colorize(text, codes.red);
}

export function dim(text: string): string {
  return colorize(text, codes.dim);
}

// Semantic output functions with icons
export function error(text: string): string {
  const icon = colorEnabled ? '✗' : '[ERROR]';
  return `${red(icon)} ${red(text)}`;
}
