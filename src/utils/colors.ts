/**
 * Terminal Colors
 *
 * ANSI color codes for terminal output. Setting NO_COLOR to a non-empty
 * value turns them off.
 */

const colorEnabled = !process.env['NO_COLOR'];

export const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',

  green: '\x1b[32m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',

  brightRed: '\x1b[91m',
  brightGreen: '\x1b[92m',
  brightYellow: '\x1b[93m',
  brightCyan: '\x1b[96m'
} as const;

export type ColorName = keyof typeof colors;

/**
 * Apply a color to text.
 */
export function colorize(text: string, color: ColorName, enabled = colorEnabled): string {
  return enabled ? `${colors[color]}${text}${colors.reset}` : text;
}

export const c = {
  dim: (text: string) => colorize(text, 'dim'),

  green: (text: string) => colorize(text, 'green'),
  yellow: (text: string) => colorize(text, 'yellow'),
  magenta: (text: string) => colorize(text, 'magenta'),
  cyan: (text: string) => colorize(text, 'cyan'),
  white: (text: string) => colorize(text, 'white'),

  brightRed: (text: string) => colorize(text, 'brightRed'),
  brightGreen: (text: string) => colorize(text, 'brightGreen'),
  brightYellow: (text: string) => colorize(text, 'brightYellow'),
  brightCyan: (text: string) => colorize(text, 'brightCyan')
} as const;
