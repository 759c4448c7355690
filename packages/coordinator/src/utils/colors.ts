/**
 * ANSI color codes for console replies.
 */

export const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  gray: "\x1b[90m",
} as const;

export type ColorKey = Exclude<keyof typeof colors, "reset">;

/**
 * Wrap text in a color when `enabled`, otherwise return it unchanged.
 */
export function paint(text: string, color: ColorKey, enabled: boolean): string {
  return enabled ? `${colors[color]}${text}${colors.reset}` : text;
}
