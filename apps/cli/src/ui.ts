/**
 * Shared CLI styling: colours, box drawing and status rows.
 */

// ---------------------------------------------------------------------------
// Colours
// ---------------------------------------------------------------------------

export const TEAL = '\x1b[38;2;0;184;169m';
export const TEAL_DIM = '\x1b[38;2;0;120;110m';
export const RESET = '\x1b[0m';
export const BOLD = '\x1b[1m';
export const DIM = '\x1b[2m';
export const GREEN = '\x1b[32m';
export const YELLOW = '\x1b[33m';
export const RED = '\x1b[31m';

export const BOX = {
  topLeft: '╭',
  topRight: '╮',
  bottomLeft: '╰',
  bottomRight: '╯',
  horizontal: '─',
  vertical: '│',
} as const;

export const CHECK = `${GREEN}✓${RESET}`;
export const CROSS = `${RED}✗${RESET}`;
export const WARN = `${YELLOW}⚠${RESET}`;
export const BULLET = `${TEAL}●${RESET}`;

export type Status = 'pass' | 'ok' | 'warn' | 'fail';

// ---------------------------------------------------------------------------
// Layout helpers
// ---------------------------------------------------------------------------

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

/** Left-pad `line` so it sits centred in `width` columns. */
export function centerPad(line: string, width: number): string {
  const pad = Math.floor((width - visibleLength(line)) / 2);
  return pad > 0 ? ' '.repeat(pad) + line : line;
}

/** Rounded box of `width` columns with an optional title in the top edge. */
export function box(title: string, lines: readonly string[], width = 56): string {
  const h = BOX.horizontal;
  const top = title
    ? `${TEAL}${BOX.topLeft}${h} ${BOLD}${title}${RESET}${TEAL} ${h.repeat(Math.max(0, width - visibleLength(title) - 5))}${BOX.topRight}${RESET}`
    : `${TEAL}${BOX.topLeft}${h.repeat(width - 2)}${BOX.topRight}${RESET}`;

  const body = lines.map((line) => {
    const fill = ' '.repeat(Math.max(0, width - 4 - visibleLength(line)));
    return `${TEAL}${BOX.vertical}${RESET} ${line}${fill} ${TEAL}${BOX.vertical}${RESET}`;
  });

  const bottom = `${TEAL}${BOX.bottomLeft}${h.repeat(width - 2)}${BOX.bottomRight}${RESET}`;
  return [top, ...body, bottom].join('\n');
}

export function sectionHeader(title: string, width = 50): string {
  const rule = BOX.horizontal.repeat(Math.max(0, width - visibleLength(title) - 1));
  return `  ${TEAL}${BOLD}${title}${RESET} ${TEAL_DIM}${rule}${RESET}`;
}

export function kvRow(label: string, value: string, labelWidth = 14): string {
  return `  ${BOLD}${label.padEnd(labelWidth)}${RESET} ${value}`;
}

export function separator(width = 50): string {
  return `  ${TEAL_DIM}${BOX.horizontal.repeat(width)}${RESET}`;
}

export function statusPrefix(status: Status): string {
  switch (status) {
    case 'pass':
    case 'ok':
      return `${GREEN}+${RESET}`;
    case 'warn':
      return `${YELLOW}~${RESET}`;
    case 'fail':
      return `${RED}x${RESET}`;
  }
}

export function statusBadge(status: Status): string {
  switch (status) {
    case 'pass':
      return `${GREEN}${BOLD}PASS${RESET}`;
    case 'ok':
      return `${GREEN}${BOLD}OK${RESET}`;
    case 'warn':
      return `${YELLOW}${BOLD}WARN${RESET}`;
    case 'fail':
      return `${RED}${BOLD}FAIL${RESET}`;
  }
}
