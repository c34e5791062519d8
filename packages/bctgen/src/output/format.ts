// Raw ANSI codes

const useColor = !process.env.NO_COLOR && process.stdout.isTTY !== false;

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';

function paint(code: string, s: string): string {
  return useColor ? `${code}${s}${RESET}` : s;
}

export function bold(s: string): string { return paint(BOLD, s); }
export function dim(s: string): string { return paint(DIM, s); }
export function red(s: string): string { return paint(RED, s); }
export function green(s: string): string { return paint(GREEN, s); }
export function yellow(s: string): string { return paint(YELLOW, s); }
export function cyan(s: string): string { return paint(CYAN, s); }

export function outcomeColor(outcome: string): string {
  switch (outcome) {
    case 'succeeded':
    case 'completed':
      return green(outcome);
    case 'failed':
    case 'aborted':
      return red(outcome);
    case 'retrying':
      return yellow(outcome);
    default: return dim(outcome);
  }
}

/**
 * Format data as a simple table with column headers.
 */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map(r => stripAnsi(r[i] ?? '').length))
  );

  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join('  ');
  const separator = widths.map(w => '─'.repeat(w)).join('──');
  const bodyLines = rows.map(row =>
    row.map((cell, i) => {
      const stripped = stripAnsi(cell);
      const padding = widths[i] - stripped.length;
      return cell + ' '.repeat(Math.max(0, padding));
    }).join('  ')
  );

  return [bold(headerLine), separator, ...bodyLines].join('\n');
}

export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}

/** Shorten a message for one-line previews. */
export function preview(s: string, max = 100): string {
  const flat = s.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat;
}

/**
 * Print header banner for a command.
 */
export function header(title: string): void {
  console.log(`\n${bold(`[bctgen] ${title}`)}\n`);
}

/**
 * Print a warning.
 */
export function warn(msg: string): void {
  console.log(`${yellow('[bctgen]')} ${msg}`);
}

/**
 * Print an info message.
 */
export function info(msg: string): void {
  console.log(`${cyan('[bctgen]')} ${msg}`);
}

/**
 * Print a success message.
 */
export function success(msg: string): void {
  console.log(`${green('[bctgen]')} ${msg}`);
}

/** Print an error to stderr. */
export function error(msg: string): void {
  console.error(`${red('[bctgen]')} ${msg}`);
}
