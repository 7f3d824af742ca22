// Raw ANSI codes — no chalk dependency

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const BLUE = '\x1b[34m';
const CYAN = '\x1b[36m';

function paint(code: string, s: string): string {
  if (process.env.NO_COLOR) return s;
  return `${code}${s}${RESET}`;
}

export function bold(s: string): string { return paint(BOLD, s); }
export function dim(s: string): string { return paint(DIM, s); }
export function red(s: string): string { return paint(RED, s); }
export function green(s: string): string { return paint(GREEN, s); }
export function yellow(s: string): string { return paint(YELLOW, s); }
export function blue(s: string): string { return paint(BLUE, s); }
export function cyan(s: string): string { return paint(CYAN, s); }

export function statusColor(status: string): string {
  switch (status) {
    case 'completed': return green(status);
    case 'pending': return yellow(status);
    default: return status;
  }
}

export function provenanceColor(provenance: string): string {
  switch (provenance) {
    case 'optimizer': return cyan(provenance);
    case 'fallback': return yellow(provenance);
    case 'import': return blue(provenance);
    default: return provenance;
  }
}

/** Compact rendering of a parameter or objective value for tables. */
export function formatValue(value: number | string | undefined): string {
  if (value === undefined) return '—';
  if (typeof value === 'string') return value;
  if (Number.isInteger(value)) return String(value);
  return Number(value.toPrecision(6)).toString();
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

/**
 * Print header banner for a command.
 */
export function header(title: string): void {
  console.log(`\n${bold(`[bolab] ${title}`)}\n`);
}

/**
 * Print a warning.
 */
export function warn(msg: string): void {
  console.log(`${yellow('[bolab]')} ${msg}`);
}

/**
 * Print an info message.
 */
export function info(msg: string): void {
  console.log(`${cyan('[bolab]')} ${msg}`);
}

/**
 * Print a success message.
 */
export function success(msg: string): void {
  console.log(`${green('[bolab]')} ${msg}`);
}

/**
 * Print an error message to stderr.
 */
export function error(msg: string): void {
  console.error(`${red('[bolab]')} ${msg}`);
}
