import chalk from 'chalk';

export type CliLogger = {
  info: (msg: string) => void;
  success: (msg: string) => void;
  warning: (msg: string) => void;
  error: (msg: string) => void;
  debug: (msg: string) => void;
};

/** Colour roles used by CLI output. */
export type Painter = {
  ok: (text: string) => string;
  bad: (text: string) => string;
  warn: (text: string) => string;
  note: (text: string) => string;
  dim: (text: string) => string;
  title: (text: string) => string;
};

export const chalkPainter: Painter = {
  ok: (text) => chalk.green(text),
  bad: (text) => chalk.red(text),
  warn: (text) => chalk.yellow(text),
  note: (text) => chalk.blue(text),
  dim: (text) => chalk.gray(text),
  title: (text) => chalk.cyan.bold(text)
};

export const plainPainter: Painter = {
  ok: (text) => text,
  bad: (text) => text,
  warn: (text) => text,
  note: (text) => text,
  dim: (text) => text,
  title: (text) => text
};

export function createCliLogger(options: {
  out?: (line: string) => void;
  err?: (line: string) => void;
  painter?: Painter;
} = {}): CliLogger {
  const out = options.out ?? ((line: string) => console.log(line));
  const err = options.err ?? ((line: string) => console.error(line));
  const paint = options.painter ?? chalkPainter;
  return {
    info: (msg) => out(`${paint.note('ℹ')} ${msg}`),
    success: (msg) => out(`${paint.ok('✓')} ${msg}`),
    warning: (msg) => out(`${paint.warn('⚠')} ${msg}`),
    error: (msg) => err(`${paint.bad('✗')} ${msg}`),
    debug: (msg) => out(`${paint.dim('◉')} ${msg}`)
  };
}

export const logger: CliLogger = createCliLogger();
