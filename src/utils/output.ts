import { stripVTControlCharacters } from 'node:util';
import chalk from 'chalk';

export const RULE_WIDTH = 66;

export const icons = {
  success: chalk.green('✔'),
};

export function header(text: string): string {
  return chalk.bold.underline(text);
}

export function label(text: string): string {
  return chalk.dim(text);
}

export function value(text: string): string {
  return chalk.cyan(text);
}

export function rule(char = '─', width = RULE_WIDTH): string {
  return char.repeat(width);
}

export function status(passed: boolean): string {
  return passed ? chalk.green('[PASS]') : chalk.red('[FAIL]');
}

function visibleLength(text: string): number {
  return stripVTControlCharacters(text).length;
}

export function table(rows: string[][], columnGap = 2): string {
  if (rows.length === 0) return '';

  const colCount = Math.max(...rows.map((r) => r.length));
  const widths: number[] = [];

  for (let c = 0; c < colCount; c++) {
    widths[c] = Math.max(...rows.map((r) => visibleLength(r[c] ?? '')));
  }

  return rows
    .map((row) =>
      row
        .map((cell, i) =>
          i < row.length - 1
            ? cell + ' '.repeat(widths[i] - visibleLength(cell) + columnGap)
            : cell,
        )
        .join(''),
    )
    .join('\n');
}
