/**
 * Human-readable CLI output. Structured logs go through pino on stderr;
 * everything here is for the operator watching the terminal.
 */

import chalk from 'chalk';

export interface ConsoleOutput {
  write(text: string): void;
}

export const stdoutOutput: ConsoleOutput = {
  write: (text) => {
    process.stdout.write(text);
  },
};

export function createConsole(out: ConsoleOutput = stdoutOutput) {
  let dotsPending = false;
  const line = (text = '') => {
    dotsPending = false;
    out.write(`${text}\n`);
  };

  return {
    line,

    info: (message: string) => line(chalk.blue(message)),

    success: (message: string) => line(chalk.green(message)),

    warning: (message: string) => line(chalk.yellow(message)),

    error: (message: string) => line(chalk.red(message)),

    phase: (phase: string) => {
      line();
      line(chalk.magenta.bold(`>>> ${phase}`));
    },

    step: (step: string) => line(chalk.cyan(`  → ${step}`)),

    /** Progress indicator while a poll is waiting */
    dot: () => {
      dotsPending = true;
      out.write('.');
    },

    /** Terminates a run of progress dots, if one is open */
    endDots: () => {
      if (dotsPending) {
        line();
      }
    },

    /** Plain block of preformatted text, e.g. a report table */
    block: (text: string) => line(text),
  };
}

export type BenchConsole = ReturnType<typeof createConsole>;
