/**
 * Operator input loop: one line in, one update out.
 */

import * as readline from 'node:readline';
import chalk from 'chalk';
import { consoleLog } from '../common/logger.js';
import type { Measurement } from '../metrics/measurement.js';
import type { MeasurementSnapshot } from '../metrics/types.js';

export interface InputLoopOptions {
  /** Measurement to update; shared with the scrape server */
  measurement: Measurement;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  color?: boolean;
  /** Ctrl+C at the prompt; closes the loop when omitted */
  onInterrupt?: () => void;
}

/**
 * Prompt text for the measurement's kind and current state.
 */
export function promptFor(snapshot: MeasurementSnapshot): string {
  switch (snapshot.kind) {
    case 'gauge':
      return `Set metric to x or add with +x (current: ${snapshot.value}): `;
    case 'counter':
      return `Enter a number to increment by one (current: ${snapshot.value}): `;
    case 'histogram':
      return 'Make an observation: ';
  }
}

export class InputLoop {
  private readonly measurement: Measurement;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly color: boolean;
  private readonly onInterrupt?: () => void;
  private rl?: readline.Interface;

  constructor(options: InputLoopOptions) {
    this.measurement = options.measurement;
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.color = options.color ?? true;
    this.onInterrupt = options.onInterrupt;
  }

  /**
   * Read lines until the input ends. Resolves once the input is closed.
   */
  run(): Promise<void> {
    if (this.rl) {
      return Promise.reject(new Error('Input loop is already running'));
    }

    return new Promise(resolve => {
      const rl = readline.createInterface({
        input: this.input,
        output: this.output,
      });
      this.rl = rl;

      rl.on('SIGINT', () => {
        consoleLog('Interrupted at prompt');
        if (this.onInterrupt) {
          this.onInterrupt();
        } else {
          rl.close();
        }
      });

      rl.on('line', (line: string) => {
        this.handleLine(line);
        this.prompt();
      });

      rl.on('close', () => {
        consoleLog('Input closed');
        this.rl = undefined;
        resolve();
      });

      this.prompt();
    });
  }

  /** Stop reading input. */
  close(): void {
    this.rl?.close();
  }

  /**
   * Apply one line of operator text. Malformed lines change nothing.
   */
  handleLine(line: string): void {
    if (!line.trim()) return;

    const result = this.measurement.update(line);
    if (!result.ok) {
      this.writeLine(this.paint(chalk.yellow, `Ignored ${JSON.stringify(line)}: not a number`));
      return;
    }

    consoleLog('Accepted %s', result.value);
    if (result.snapshot.kind === 'histogram') {
      this.writeLine(`Observed ${result.value}`);
    }
  }

  private prompt(): void {
    if (!this.rl) return;
    this.rl.setPrompt(this.paint(chalk.green, promptFor(this.measurement.snapshot())));
    this.rl.prompt();
  }

  private writeLine(text: string): void {
    this.output.write(`${text}\n`);
  }

  private paint(style: (text: string) => string, text: string): string {
    return this.color ? style(text) : text;
  }
}
