/**
 * Interactive group prompt.
 */

import { createInterface, type Interface } from 'node:readline';
import chalk from 'chalk';

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Asks for groups over one readline interface for the whole session.
 *
 * Lines are consumed through the interface's async iterator, which buffers
 * them, so answers piped in a single chunk are handed out one per `ask()`.
 * The interface is opened on the first question.
 */
export class GroupPrompt {
  private rl: Interface | undefined;
  private lines: AsyncIterableIterator<string> | undefined;

  constructor(
    private readonly streams: PromptStreams = { input: process.stdin, output: process.stdout },
  ) {}

  /**
   * Ask until a non-blank answer is given.
   *
   * @throws {Error} if the input ends before an answer arrives.
   */
  async ask(): Promise<string> {
    const lines = this.open();

    for (;;) {
      this.streams.output.write(chalk.bold('Enter APT group name, ATT&CK ID or alias: '));
      const next = await lines.next();
      if (next.done) {
        throw new Error('Input closed before a group was entered');
      }

      const trimmed = next.value.trim();
      if (trimmed) return trimmed;
      this.streams.output.write(`${chalk.red('Please enter a valid APT group name or ID.')}\n`);
    }
  }

  close(): void {
    this.rl?.close();
    this.rl = undefined;
    this.lines = undefined;
  }

  private open(): AsyncIterableIterator<string> {
    if (this.lines) return this.lines;

    const rl = createInterface({ input: this.streams.input, terminal: false });
    const lines = rl[Symbol.asyncIterator]();
    this.rl = rl;
    this.lines = lines;
    return lines;
  }
}

export function printPromptGuide(): void {
  console.log(chalk.bold.magenta('  INTERACTIVE GROUP SELECTION'));
  console.log(chalk.cyan('  Examples of valid input:'));
  console.log(chalk.cyan('    ATT&CK IDs:  G0006, G0007, G0016'));
  console.log(chalk.cyan('    Group names: APT1, Lazarus Group, APT29'));
  console.log(chalk.cyan('    Aliases:     Comment Crew, HIDDEN COBRA, Cozy Bear'));
  console.log(chalk.yellow('  Tip: run with --list-groups to see every group'));
  console.log('');
}
