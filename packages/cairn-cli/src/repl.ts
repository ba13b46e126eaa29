import * as readline from 'node:readline';
import type { Database } from '@cairndb/engine';
import { DotCommands } from './commands/dot-commands.js';
import { consoleOutput, type Output } from './output.js';
import { ScriptRunner } from './script-runner.js';

export const PROMPT = 'cairn> ';
export const CONTINUATION_PROMPT = '    -> ';

const EXIT_LINES = new Set(['.exit', '.quit', 'exit;']);

interface ReplOptions {
  color?: boolean;
  input?: NodeJS.ReadableStream;
  output?: Output;
}

/** What the REPL does with one input line. */
export type LineOutcome = 'continue' | 'exit';

export class REPL {
  private readonly out: Output;
  private readonly runner: ScriptRunner;
  private readonly dotCommands: DotCommands;
  private readonly input?: NodeJS.ReadableStream;

  constructor(db: Database, options: ReplOptions = {}) {
    this.out = options.output ?? consoleOutput(options.color ?? true);
    this.input = options.input;
    this.runner = new ScriptRunner(db, this.out);
    this.dotCommands = new DotCommands(db, this.out);
  }

  /** Prompt for the next line: the continuation prompt while a statement is open. */
  get prompt(): string {
    return this.runner.pending ? CONTINUATION_PROMPT : PROMPT;
  }

  /**
   * Handles one line of input. `.exit`, `.quit` and `exit;` leave even in the
   * middle of a statement; other dot commands only count at its start.
   */
  handleLine(line: string): LineOutcome {
    const trimmed = line.trim();

    if (EXIT_LINES.has(trimmed)) {
      return 'exit';
    }
    if (!this.runner.pending && trimmed.startsWith('.')) {
      const outcome = this.dotCommands.handle(trimmed);
      if (outcome === 'exit') {
        return 'exit';
      }
      if (outcome === 'unknown') {
        this.out.write(this.out.chalk.yellow(`Unknown command: ${trimmed}`));
        this.out.write('Type .help for available commands');
      }
      return 'continue';
    }

    this.runner.feedLine(line);
    return 'continue';
  }

  /** Reads lines until exit or end of input. Resolves once the shell has closed. */
  start(): Promise<void> {
    const chalk = this.out.chalk;
    this.out.write(chalk.blue('Cairn interactive SQL shell'));
    this.out.write(chalk.gray('Type .help for available commands; end statements with ;'));

    const rl = readline.createInterface({
      input: this.input ?? process.stdin,
      output: process.stdout,
      prompt: PROMPT,
    });

    rl.on('SIGINT', () => {
      if (this.runner.pending) {
        this.runner.reset();
        this.out.write(chalk.gray('\nStatement discarded.'));
      } else {
        this.out.write('\nUse .exit to quit.');
      }
      rl.setPrompt(this.prompt);
      rl.prompt();
    });

    rl.on('line', (line: string) => {
      if (this.handleLine(line) === 'exit') {
        rl.close();
        return;
      }
      rl.setPrompt(this.prompt);
      rl.prompt();
    });

    return new Promise(resolve => {
      rl.on('close', () => {
        this.out.write('Bye!');
        resolve();
      });
      rl.prompt();
    });
  }
}
