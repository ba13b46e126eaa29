import * as fs from 'node:fs';
import * as readline from 'node:readline';
import type { Output } from './output.js';
import type { ScriptRunner } from './script-runner.js';

const EXIT_WORDS = new Set(['exit', '.exit', 'quit']);

/**
 * Re-runs a SQL file each time ENTER is pressed. The file is read afresh
 * every time so edits made between runs are picked up.
 */
export class Watcher {
  private executions = 0;

  constructor(
    readonly filePath: string,
    private readonly runner: ScriptRunner,
    private readonly out: Output,
  ) {}

  get executionCount(): number {
    return this.executions;
  }

  /** Runs the file once. Returns false when the file could not be read. */
  runOnce(): boolean {
    const chalk = this.out.chalk;
    this.executions++;
    this.out.write(chalk.cyan(`\n--- Execution #${this.executions} ---`));

    let text: string;
    try {
      text = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      this.out.write(chalk.red(`Error: Cannot open file: ${this.filePath}`));
      this.out.write(chalk.gray(error instanceof Error ? error.message : String(error)));
      return false;
    }

    this.runner.runScript(text);
    this.out.write(chalk.cyan('--- End of execution ---'));
    return true;
  }

  /** Interactive loop; resolves when the user quits or input ends. */
  start(input: NodeJS.ReadableStream = process.stdin): Promise<void> {
    const chalk = this.out.chalk;
    this.out.write(chalk.blue('=== Watch Mode ==='));
    this.out.write(`Monitoring: ${this.filePath}`);
    this.out.write(chalk.gray("Press ENTER to execute the file, or type 'exit' and press ENTER to quit.\n"));

    const rl = readline.createInterface({ input, output: process.stdout, prompt: '\n[Press ENTER to run] ' });

    rl.on('line', (line: string) => {
      if (EXIT_WORDS.has(line.trim())) {
        this.out.write('Exiting watch mode. Bye!');
        rl.close();
        return;
      }
      this.runOnce();
      rl.prompt();
    });

    return new Promise(resolve => {
      rl.on('close', () => resolve());
      rl.prompt();
    });
  }
}
