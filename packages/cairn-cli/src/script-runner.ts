import { resultText, type Database } from '@cairndb/engine';
import type { Output } from './output.js';
import { StatementBuffer } from './statement-buffer.js';

export const UNTERMINATED_SCRIPT_MESSAGE = "script ended without terminating ';'";

/** Counts of one script run. */
export interface ScriptSummary {
  executed: number;
  failed: number;
}

/**
 * Runs SQL statements from lines of text against a database and prints each
 * result or error. A failing statement never stops the ones after it.
 */
export class ScriptRunner {
  private readonly buffer = new StatementBuffer();

  constructor(
    private readonly db: Database,
    private readonly out: Output,
  ) {}

  /** True while a statement is waiting for its ';'. */
  get pending(): boolean {
    return this.buffer.pending;
  }

  /** Executes one statement and prints its outcome. Returns false when it failed. */
  execute(sql: string): boolean {
    const result = this.db.exec(sql);
    if (!result.ok) {
      this.out.write(this.out.chalk.red(`Error: ${result.error.message}`));
      return false;
    }

    const value = result.value;
    if (value.kind === 'rows') {
      // The table text ends in a newline, which leaves a blank line after it
      this.out.write(value.text);
    } else {
      this.out.write(this.out.chalk.green(resultText(value)));
    }
    return true;
  }

  /** Feeds one line, running every statement it completes. */
  feedLine(line: string, summary: ScriptSummary = { executed: 0, failed: 0 }): ScriptSummary {
    for (const statement of this.buffer.push(line)) {
      summary.executed++;
      if (!this.execute(statement)) {
        summary.failed++;
      }
    }
    return summary;
  }

  /** Drops any unterminated statement. */
  reset(): void {
    this.buffer.clear();
  }

  /**
   * Runs a whole script. Leftover text without a closing ';' is reported
   * as an error and discarded.
   */
  runScript(text: string): ScriptSummary {
    const summary: ScriptSummary = { executed: 0, failed: 0 };
    for (const line of text.split(/\r?\n/)) {
      this.feedLine(line, summary);
    }

    if (this.buffer.remainder !== '') {
      this.out.write(this.out.chalk.red(`Error: ${UNTERMINATED_SCRIPT_MESSAGE}`));
      summary.failed++;
    }
    this.buffer.clear();
    return summary;
  }
}
