/**
 * Removes a `--` comment from one line. Dashes inside a quoted string
 * are kept.
 */
export function stripComment(line: string): string {
  let inQuote = false;
  for (let i = 0; i < line.length; i++) {
    const c = line[i];
    if (c === '\'') {
      inQuote = !inQuote;
    } else if (!inQuote && c === '-' && line[i + 1] === '-') {
      return line.slice(0, i);
    }
  }
  return line;
}

/**
 * Accumulates script lines into complete statements.
 * Lines are joined with a space; a `;` outside quotes ends a statement.
 * Quote state carries across lines.
 */
export class StatementBuffer {
  private text = '';
  private inQuote = false;

  /** Feeds one line and returns the statements it completed, without their ';'. */
  push(line: string): string[] {
    const statements: string[] = [];

    for (let i = 0; i < line.length; i++) {
      const c = line[i];
      if (c === '\'') {
        this.inQuote = !this.inQuote;
      } else if (!this.inQuote) {
        if (c === '-' && line[i + 1] === '-') {
          break;
        }
        if (c === ';') {
          const statement = this.text.trim();
          if (statement !== '') {
            statements.push(statement);
          }
          this.text = '';
          continue;
        }
      }
      this.text += c;
    }

    if (this.text.trim() === '') {
      this.text = '';
    } else {
      this.text += ' ';
    }
    return statements;
  }

  /** True while an unterminated statement is buffered. */
  get pending(): boolean {
    return this.text !== '';
  }

  /** Text buffered since the last ';'. */
  get remainder(): string {
    return this.text.trim();
  }

  clear(): void {
    this.text = '';
    this.inQuote = false;
  }
}
