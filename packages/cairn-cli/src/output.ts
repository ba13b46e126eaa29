import chalk, { Chalk, type ChalkInstance } from 'chalk';

/**
 * Where the shell writes its text. Each `write` is one console line;
 * tests pass a collecting implementation.
 */
export interface Output {
  write(text: string): void;
  readonly chalk: ChalkInstance;
  readonly color: boolean;
}

export function createChalk(color: boolean): ChalkInstance {
  return color ? chalk : new Chalk({ level: 0 });
}

export function consoleOutput(color: boolean): Output {
  return {
    write: (text: string) => console.log(text),
    chalk: createChalk(color),
    color,
  };
}

/** Output that records every written line, with colour disabled. */
export class BufferedOutput implements Output {
  readonly lines: string[] = [];
  readonly chalk = createChalk(false);
  readonly color = false;

  write(text: string): void {
    this.lines.push(text);
  }
}
