import { columnToString, createTableToString, type Database, type TableSchema } from '@cairndb/engine';
import Table from 'cli-table3';
import type { Output } from '../output.js';

/** What the shell should do after a dot command. */
export type DotCommandOutcome = 'handled' | 'exit' | 'unknown';

export class DotCommands {
  constructor(
    private readonly db: Database,
    private readonly out: Output,
  ) {}

  handle(command: string): DotCommandOutcome {
    const parts = command.trim().slice(1).split(/\s+/);
    const cmd = parts[0];
    const args = parts.slice(1);

    switch (cmd) {
      case 'help':
        this.printHelp();
        return 'handled';
      case 'exit':
      case 'quit':
        return 'exit';
      case 'tables':
        this.listTables();
        return 'handled';
      case 'schema':
        this.showSchema(args[0]);
        return 'handled';
      default:
        return 'unknown';
    }
  }

  private newTable(head: string[]) {
    const chalk = this.out.chalk;
    return new Table({
      head: head.map(name => chalk.cyan(name)),
      style: this.out.color ? { head: [], border: ['grey'] } : { head: [], border: [] },
    });
  }

  private printHelp(): void {
    this.out.write(`
Available commands:
  .help                    Show this help message
  .exit, .quit             Exit the shell
  .tables                  List all tables
  .schema [table]          Show table schema

SQL commands:
  Enter a statement ending in ';' to execute it

Examples:
  CREATE TABLE users (id INT, name VARCHAR(32));
  INSERT INTO users VALUES (1, 'Alice');
  SELECT * FROM users;
`);
  }

  listTables(): void {
    const names = this.db.listTables();
    if (names.length === 0) {
      this.out.write(this.out.chalk.yellow('No tables found'));
      return;
    }

    const table = this.newTable(['Name', 'Columns']);
    for (const name of names) {
      table.push([name, String(this.db.getTable(name)?.columns.length ?? 0)]);
    }

    this.out.write(table.toString());
    this.out.write(this.out.chalk.gray(`${names.length} table(s)`));
  }

  showSchema(tableName?: string): void {
    if (!tableName) {
      const schemas = this.db.listTables()
        .map(name => this.db.getTable(name))
        .filter((schema): schema is TableSchema => schema !== undefined);
      if (schemas.length === 0) {
        this.out.write(this.out.chalk.yellow('No schema found'));
        return;
      }
      for (const schema of schemas) {
        this.out.write(createTableToString(schema) + ';');
      }
      return;
    }

    const schema = this.db.getTable(tableName);
    if (!schema) {
      this.out.write(this.out.chalk.yellow(`Table '${tableName}' not found`));
      return;
    }

    this.out.write(createTableToString(schema) + ';');
    this.out.write(this.out.chalk.gray('Columns:'));
    const table = this.newTable(['Name', 'Type', 'Length', 'Declared']);
    for (const column of schema.columns) {
      table.push([column.name, column.dataType, String(column.length), columnToString(column)]);
    }
    this.out.write(table.toString());
  }
}
