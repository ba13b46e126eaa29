#!/usr/bin/env -S node --import tsx

import { Command } from 'commander';
import * as fs from 'node:fs/promises';
import { Database } from '@cairndb/engine';
import { REPL } from '../repl.js';
import { ScriptRunner } from '../script-runner.js';
import { Watcher } from '../watch.js';
import { parseLineRange, selectLines, type LineRange } from '../lines.js';
import { checkOptionCombination, readConfig, resolveSettings, type CliOptions } from '../options.js';
import { consoleOutput, createChalk } from '../output.js';

const program = new Command();

program
  .name('cairn')
  .description('Cairn - SQL shell and script runner')
  .version('0.1.0')
  .option('-f, --file <path>', 'execute statements from a SQL file and exit')
  .option('-l, --lines <start-end>', 'limit --file execution to an inclusive line range')
  .option('-w, --watch <path>', 'watch mode: press ENTER to re-execute a SQL file')
  .option('-d, --data-dir <path>', 'directory holding the catalog and table files')
  .option('--config <path>', 'load configuration from file')
  .option('--no-color', 'disable colored output')
  .action(async () => {
    const options = program.opts<CliOptions>();
    const chalk = createChalk(options.color);
    try {
      await run(options);
    } catch (error) {
      console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

async function run(options: CliOptions): Promise<void> {
  checkOptionCombination(options);
  let range: LineRange | undefined;
  if (options.lines !== undefined) {
    try {
      range = parseLineRange(options.lines);
    } catch (error) {
      throw new Error(`Invalid line range: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  const warnChalk = createChalk(options.color);
  const config = await readConfig(options.config, message => {
    console.warn(warnChalk.yellow(`Warning: ${message}`));
  });
  const { dataDir, color } = resolveSettings(options, config);
  const out = consoleOutput(color);
  const db = new Database({ dataDir });

  if (options.watch !== undefined) {
    await new Watcher(options.watch, new ScriptRunner(db, out), out).start();
    return;
  }

  if (options.file !== undefined) {
    let script: string;
    try {
      script = await fs.readFile(options.file, 'utf-8');
    } catch (error) {
      throw new Error(`Failed to open SQL file: ${options.file}`, { cause: error });
    }
    if (range) {
      script = selectLines(script, range);
    }
    new ScriptRunner(db, out).runScript(script);
    return;
  }

  await new REPL(db, { output: out }).start();
}

await program.parseAsync(process.argv);
