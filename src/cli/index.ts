#!/usr/bin/env node

import { Command } from 'commander';
import { registerBatchCommand } from './commands/batch.js';
import { registerInstallBrowsersCommand } from './commands/install-browsers.js';
import { registerScrapeCommand } from './commands/scrape.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('pagesift')
    .description('Extract labeled sections from static and JavaScript-rendered pages')
    .version('0.1.0')
    .enablePositionalOptions();

  registerInstallBrowsersCommand(program);
  registerBatchCommand(program);
  registerScrapeCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
