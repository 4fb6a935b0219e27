#!/usr/bin/env node
import readline from 'node:readline/promises';
import { parseArgs } from 'node:util';
import { createApp } from './app/createApp.js';
import { Shell } from './app/shell.js';
import { TextView } from './ui/TextView.js';

const USAGE = `Usage: drivepane [--config <file>] [--log-file <file>] [--yes]

Browses Google Drive from the terminal. Type "help" at the prompt for commands.
`;

async function main(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string' },
      'log-file': { type: 'string' },
      yes: { type: 'boolean', short: 'y' },
      help: { type: 'boolean', short: 'h' }
    }
  });
  if (values.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  const view = new TextView({ out: process.stdout, prompt: (question) => rl.question(question), assumeYes: values.yes });
  const app = createApp({ configFile: values.config, logFile: values['log-file'], view });
  const shell = new Shell(app.browser, process.stdout);
  // Ctrl-C cancels the batches on screen first, then leaves.
  rl.on('SIGINT', () => {
    if (view.cancelProgress() === 0) rl.close();
  });

  await app.browser.connect();
  await app.browser.whenIdle();
  while (!closed) {
    let line: string;
    try {
      line = await rl.question('drivepane> ');
    } catch (err) {
      if (closed) break;
      throw err;
    }
    if (!(await shell.run(line))) break;
  }
  rl.close();
  await app.browser.close();
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`drivepane: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  }
);
