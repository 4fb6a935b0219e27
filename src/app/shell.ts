import type { Writable } from 'node:stream';
import type { DriveBrowser } from '../browser/DriveBrowser.js';
import { parseSetting } from '../config/ConfigStore.js';
import { ValidationError } from '../ops/errors.js';
import type { RowHandle } from '../types/ids.js';

export type ShellCommand =
  | { name: 'ls' | 'back' | 'home' | 'cancel' | 'help' | 'quit' }
  | { name: 'cd' | 'open' | 'info'; row: number }
  | { name: 'upload'; paths: string[] }
  | { name: 'upload-dir'; path: string }
  | { name: 'download'; rows: number[]; to?: string }
  | { name: 'rm'; rows: number[] }
  | { name: 'mkdir'; folderName: string }
  | { name: 'set'; key: string; value: string };

export const HELP_TEXT = [
  'Commands:',
  '  ls                          refresh the current folder',
  '  cd <row>                    enter a folder',
  '  open <row>                  enter a folder or download a file',
  '  back | home                 go to the previous folder or the root',
  '  upload <path...>            upload local files here',
  '  upload-dir <path>           upload a local folder here',
  '  download <row...> [--to d]  download files',
  '  rm <row...>                 delete items',
  '  mkdir <name>                create a folder',
  '  info <row>                  show properties',
  '  set <key> <value>           change a setting',
  '  cancel                      cancel running operations',
  '  help | quit'
].join('\n');

/** Splits a command line on whitespace, honouring single and double quotes. */
export function tokenize(line: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let quote: string | undefined;
  let pending = false;
  for (const ch of line) {
    if (quote) {
      if (ch === quote) quote = undefined;
      else current += ch;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      pending = true;
    } else if (/\s/.test(ch)) {
      if (pending) tokens.push(current);
      current = '';
      pending = false;
    } else {
      current += ch;
      pending = true;
    }
  }
  if (quote) throw new ValidationError('Unterminated quote');
  if (pending) tokens.push(current);
  return tokens;
}

function parseRow(token: string | undefined, usage: string): number {
  if (token === undefined) throw new ValidationError(`Usage: ${usage}`);
  const row = Number(token);
  if (!Number.isInteger(row) || row < 1) throw new ValidationError(`Not a row number: ${token}`);
  return row;
}

function parseRows(tokens: string[], usage: string): number[] {
  if (tokens.length === 0) throw new ValidationError(`Usage: ${usage}`);
  return tokens.map((token) => parseRow(token, usage));
}

export function parseCommand(line: string): ShellCommand | undefined {
  const [name, ...args] = tokenize(line);
  if (name === undefined) return undefined;
  switch (name) {
    case 'ls':
    case 'back':
    case 'home':
    case 'cancel':
    case 'help':
    case 'quit':
      return { name };
    case 'exit':
      return { name: 'quit' };
    case 'cd':
    case 'open':
    case 'info':
      return { name, row: parseRow(args[0], `${name} <row>`) };
    case 'upload':
      if (args.length === 0) throw new ValidationError('Usage: upload <path...>');
      return { name, paths: args };
    case 'upload-dir':
      if (args.length !== 1) throw new ValidationError('Usage: upload-dir <path>');
      return { name, path: args[0] };
    case 'download': {
      const toIndex = args.indexOf('--to');
      if (toIndex === -1) return { name, rows: parseRows(args, 'download <row...> [--to <dir>]') };
      const to = args[toIndex + 1];
      if (to === undefined) throw new ValidationError('Usage: download <row...> [--to <dir>]');
      const rows = [...args.slice(0, toIndex), ...args.slice(toIndex + 2)];
      return { name, rows: parseRows(rows, 'download <row...> [--to <dir>]'), to };
    }
    case 'rm':
      return { name, rows: parseRows(args, 'rm <row...>') };
    case 'mkdir':
      if (args.length === 0) throw new ValidationError('Usage: mkdir <name>');
      return { name, folderName: args.join(' ') };
    case 'set':
      if (args.length < 2) throw new ValidationError('Usage: set <key> <value>');
      return { name, key: args[0], value: args.slice(1).join(' ') };
    default:
      throw new ValidationError(`Unknown command: ${name} (try help)`);
  }
}

/** Runs shell commands against a browser. */
export class Shell {
  constructor(private readonly browser: DriveBrowser, private readonly out: Writable) {}

  /** Returns false once the user asked to quit. */
  async run(line: string): Promise<boolean> {
    try {
      const command = parseCommand(line);
      if (!command) return true;
      return await this.execute(command);
    } catch (err) {
      if (err instanceof ValidationError) {
        this.print(`error: ${err.message}`);
        return true;
      }
      throw err;
    }
  }

  async execute(command: ShellCommand): Promise<boolean> {
    const browser = this.browser;
    switch (command.name) {
      case 'ls':
        browser.refresh();
        break;
      case 'back':
        browser.goBack();
        break;
      case 'home':
        browser.goHome();
        break;
      case 'cd': {
        const row = this.row(command.row);
        if (!row.entry.isFolder) throw new ValidationError(`Not a folder: ${row.name}`);
        browser.open(row.handle);
        break;
      }
      case 'open':
        browser.open(this.row(command.row).handle);
        break;
      case 'info':
        browser.showInfo(this.row(command.row).handle);
        break;
      case 'upload':
        browser.uploadFiles(command.paths);
        break;
      case 'upload-dir':
        browser.uploadFolder(command.path);
        break;
      case 'download':
        browser.download(this.handles(command.rows), command.to);
        break;
      case 'rm':
        await browser.delete(this.handles(command.rows));
        break;
      case 'mkdir':
        browser.createFolder(command.folderName);
        break;
      case 'set':
        browser.applySettings(parseSetting(command.key, command.value));
        this.print(`${command.key} = ${command.value}`);
        break;
      case 'cancel': {
        const count = browser.cancelAll();
        this.print(count > 0 ? `Cancelling ${count} operation(s)` : 'Nothing to cancel');
        break;
      }
      case 'help':
        this.print(HELP_TEXT);
        break;
      case 'quit':
        return false;
    }
    return true;
  }

  private row(position: number) {
    const row = this.browser.listing.at(position);
    if (!row) throw new ValidationError(`No row ${position} in the current listing`);
    return row;
  }

  private handles(positions: readonly number[]): RowHandle[] {
    return positions.map((position) => this.row(position).handle);
  }

  private print(text: string): void {
    this.out.write(`${text}\n`);
  }
}
