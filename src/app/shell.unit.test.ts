import { describe, expect, it } from 'vitest';
import { parseCommand, tokenize } from './shell.js';
import { ValidationError } from '../ops/errors.js';

describe('tokenize', () => {
  it('splits on whitespace and keeps quoted text together', () => {
    expect(tokenize('upload "my file.txt"  b.txt')).toEqual(['upload', 'my file.txt', 'b.txt']);
    expect(tokenize(`a"b c"d 'x y'`)).toEqual(['ab cd', 'x y']);
  });

  it('keeps an empty quoted token', () => {
    expect(tokenize(`mkdir ''`)).toEqual(['mkdir', '']);
  });

  it('returns nothing for a blank line', () => {
    expect(tokenize('   ')).toEqual([]);
  });

  it('rejects an unterminated quote', () => {
    expect(() => tokenize(`rm 'a`)).toThrow('Unterminated quote');
  });
});

describe('parseCommand', () => {
  it('ignores blank lines', () => {
    expect(parseCommand('')).toBeUndefined();
  });

  it('parses commands without arguments', () => {
    expect(parseCommand('ls')).toEqual({ name: 'ls' });
    expect(parseCommand('back')).toEqual({ name: 'back' });
    expect(parseCommand('exit')).toEqual({ name: 'quit' });
  });

  it('parses row arguments', () => {
    expect(parseCommand('cd 2')).toEqual({ name: 'cd', row: 2 });
    expect(parseCommand('info 1')).toEqual({ name: 'info', row: 1 });
    expect(parseCommand('rm 1 3')).toEqual({ name: 'rm', rows: [1, 3] });
  });

  it('rejects missing or invalid rows', () => {
    expect(() => parseCommand('cd')).toThrow('Usage: cd <row>');
    expect(() => parseCommand('cd 0')).toThrow('Not a row number: 0');
    expect(() => parseCommand('open x')).toThrow('Not a row number: x');
    expect(() => parseCommand('rm')).toThrow('Usage: rm <row...>');
  });

  it('parses download targets anywhere on the line', () => {
    expect(parseCommand('download 1 3 --to /tmp/out')).toEqual({ name: 'download', rows: [1, 3], to: '/tmp/out' });
    expect(parseCommand('download --to /tmp/out 2')).toEqual({ name: 'download', rows: [2], to: '/tmp/out' });
    expect(parseCommand('download 2')).toEqual({ name: 'download', rows: [2] });
    expect(() => parseCommand('download 1 --to')).toThrow('Usage: download <row...> [--to <dir>]');
  });

  it('parses paths and names', () => {
    expect(parseCommand('upload a.txt "b c.txt"')).toEqual({ name: 'upload', paths: ['a.txt', 'b c.txt'] });
    expect(parseCommand('upload-dir ./project')).toEqual({ name: 'upload-dir', path: './project' });
    expect(parseCommand('mkdir New Folder')).toEqual({ name: 'mkdir', folderName: 'New Folder' });
    expect(() => parseCommand('upload-dir a b')).toThrow('Usage: upload-dir <path>');
  });

  it('parses settings with quoted JSON values', () => {
    expect(parseCommand('set auto_refresh no')).toEqual({ name: 'set', key: 'auto_refresh', value: 'no' });
    expect(parseCommand(`set upload_ignore '{"glob":["*.log"]}'`)).toEqual({
      name: 'set',
      key: 'upload_ignore',
      value: '{"glob":["*.log"]}'
    });
    expect(() => parseCommand('set auto_refresh')).toThrow('Usage: set <key> <value>');
  });

  it('rejects unknown commands with a validation error', () => {
    expect(() => parseCommand('frobnicate')).toThrow(ValidationError);
    expect(() => parseCommand('frobnicate')).toThrow('Unknown command: frobnicate (try help)');
  });
});
