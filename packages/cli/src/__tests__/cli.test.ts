import { describe, it, expect } from 'vitest';
import { createProgram, VERSION } from '../program.js';

describe('CLI entry point', () => {
  it('creates a program named "cvsql"', () => {
    const program = createProgram();
    expect(program.name()).toBe('cvsql');
  });

  it('reports the package version', () => {
    const program = createProgram();
    expect(program.version()).toBe(VERSION);
  });

  it('registers the convert, procedural and inspect commands', () => {
    const program = createProgram();
    const commandNames = program.commands.map((c) => c.name());
    expect(commandNames).toEqual(['convert', 'procedural', 'inspect']);
  });
});

describe('help output', () => {
  const plain = (text: string): string => text.replace(/\u001b\[[0-9;]*m/g, '');

  it('opens the top-level help with a version banner', () => {
    let written = '';
    const program = createProgram().configureOutput({ writeOut: (str) => (written += str) });
    program.outputHelp();

    const lines = plain(written).split('\n');
    expect(lines.slice(0, 3)).toEqual(['', `  cvsql v${VERSION}`, '']);
    expect(lines).toContain('Calculation View XML to SQL and procedural code');
  });

  it('leaves the banner off command help', () => {
    let written = '';
    const program = createProgram();
    const convert = program.commands.find((c) => c.name() === 'convert');
    convert?.configureOutput({ writeOut: (str) => (written += str) });
    convert?.outputHelp();

    expect(plain(written).split('\n')[0]).toBe('Usage: cvsql convert [options] [files...]');
  });
});
