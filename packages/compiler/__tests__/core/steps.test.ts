import { describe, it, expect } from 'vitest';
import { StepRecorder, snippetOf } from '../../src/core/steps.js';
import {
  FAEResolutionError,
  ParseError,
  RenderError,
  StrictModeError,
} from '../../src/core/errors.js';

describe('ConversionError', () => {
  it('appends its location to the message', () => {
    const err = new RenderError('Column missing', { node: 'Join_1', column: 'DEPT', line: 12 });
    expect(err.step).toBe('render');
    expect(err.describe()).toBe('Column missing (node: Join_1, column: DEPT, line 12)');
  });

  it('describes an error without context as its message', () => {
    expect(new ParseError('Empty XML document').describe()).toBe('Empty XML document');
  });

  it('names the join stage and key when a lookup source is missing', () => {
    const err = new FAEResolutionError('Join_2', 'BUKRS', 'no table found');
    expect(err.message).toBe("Cannot resolve a source table for key 'BUKRS' of join stage 'Join_2': no table found");
    expect(err.stage).toBe('Join_2');
    expect(err.key).toBe('BUKRS');
  });

  it('summarizes strict-mode failures', () => {
    const err = new StrictModeError([
      { code: 'NO_SELECT', message: 'x' },
      { code: 'TRAILING_COMMA', message: 'y' },
    ]);
    expect(err.message).toBe('Strict validation failed with 2 error(s): NO_SELECT, TRAILING_COMMA');
  });
});

describe('StepRecorder', () => {
  it('records successful steps with their outcome', () => {
    const recorder = new StepRecorder();
    const value = recorder.run('parse', () => 42, (n) => ({ detail: `got ${n}` }));

    expect(value).toBe(42);
    const [step] = recorder.steps();
    expect(step?.step).toBe('parse');
    expect(step?.status).toBe('ok');
    expect(step?.detail).toBe('got 42');
    expect(step?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('records and rethrows failures', () => {
    const recorder = new StepRecorder();
    expect(() =>
      recorder.run('parse', () => {
        throw new ParseError('Bad input', { line: 3 });
      }),
    ).toThrow('Bad input');

    expect(recorder.steps()).toEqual([
      expect.objectContaining({ step: 'parse', status: 'error', detail: 'Bad input (line 3)' }),
    ]);
  });

  it('records skipped steps', () => {
    const recorder = new StepRecorder();
    recorder.skip('correct', 'auto-correction disabled');
    expect(recorder.steps()).toEqual([
      { step: 'correct', status: 'skipped', durationMs: 0, detail: 'auto-correction disabled' },
    ]);
  });
});

describe('snippetOf', () => {
  it('keeps short text whole', () => {
    expect(snippetOf('a\nb')).toBe('a\nb');
  });

  it('truncates after twelve lines', () => {
    const text = Array.from({ length: 14 }, (_, i) => `line ${i + 1}`).join('\n');
    const snippet = snippetOf(text);
    expect(snippet.split('\n')).toHaveLength(13);
    expect(snippet.endsWith('line 12\n...')).toBe(true);
  });
});
