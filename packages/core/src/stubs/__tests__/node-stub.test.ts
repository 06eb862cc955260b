import { runInNewContext } from 'node:vm';
import { describe, it, expect } from 'vitest';
import { createDefaultSynthesizers } from '../index.js';
import { TextRenderer } from '../../rendering/renderer.js';

type Listener = (chunk?: string) => void;

interface StubProcess {
  exitCode?: number;
  stdin: {
    setEncoding: (encoding: string) => void;
    on: (event: string, listener: Listener) => void;
  };
  stdout: { write: (text: string) => boolean };
}

interface StubRun {
  output: unknown;
  exitCode?: number;
}

const [stub] =
  createDefaultSynthesizers().synthesize({
    projectName: 'demo',
    processor: {
      id: 'main_processor',
      type: 'node',
      parallel: true,
      timeout: 1000,
      retry: 0,
      dependencies: [],
    },
    renderer: new TextRenderer(),
  }) ?? [];

/**
 * Run the generated script against one stdin payload inside a vm context
 */
function runStub(input: string): StubRun {
  const listeners = new Map<string, Listener>();
  let written = '';
  const fakeProcess: StubProcess = {
    stdin: {
      setEncoding: () => undefined,
      on: (event, listener) => {
        listeners.set(event, listener);
      },
    },
    stdout: {
      write: (text) => {
        written += text;
        return true;
      },
    },
  };

  // vm scripts take no hashbang line
  const source = stub.content.replace(/^#!.*/, '//');
  runInNewContext(source, { process: fakeProcess, console: { error: () => undefined } });

  listeners.get('data')?.(input);
  listeners.get('end')?.();

  expect(written.endsWith('\n')).toBe(true);
  const output: unknown = JSON.parse(written);
  return { output, exitCode: fakeProcess.exitCode };
}

describe('generated node processor', () => {
  it('should stamp and upper-case a record', () => {
    const { output, exitCode } = runStub('{"message":"hi","id":7}');

    expect(exitCode).toBeUndefined();
    expect(output).toEqual({
      message: 'HI',
      id: 7,
      processor: 'main_processor',
      processed_at: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/),
    });
  });

  it('should report malformed JSON with no original data', () => {
    const { output, exitCode } = runStub('not json');

    expect(exitCode).toBe(1);
    expect(output).toMatchObject({ processor: 'main_processor', original_data: null });
  });

  it('should reject a null record', () => {
    const { output, exitCode } = runStub('null');

    expect(exitCode).toBe(1);
    expect(output).toEqual({
      error: 'input is not a JSON object',
      processor: 'main_processor',
      original_data: null,
    });
  });

  it('should reject an array record', () => {
    const { output, exitCode } = runStub('[1,2]');

    expect(exitCode).toBe(1);
    expect(output).toEqual({
      error: 'input is not a JSON object',
      processor: 'main_processor',
      original_data: [1, 2],
    });
  });

  it('should reject a scalar record', () => {
    const { output, exitCode } = runStub('"text"');

    expect(exitCode).toBe(1);
    expect(output).toEqual({
      error: 'input is not a JSON object',
      processor: 'main_processor',
      original_data: 'text',
    });
  });
});
