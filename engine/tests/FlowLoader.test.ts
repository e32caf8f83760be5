import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FlowLoader } from '../src/loader/FlowLoader.js';
import { FlowLoadError, FlowSchemaError } from '../src/errors/FlowError.js';
import { ExitCode, FlowErrorCode } from '../src/errors/ErrorCodes.js';

describe('FlowLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'flowcert-loader-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads a YAML file', async () => {
    const file = join(dir, 'flow.yaml');
    await writeFile(file, 'id: f\nname: F\nnodes:\n  - id: m\n    type: message\n');

    const flow = await FlowLoader.fromFile(file);

    expect(flow).toEqual({
      id: 'f',
      name: 'F',
      nodes: [{ id: 'm', type: 'message', data: {} }],
      edges: [],
      metadata: {},
    });
  });

  it('loads a JSON file', async () => {
    const file = join(dir, 'flow.json');
    await writeFile(file, JSON.stringify({ id: 'j', name: 'J', nodes: [] }));

    expect((await FlowLoader.fromFile(file)).id).toBe('j');
  });

  it('raises FlowLoadError for a missing file', async () => {
    const file = join(dir, 'missing.yaml');

    const error = await FlowLoader.fromFile(file).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FlowLoadError);
    if (error instanceof FlowLoadError) {
      expect(error.code).toBe(FlowErrorCode.LOAD_FILE_NOT_FOUND);
      expect(error.exitCode).toBe(ExitCode.FILE_NOT_FOUND);
      expect(error.message).toBe(`Flow file not found: ${file}`);
    }
  });

  it('passes schema errors through', async () => {
    const file = join(dir, 'bad.yaml');
    await writeFile(file, 'id: f\n');

    await expect(FlowLoader.fromFile(file)).rejects.toBeInstanceOf(FlowSchemaError);
  });
});
