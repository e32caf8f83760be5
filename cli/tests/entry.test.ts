import { spawnSync } from 'node:child_process';
import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

const ROOT = fileURLToPath(new URL('../../', import.meta.url));
const BUILT_CLI = join(ROOT, 'cli', 'dist', 'cli.js');

async function manifest(pkg: string): Promise<unknown> {
  return JSON.parse(await readFile(join(ROOT, pkg, 'package.json'), 'utf-8'));
}

describe('package wiring', () => {
  it('hands Node compiled JavaScript and tools the sources', async () => {
    expect(await manifest('engine')).toMatchObject({
      exports: {
        '.': { development: './src/index.ts', types: './dist/index.d.ts', import: './dist/index.js' },
      },
    });
    expect(await manifest('cli')).toMatchObject({
      bin: { flowcert: './dist/cli.js' },
      exports: {
        '.': { development: './src/program.ts', types: './dist/program.d.ts', import: './dist/program.js' },
      },
    });
  });
});

describe.skipIf(!existsSync(BUILT_CLI))('built flowcert entry point', () => {
  let dir: string;
  let flowPath: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'flowcert-bin-'));
    flowPath = join(dir, 'flow.json');
    await writeFile(
      flowPath,
      JSON.stringify({
        id: 'bin',
        name: 'Bin',
        nodes: [
          { id: 'start', type: 'question' },
          { id: 'end', type: 'message' },
        ],
        edges: [{ source: 'start', target: 'end' }],
      })
    );
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('runs under plain Node', () => {
    const result = spawnSync(process.execPath, [BUILT_CLI, '--no-color', 'validate', flowPath], {
      encoding: 'utf-8',
    });

    expect(result.stderr).toBe('');
    expect(result.stdout).toBe(`✔ ${flowPath} is valid\n`);
    expect(result.status).toBe(0);
  });

  it('exits with the missing-file code', () => {
    const result = spawnSync(process.execPath, [BUILT_CLI, '--no-color', 'paths', join(dir, 'missing.json')], {
      encoding: 'utf-8',
    });

    expect(result.status).toBe(3);
  });
});
