import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { runCli, type CliIo } from '../src/main/cli';
import { resetLogger } from '../src/utils/logger';

const createIo = (env: NodeJS.ProcessEnv = {}) => {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIo = {
    stdout: (text) => {
      out.push(text);
    },
    stderr: (text) => {
      err.push(text);
    },
    env,
  };
  return { io, stdout: () => out.join(''), stderr: () => err.join('') };
};

const run = (args: string[], io: CliIo) => runCli(['node', 'dir-tree', ...args], io);

describe('dir-tree CLI', () => {
  let workspace: string;

  beforeAll(async () => {
    workspace = await fs.mkdtemp(path.join(os.tmpdir(), 'dir-tree-cli-'));
    await fs.mkdir(path.join(workspace, 'project', 'src', 'lib'), { recursive: true });
    await fs.writeFile(path.join(workspace, 'project', 'notes.md'), 'notes');
    await fs.writeFile(path.join(workspace, 'project', 'src', 'index.ts'), 'export {};');
    await fs.writeFile(path.join(workspace, 'project', 'src', 'lib', 'util.ts'), '');
  });

  afterAll(async () => {
    resetLogger();
    await fs.rm(workspace, { recursive: true, force: true });
  });

  afterEach(() => {
    resetLogger();
  });

  it('prints the tree as JSON on stdout', async () => {
    const { io, stdout } = createIo();

    const code = await run([path.join(workspace, 'project'), '--depth', '1', '--quiet'], io);

    expect(code).toBe(0);
    expect(stdout().endsWith('}\n')).toBe(true);
    expect(JSON.parse(stdout())).toEqual({
      'notes.md': { size: 5, modified_time: expect.any(Number) },
      src: {},
    });
  });

  it('descends without limit and formats metadata for humans', async () => {
    const { io, stdout } = createIo();

    const code = await run(
      [path.join(workspace, 'project'), '--depth=-1', '--human-readable', '--mime', '--quiet'],
      io,
    );

    expect(code).toBe(0);
    const tree = JSON.parse(stdout());
    expect(tree.src.lib['util.ts']).toEqual({
      size: '0 B',
      modified_time: expect.stringMatching(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}$/),
      mime_type: expect.any(String),
    });
    expect(tree['notes.md'].mime_type).toBe('text/markdown');
  });

  it('uses the indentation width requested', async () => {
    const { io, stdout } = createIo();

    await run([path.join(workspace, 'project', 'notes.md'), '--indent', '0', '--quiet'], io);

    expect(stdout()).toMatch(/^\{"notes\.md":\{"size":5,"modified_time":[\d.]+\}\}\n$/);
  });

  it('takes the depth from the environment when no flag is given', async () => {
    const { io, stdout } = createIo({ DIR_TREE_DEPTH: '0' });

    const code = await run([path.join(workspace, 'project'), '--quiet'], io);

    expect(code).toBe(0);
    expect(stdout()).toBe('{}\n');
  });

  it('writes the tree to a file with --output', async () => {
    const { io, stdout, stderr } = createIo();
    const target = path.join(workspace, 'out', 'tree.json');

    const code = await run([path.join(workspace, 'project'), '-o', target, '--quiet'], io);

    expect(code).toBe(0);
    expect(stdout()).toBe('');
    expect(stderr()).toContain(`Tree written to ${target}`);
    const written = JSON.parse(await fs.readFile(target, 'utf8'));
    expect(Object.keys(written)).toEqual(['notes.md', 'src']);
  });

  it('exits with 1 when the path does not exist', async () => {
    const { io, stdout, stderr } = createIo();
    const missing = path.join(workspace, 'missing');

    const code = await run([missing, '--quiet'], io);

    expect(code).toBe(1);
    expect(stdout()).toBe('');
    expect(stderr()).toContain(`Path does not exist: ${missing}`);
  });

  it('rejects a depth that is not an integer', async () => {
    const { io, stderr } = createIo();

    const code = await run([workspace, '--depth', 'two', '--quiet'], io);

    expect(code).toBe(1);
    expect(stderr()).toContain('Expected an integer.');
  });

  it('reports a depth below -1 as an error', async () => {
    const { io, stderr } = createIo();

    const code = await run([workspace, '--depth=-3', '--quiet'], io);

    expect(code).toBe(1);
    expect(stderr()).toContain("'depth' must be -1 (unlimited) or >= 0, got -3");
  });

  it('prints the package version', async () => {
    const { io, stdout } = createIo();

    const code = await run(['--version'], io);

    expect(code).toBe(0);
    expect(stdout()).toBe('1.0.0\n');
  });

  it('requires a path argument', async () => {
    const { io, stderr } = createIo();

    const code = await run([], io);

    expect(code).toBe(1);
    expect(stderr()).toContain("missing required argument 'path'");
  });
});
