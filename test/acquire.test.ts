import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { createServer, type Server } from 'node:http';
import { chmod, mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { acquire, localCandidates, releaseUrl } from '../src/acquire.js';
import { AcquisitionError, ExtractionError } from '../src/errors.js';
import { resolveTargets } from '../src/targets.js';

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
const [linuxAmd64] = resolveTargets('tool', ['linux-amd64']);
const [windowsAmd64] = resolveTargets('tool', ['windows-amd64']);
const quiet = () => {};

describe('acquire', () => {
  const tmp = join(tmpdir(), `wheelwright-acquire-${Date.now()}`);
  const bins = join(tmp, 'bins');
  const requests: string[] = [];
  let server: Server;
  let host: string;

  before(async () => {
    await mkdir(join(bins, 'tool_linux_amd64'), { recursive: true });
    await writeFile(join(bins, 'tool_linux_amd64', 'tool'), 'linux binary');
    await chmod(join(bins, 'tool_linux_amd64', 'tool'), 0o644);
    await mkdir(join(bins, 'tool_windows_amd64_v1'), { recursive: true });
    await writeFile(join(bins, 'tool_windows_amd64_v1', 'tool.exe'), 'windows binary');

    const tarball = await readFile(fixture('release.tar.gz'));
    const zip = await readFile(fixture('release.zip'));
    server = createServer((req, res) => {
      const url = req.url ?? '/';
      requests.push(url);
      if (url === '/example-org/tool/releases/download/v1.2.3/tool_1.2.3_linux_amd64.tar.gz') {
        res.writeHead(200, { 'Content-Type': 'application/gzip' });
        res.end(tarball);
      } else if (url === '/example-org/tool/releases/download/v1.2.3/tool_1.2.3_windows_amd64.zip') {
        res.writeHead(200, { 'Content-Type': 'application/zip' });
        res.end(zip);
      } else {
        res.writeHead(404);
        res.end('Not Found');
      }
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server has no port');
    host = `http://127.0.0.1:${address.port}`;
  });

  after(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
    await rm(tmp, { recursive: true });
  });

  it('should build the release download URL', () => {
    const url = releaseUrl({ host: 'https://github.com', repo: 'example-org/tool', name: 'tool', version: '1.2.3' }, linuxAmd64);
    assert.strictEqual(url, 'https://github.com/example-org/tool/releases/download/v1.2.3/tool_1.2.3_linux_amd64.tar.gz');
  });

  it('should list local candidates in search order', () => {
    assert.deepStrictEqual(localCandidates('/bins', 'tool', windowsAmd64), [
      join('/bins', 'tool_windows_amd64', 'tool.exe'),
      join('/bins', 'tool_windows_amd64_v1', 'tool.exe'),
      join('/bins', 'tool.exe'),
    ]);
  });

  it('should copy a local binary and make it owner-executable', async () => {
    const scratchDir = join(tmp, 'local-linux');
    const acquired = await acquire(linuxAmd64, {
      name: 'tool', version: '1.2.3', repo: 'example-org/tool', host, scratchDir, binariesDir: bins, log: quiet,
    });
    assert.strictEqual(acquired.path, join(scratchDir, 'bin', 'tool'));
    assert.strictEqual(await readFile(acquired.path, 'utf8'), 'linux binary');
    assert.strictEqual((await stat(acquired.path)).mode & 0o100, 0o100);
  });

  it('should fall through to the _v1 directory', async () => {
    const acquired = await acquire(windowsAmd64, {
      name: 'tool', version: '1.2.3', repo: 'example-org/tool', host, scratchDir: join(tmp, 'local-win'), binariesDir: bins, log: quiet,
    });
    assert.strictEqual(await readFile(acquired.path, 'utf8'), 'windows binary');
  });

  it('should list every searched path when no local binary exists', async () => {
    const [darwinArm64] = resolveTargets('tool', ['darwin-arm64']);
    await assert.rejects(
      acquire(darwinArm64, {
        name: 'tool', version: '1.2.3', repo: 'example-org/tool', host, scratchDir: join(tmp, 'local-missing'), binariesDir: bins, log: quiet,
      }),
      (err: unknown) => {
        assert.ok(err instanceof AcquisitionError);
        assert.deepStrictEqual(err.searched, localCandidates(bins, 'tool', darwinArm64));
        assert.strictEqual(
          err.message,
          `Binary not found for darwin/arm64. Searched:\n${err.searched.map(p => `  ${p}`).join('\n')}`,
        );
        return true;
      },
    );
  });

  it('should download and extract a tar.gz release', async () => {
    const acquired = await acquire(linuxAmd64, {
      name: 'tool', version: '1.2.3', repo: 'example-org/tool', host, scratchDir: join(tmp, 'remote-linux'), log: quiet,
    });
    assert.strictEqual(await readFile(acquired.path, 'utf8'), 'first\n');
    assert.strictEqual((await stat(acquired.path)).mode & 0o111, 0o111);
    assert.ok(requests.includes('/example-org/tool/releases/download/v1.2.3/tool_1.2.3_linux_amd64.tar.gz'));
  });

  it('should download and extract a zip release', async () => {
    const acquired = await acquire(windowsAmd64, {
      name: 'tool', version: '1.2.3', repo: 'example-org/tool', host, scratchDir: join(tmp, 'remote-win'), log: quiet,
    });
    assert.strictEqual(acquired.path, join(tmp, 'remote-win', 'bin', 'tool.exe'));
    assert.strictEqual(await readFile(acquired.path, 'utf8'), 'first\n');
  });

  it('should fail with the status when the release is missing', async () => {
    await assert.rejects(
      acquire(linuxAmd64, {
        name: 'tool', version: '9.9.9', repo: 'example-org/tool', host, scratchDir: join(tmp, 'remote-404'), log: quiet,
      }),
      (err: unknown) => {
        assert.ok(err instanceof AcquisitionError);
        assert.strictEqual(err.status, 404);
        assert.strictEqual(err.url, `${host}/example-org/tool/releases/download/v9.9.9/tool_9.9.9_linux_amd64.tar.gz`);
        return true;
      },
    );
  });

  it('should fail when the host is unreachable', async () => {
    await assert.rejects(
      acquire(linuxAmd64, {
        name: 'tool', version: '1.2.3', repo: 'example-org/tool', host: 'http://127.0.0.1:1', scratchDir: join(tmp, 'remote-down'), log: quiet,
      }),
      AcquisitionError,
    );
  });

  it('should surface a missing member as an extraction error', async () => {
    await assert.rejects(
      acquire({ ...linuxAmd64, binaryName: 'absent' }, {
        name: 'tool', version: '1.2.3', repo: 'example-org/tool', host, scratchDir: join(tmp, 'remote-absent'), log: quiet,
      }),
      ExtractionError,
    );
  });
});
