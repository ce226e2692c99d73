import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { executeCommand } from '@hls-kit/utils';

const launcherPath = fileURLToPath(new URL('../bin/hls-kit.mjs', import.meta.url));
const repoRoot = fileURLToPath(new URL('../../../', import.meta.url));

describe('hls-kit executable', () => {
  it('prints parseable JSON on stdout while logs go to stderr', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'hls-kit-cli-'));
    const input = join(dir, 'input.mkv');
    await writeFile(input, 'not really media');

    const result = await executeCommand(process.execPath, [launcherPath, 'analyze', input, '--json'], {
      cwd: repoRoot,
      env: {
        ...process.env,
        LOG_LEVEL: 'info',
        NODE_ENV: 'production',
        FFPROBE_PATH: join(dir, 'missing-ffprobe'),
      },
      timeout: 30000,
    });

    expect(result.exitCode).toBe(0);
    const output: unknown = JSON.parse(result.stdout);
    expect(output).toMatchObject({ recommended: ['480p', '720p'], profiles: [] });
    expect(result.stderr).toContain('"component":"media-analyzer"');
  }, 40000);
});
