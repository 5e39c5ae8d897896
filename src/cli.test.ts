import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { parseCliArgs, runCli } from './cli';
import { rosterWorkbookBuffer, withHeaderFooter } from './utils/testFactories';

describe('parseCliArgs', () => {
  it('collects inputs and options', () => {
    expect(parseCliArgs(['a.xlsx', '-o', 'out', 'b.xlsx', '--separator', '|'])).toEqual({
      inputs: ['a.xlsx', 'b.xlsx'],
      outDir: 'out',
      separator: '|',
      help: false
    });
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow();
  });
});

describe('runCli', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'roster-cli-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('prints usage on request', async () => {
    await expect(runCli(['--help'])).resolves.toBe(0);
  });

  it('treats a missing input as a usage error', async () => {
    await expect(runCli([])).resolves.toBe(2);
    await expect(runCli(['--nope'])).resolves.toBe(2);
  });

  it('writes a report per input and fails the run when one input fails', async () => {
    const inputPath = path.join(tempDir, 'roster.xlsx');
    const outDir = path.join(tempDir, 'out');
    await fs.writeFile(
      inputPath,
      await withHeaderFooter(
        rosterWorkbookBuffer([
          'Medic 10',
          { name: 'Ava Park', code: 'STWEP', from: '06:00', through: '18:00', hours: 12 },
          { name: 'Ben Ode', code: 'STWEA', from: '06:00', through: '18:00', hours: 12 }
        ]),
        '&amp;C[03/05/2024]',
        '&amp;C03/05/2024 05:45:10'
      )
    );

    await expect(runCli([inputPath, '--out-dir', outDir])).resolves.toBe(0);
    await expect(fs.readdir(outDir)).resolves.toEqual(['On_Duty_Roster_03-05-2024.xlsx']);

    await expect(runCli([inputPath, path.join(tempDir, 'missing.xlsx'), '-o', outDir])).resolves.toBe(1);
  });
});
