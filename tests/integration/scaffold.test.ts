/**
 * End-to-end workflow tests: scaffold, populate, validate.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { createCli } from '../../src/cli/index.js';
import { EXAMPLE_MARKER } from '../../src/core/templates/defaults.js';
import { logger } from '../../src/utils/logger.js';

class ExitError extends Error {
  constructor(readonly code: number | string | null | undefined) {
    super(`process.exit(${String(code)})`);
  }
}

async function modkit(...args: string[]): Promise<void> {
  await createCli().exitOverride().parseAsync(['node', 'modkit', ...args]);
}

describe('E2E scaffolding workflows', () => {
  let tempDir: string;
  let logSpy: MockInstance<typeof console.log>;
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'modkit-e2e-'));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new ExitError(code);
    });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
    logger.setVerbosity('default');
  });

  it('should scaffold a concept with comments and examples by default', async () => {
    await modkit('--concept', 'My First Concept', '--target-dir', tempDir);

    expect(await fs.readdir(tempDir)).toEqual(['con_my-first-concept.adoc']);
    const lines = (await fs.readFile(path.join(tempDir, 'con_my-first-concept.adoc'), 'utf-8')).split('\n');
    expect(lines[0]).toBe(':_mod-docs-content-type: CONCEPT');
    expect(lines).toContain('// * file name: con_my-first-concept.adoc');
    expect(lines).toContain('[id="con_my-first-concept_{context}"]');
    expect(lines).toContain(EXAMPLE_MARKER);
  });

  it('should populate an assembly with the other modules in order', async () => {
    await modkit('--concept', 'Alpha', '--procedure', 'Beta', '--include-in', 'My Assembly', '-T', tempDir);

    expect((await fs.readdir(tempDir)).sort()).toEqual([
      'assembly_my-assembly.adoc',
      'con_alpha.adoc',
      'proc_beta.adoc',
    ]);
    const assembly = await fs.readFile(path.join(tempDir, 'assembly_my-assembly.adoc'), 'utf-8');
    const alpha = assembly.indexOf('include::modules/con_alpha.adoc[leveloffset=+1]');
    const beta = assembly.indexOf('include::modules/proc_beta.adoc[leveloffset=+1]');
    expect(alpha).toBeGreaterThan(-1);
    expect(beta).toBeGreaterThan(alpha);
  });

  it('should report a badly named file and exit 0', async () => {
    await modkit('--validate', 'bad_Name.txt');

    expect(exitSpy).not.toHaveBeenCalled();
    const report = logSpy.mock.calls.map((call) => call.join(' ')).join('\n');
    expect(report).toContain('N002 lowercase');
    expect(report).toContain('N005 extension');
    expect(report).toContain('Total files: 1');
  });

  it('should exit 1 for a badly named file with --fail-on-invalid', async () => {
    await expect(modkit('--validate', 'bad_Name.txt', '--fail-on-invalid')).rejects.toBeInstanceOf(ExitError);
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('should pass validation of files it just generated', async () => {
    const assembly = path.join(tempDir, 'assembly_guide.adoc');
    const snippet = path.join(tempDir, 'snip_shared-note.adoc');

    await modkit('-s', 'Shared Note', '-i', 'Guide', '-T', tempDir, '-l', assembly, '-l', snippet, '--fail-on-invalid');

    expect(exitSpy).not.toHaveBeenCalled();
    const report = logSpy.mock.calls.map((call) => call.join(' ')).join('\n');
    expect(report).toContain('Total files: 2');
    expect(report).not.toContain('ERRORS');
  });

  it('should keep edited files unless --overwrite is given', async () => {
    const filePath = path.join(tempDir, 'ref_options.adoc');
    await modkit('-r', 'Options', '-T', tempDir);
    await fs.writeFile(filePath, 'edited\n');

    await modkit('-r', 'Options', '-T', tempDir);
    expect(await fs.readFile(filePath, 'utf-8')).toBe('edited\n');

    await modkit('-r', 'Options', '-T', tempDir, '--overwrite');
    expect(await fs.readFile(filePath, 'utf-8')).not.toBe('edited\n');
  });

  it('should exit 1 without writing when the populated assembly reuses an assembly id', async () => {
    await expect(modkit('-a', 'Guide', '-c', 'Alpha', '-i', 'Guide', '-T', tempDir)).rejects.toBeInstanceOf(ExitError);

    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it('should write nothing on a dry run', async () => {
    await modkit('-c', 'Alpha', '-i', 'Guide', '-T', tempDir, '--dry-run');

    expect(await fs.readdir(tempDir)).toEqual([]);
  });
});
