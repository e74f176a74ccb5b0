import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { composeSourceMapFiles, composeSourceMaps } from '../src/compose.js';
import { readSourceMapFile } from '../src/utils/file.js';
import { parseSourceMap, type SourceMapV3 } from '../src/utils/source-map.js';
import { relativizeSourcePath } from '../src/utils/paths.js';
import { silenceConsole } from './utils.js';

const fixturesDir = fileURLToPath(new URL('./fixtures', import.meta.url));

const composed: SourceMapV3 = {
  version: 3,
  file: 'app.min.js',
  sources: ['src/main.src', 'src/util.src'],
  lineCount: 1,
  mappings: 'AAAAA,UACI',
  names: ['main'],
};

function fixture(name: string): SourceMapV3 {
  const map = readSourceMapFile(join(fixturesDir, name));
  if (!map) throw new Error(`Missing fixture ${name}`);
  return map;
}

describe('composeSourceMaps', () => {
  it('maps original sources straight to the optimized output', () => {
    const result = composeSourceMaps(fixture('app.js.map'), fixture('app.min.js.map'));

    expect(result).toEqual({ map: composed, kept: 2, dropped: 1 });
  });

  it('applies file, lineCount and relativizer overrides', () => {
    const { map } = composeSourceMaps(fixture('app.js.map'), fixture('app.min.js.map'), {
      file: 'bundle.js',
      lineCount: 40,
      relativize: relativizeSourcePath(),
    });

    expect(map.file).toBe('bundle.js');
    expect(map.lineCount).toBe(40);
    expect(map.sources).toEqual(['main.src', 'util.src']);
  });
});

describe('composeSourceMapFiles', () => {
  let outDir: string;
  let output: ReturnType<typeof silenceConsole>;

  beforeEach(() => {
    outDir = mkdtempSync(join(tmpdir(), 'sourcemap-compose-'));
    output = silenceConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(outDir, { recursive: true, force: true });
  });

  it('writes the composed map and logs it', () => {
    const result = composeSourceMapFiles({
      cwd: fixturesDir,
      sourceMapPath: 'app.js.map',
      optimizedMapPath: 'app.min.js.map',
      outputPath: join(outDir, 'maps', 'app.min.js.map'),
    });

    const outputPath = join(outDir, 'maps', 'app.min.js.map');
    expect(result).toEqual({ map: composed, kept: 2, dropped: 1, outputPath });

    const written = readFileSync(outputPath, 'utf8');
    expect(written.startsWith('{\n  "version": 3,')).toBe(true);
    expect(parseSourceMap(written)).toEqual(composed);
    expect(output.log).toHaveBeenCalledTimes(1);
  });

  it('writes compact JSON when pretty printing is off', () => {
    const outputPath = join(outDir, 'app.min.js.map');
    composeSourceMapFiles({
      cwd: fixturesDir,
      sourceMapPath: 'app.js.map',
      optimizedMapPath: 'app.min.js.map',
      outputPath,
      prettyPrint: false,
    });

    expect(readFileSync(outputPath, 'utf8')).toBe(JSON.stringify(composed) + '\n');
  });

  it('skips a missing input', () => {
    const result = composeSourceMapFiles({
      cwd: fixturesDir,
      sourceMapPath: 'missing.js.map',
      optimizedMapPath: 'app.min.js.map',
      outputPath: join(outDir, 'app.min.js.map'),
    });

    expect(result).toBeNull();
    expect(output.warn).toHaveBeenCalledTimes(1);
    expect(readSourceMapFile(join(outDir, 'app.min.js.map'))).toBeNull();
  });

  it('logs and skips an invalid map', () => {
    const result = composeSourceMapFiles({
      cwd: fixturesDir,
      sourceMapPath: 'legacy.js.map',
      optimizedMapPath: 'app.min.js.map',
      outputPath: join(outDir, 'legacy.min.js.map'),
      scope: 'legacy',
    });

    expect(result).toBeNull();
    expect(output.error).toHaveBeenCalled();
    expect(String(output.error.mock.calls[0][0])).toContain('Could not compose');
  });
});
