import { TestCase } from '@trialrun/harness';
import { createMockLogger } from '@trialrun/logger/mock';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Writable } from 'node:stream';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { executeRun, formatDuration, formatSummary, getExitCode, type RunSettings } from '../src/runner/index.js';

class Collector extends Writable {
  readonly chunks: string[] = [];

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: () => void): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  text(): string {
    return this.chunks.join('');
  }
}

class BrokenPipe extends Writable {
  override _write(_chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    callback(new Error('EPIPE: broken pipe'));
  }
}

function fixture(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

class BrokenSetup extends TestCase {
  protected override setup(): void {
    throw new Error('database offline');
  }
}

const settings: RunSettings = {
  format: 'text',
  durations: false,
  color: false,
  environment: 'production',
};

describe('executeRun', () => {
  let root: string;
  let stdout: Collector;
  let stderr: Collector;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'trialrun-run-'));
    fs.writeFileSync(path.join(root, 'math.cases.js'), '');
    fs.writeFileSync(path.join(root, 'text.cases.js'), '');
    stdout = new Collector();
    stderr = new Collector();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function importer(modules: Record<string, unknown>) {
    return async (url: string) => modules[url];
  }

  function urlOf(name: string): string {
    return pathToFileURL(path.join(root, name)).href;
  }

  it('exports every suite as text and exits 1 on failures', async () => {
    const math = new TestCase({ name: 'math' });
    math.register(() => {}, 'adds');
    math.register(() => math.fail(), 'divides');
    const text = new TestCase({ name: 'text' });
    text.register(() => {}, 'joins');

    const code = await executeRun([root], settings, {
      stdout,
      stderr,
      importer: importer({ [urlOf('math.cases.js')]: { math }, [urlOf('text.cases.js')]: { default: text } }),
    });

    expect(code).toBe(1);
    expect(stdout.text()).toBe('[PASSED] adds\n[FAILED] divides\n[PASSED] joins\n');
    expect(stderr.text()).toContain('  2 passing (');
    expect(stderr.text()).toContain('  1 failing\n');
  });

  it('wraps several suites in one XML document and exits 0', async () => {
    const math = new TestCase({ name: 'math' });
    math.register(() => {}, 'adds');
    const text = new TestCase({ name: 'text' });
    text.register(() => {}, 'joins');

    const code = await executeRun([root], { ...settings, format: 'xml' }, {
      stdout,
      stderr,
      importer: importer({ [urlOf('math.cases.js')]: { math }, [urlOf('text.cases.js')]: { text } }),
    });

    expect(code).toBe(0);
    expect(stdout.text()).toBe(
      [
        '<?xml version="1.0" encoding="utf-8"?>',
        '<test-results>',
        '  <test-case>',
        '    <test result="passed" name="adds"/>',
        '  </test-case>',
        '  <test-case>',
        '    <test result="passed" name="joins"/>',
        '  </test-case>',
        '</test-results>',
        '',
      ].join('\n'),
    );
  });

  it('writes to the output file when one is given', async () => {
    const suite = new TestCase({ name: 'math' });
    suite.register(() => {}, 'adds');
    const output = path.join(root, 'results.log');

    const code = await executeRun([path.join(root, 'math.cases.js')], { ...settings, output }, {
      stdout,
      stderr,
      importer: importer({ [urlOf('math.cases.js')]: { suite } }),
    });

    expect(code).toBe(0);
    expect(stdout.text()).toBe('');
    expect(fs.readFileSync(output, 'utf-8')).toBe('[PASSED] adds\n');
  });

  it('exits 2 when a lifecycle hook fails and still exports the suite', async () => {
    const broken = new BrokenSetup({ name: 'broken' });
    broken.register(() => {}, 'never runs');
    const logger = createMockLogger();

    const code = await executeRun([path.join(root, 'math.cases.js')], settings, {
      stdout,
      stderr,
      logger,
      importer: importer({ [urlOf('math.cases.js')]: { broken } }),
    });

    expect(code).toBe(2);
    expect(stdout.text()).toBe('[FAILED] never runs\n');
    expect(stderr.text()).toContain("  1 errors\n    broken: setup failed for test case 'broken': database offline\n");
    expect(logger.error).toHaveBeenCalledWith('suite_lifecycle_failed', {
      suite: 'broken',
      phase: 'setup',
      error: expect.any(Error),
    });
  });

  it('runs real modules through the default importer', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'trialrun-real-'));
    fs.copyFileSync(fixture('bundled.cases.mjs'), path.join(dir, 'bundled.cases.mjs'));

    try {
      const code = await executeRun([dir], settings, { stdout, stderr, logger: createMockLogger() });

      expect(code).toBe(1);
      expect(stdout.text()).toBe('[PASSED] adds\n[FAILED] divides\n');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('warns when modules export no test cases', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'trialrun-helpers-'));
    fs.copyFileSync(fixture('helpers.cases.mjs'), path.join(dir, 'helpers.cases.mjs'));
    const logger = createMockLogger();

    try {
      const code = await executeRun([dir], settings, { stdout, stderr, logger });

      expect(code).toBe(0);
      expect(stdout.text()).toBe('');
      expect(stderr.text()).toBe('Warning: no test cases exported by 1 test module(s)\n');
      expect(logger.warn).toHaveBeenCalledWith('no_test_cases_found', { modules: 1 });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('exits 2 when the results cannot be written', async () => {
    const suite = new TestCase({ name: 'math' });
    suite.register(() => {}, 'adds');
    const logger = createMockLogger();

    const code = await executeRun([path.join(root, 'math.cases.js')], settings, {
      stdout: new BrokenPipe(),
      stderr,
      logger,
      importer: importer({ [urlOf('math.cases.js')]: { suite } }),
    });

    expect(code).toBe(2);
    expect(stderr.text()).toBe('Error: Cannot write output stream: EPIPE: broken pipe\n');
    expect(logger.error).toHaveBeenCalledWith('export_failed', { error: expect.any(Error) });
  });

  it('reports when there is nothing to run', async () => {
    const empty = fs.mkdtempSync(path.join(os.tmpdir(), 'trialrun-empty-'));

    try {
      const code = await executeRun([empty], settings, { stdout, stderr });

      expect(code).toBe(0);
      expect(stderr.text()).toBe('No test modules found\n');
    } finally {
      fs.rmSync(empty, { recursive: true, force: true });
    }
  });
});

describe('formatSummary', () => {
  const summary = { total: 3, passed: 2, failed: 1, duration: 1.5 };

  it('prints passing and failing counts', () => {
    expect(
      formatSummary([{ name: 'math', file: '/m.cases.js', hadFailure: true, summary }], { color: false }),
    ).toEqual(['', '  2 passing (1.50s)', '  1 failing', '']);
  });

  it('omits the failing line when everything passed', () => {
    const clean = { total: 1, passed: 1, failed: 0, duration: 0.012 };

    expect(
      formatSummary([{ name: 'math', file: '/m.cases.js', hadFailure: false, summary: clean }], { color: false }),
    ).toEqual(['', '  1 passing (12ms)', '']);
  });
});

describe('formatDuration', () => {
  it('switches from milliseconds to seconds at one second', () => {
    expect(formatDuration(999)).toBe('999ms');
    expect(formatDuration(1000)).toBe('1.00s');
  });
});

describe('getExitCode', () => {
  const summary = { total: 0, passed: 0, failed: 0, duration: 0 };

  it('maps runs to exit codes', () => {
    expect(getExitCode([])).toBe(0);
    expect(getExitCode([{ name: 'a', file: 'a', hadFailure: true, summary }])).toBe(1);
  });
});
