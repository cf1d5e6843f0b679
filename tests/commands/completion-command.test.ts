import { describe, it, before, after, mock } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { Command } from 'commander';
import { completeLine, setupCompletionCommand } from '../../src/commands/completion.js';
import { collect } from '../../src/commands/global-options.js';
import { logger, parseLogLevel } from '../../src/utils/logger.js';
import { LogLevel } from '../../src/types/index.js';
import { renderBashCompletionScript } from '../../src/core/completion/bash-script.js';
import { makeTempDir, removeTempDir } from '../test-helpers.js';

describe('completion command', () => {
  let dir: string;
  let settings: string;

  before(async () => {
    dir = await makeTempDir('completion');
    settings = join(dir, 'lpkgm-settings.json');
    await writeFile(settings, JSON.stringify({
      root: 'tree',
      definitions: { platform: 'el9' },
      packages: {
        zlib: {
          'version-regex': ['\\d+\\.\\d+'],
          versions: ['1.3', '1.2'],
          source: '/src/zlib',
          build: { commands: ['make install'] }
        }
      }
    }));
    await mkdir(join(dir, 'tree', 'el9', '.packages'), { recursive: true });
    await mkdir(join(dir, 'tree', 'el8', '.packages'), { recursive: true });
  });

  after(async () => {
    await removeTempDir(dir);
  });

  it('completes from the settings, using their platform by default', async () => {
    assert.deepEqual(await completeLine('lpkgm install ', undefined, { settings }, dir), ['zlib']);
    assert.deepEqual(await completeLine('lpkgm add zlib ', undefined, { settings }, dir), ['1.3', '1.2']);
  });

  it('lists platforms found under the root', async () => {
    assert.deepEqual(await completeLine('lpkgm -Dplatform=', undefined, { settings }, dir), ['el8', 'el9']);
  });

  it('completes at the given point', async () => {
    const line = 'lpkgm install z 1.3';
    assert.deepEqual(await completeLine(line, line.indexOf(' z') + 2, { settings }, dir), ['zlib']);
  });

  it('still completes settings files when the settings cannot be loaded', async () => {
    const missing = join(dir, 'missing.json');
    assert.deepEqual(await completeLine('lpkgm -c ', undefined, { settings: missing }, dir), ['lpkgm-settings.json']);
    assert.deepEqual(await completeLine('lpkgm install ', undefined, { settings: missing }, dir), []);
  });

  it('writes only candidates to stdout while debug logging is on', async () => {
    const written: string[] = [];
    const logged: string[] = [];
    const program = new Command()
      .name('lpkgm')
      .option('-c, --settings <path>')
      .option('-D, --define <key=value>', 'definition', collect, []);
    setupCompletionCommand(program, { write: (text: string) => written.push(text) });

    const previousLevel = logger.getLevel();
    logger.setLevel(parseLogLevel('debug') ?? LogLevel.DEBUG);
    const consoleError = mock.method(console, 'error', (...args: unknown[]) => {
      logged.push(args.map(String).join(' '));
    });
    try {
      await program.parseAsync(['-c', settings, 'completion', '--line', 'lpkgm install z'], { from: 'user' });
    } finally {
      consoleError.mock.restore();
      logger.setLevel(previousLevel);
    }

    assert.deepEqual(written, ['zlib\n']);
    assert.ok(logged.some(line => line.includes('[DEBUG] Completion context')));
  });

  it('renders a bash completion function bound to the program', () => {
    const script = renderBashCompletionScript();
    assert.ok(script.includes('_lpkgm_completions() {'));
    assert.ok(script.includes('lpkgm completion --line "$COMP_LINE" --point "$COMP_POINT"'));
    assert.ok(script.endsWith('complete -o default -F _lpkgm_completions lpkgm\n'));
  });
});
