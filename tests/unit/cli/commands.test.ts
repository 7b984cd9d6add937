/**
 * Tests for CLI Commands
 *
 * Runs the registered commands against the bundled engine content.
 *
 * @module tests/unit/cli/commands.test
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { registerCommands } from '../../../src/cli/commands/index.js';
import { parsePositiveInt } from '../../../src/cli/commands/helpers.js';
import { createTestContent, isolateEngineEnv } from '../../fixtures/engine-content.js';

// No rc file is ever found; engine content is still read from disk.
vi.mock('fs', async () => {
  const actual = await vi.importActual<typeof import('fs')>('fs');
  return {
    ...actual,
    existsSync: vi.fn(() => false),
  };
});

vi.mock('chalk', () => {
  const identity = (s: string) => s;
  return {
    default: {
      cyan: identity,
      green: identity,
      gray: identity,
      yellow: identity,
      red: identity,
      bold: identity,
    },
  };
});

function createProgram(): Command {
  const program = new Command();
  program
    .name('supportflow')
    .option('-c, --config <path>')
    .option('-f, --format <type>')
    .option('-q, --quiet')
    .option('--verbose')
    .exitOverride()
    .configureOutput({ writeErr: () => {}, writeOut: () => {} });
  registerCommands(program);
  return program;
}

async function run(...args: string[]): Promise<void> {
  await createProgram().parseAsync(['node', 'supportflow', ...args]);
}

describe('CLI Commands', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let restoreEnv: () => void;
  let savedLogLevel: string | undefined;

  const printed = (): string[] => logSpy.mock.calls.map(call => String(call[0]));

  beforeEach(() => {
    restoreEnv = isolateEngineEnv();
    savedLogLevel = process.env.LOG_LEVEL;
    delete process.env.LOG_LEVEL;
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    restoreEnv();
    if (savedLogLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = savedLogLevel;
    }
  });

  describe('registerCommands', () => {
    it('should register every command in order', () => {
      const names = createProgram().commands.map(cmd => cmd.name());
      expect(names).toEqual(['suggest', 'intent', 'next', 'ask', 'chat', 'validate', 'stats']);
    });

    it('should alias chat as i', () => {
      const chat = createProgram().commands.find(cmd => cmd.name() === 'chat');
      expect(chat?.aliases()).toEqual(['i']);
    });
  });

  describe('suggest', () => {
    it('should print completions as JSON', async () => {
      await run('-f', 'json', 'suggest', 'ord');
      expect(printed()).toEqual([
        JSON.stringify(['order', 'order status', 'order tracking', 'orders'], null, 2),
      ]);
    });

    it('should honour --limit', async () => {
      await run('-f', 'csv', 'suggest', 'ord', '--limit', '2');
      expect(printed()).toEqual(['rank,completion\n1,order\n2,order status']);
    });

    it('should report a prefix with no completions', async () => {
      await run('-f', 'table', 'suggest', 'zzz');
      expect(printed()).toEqual(['No completions for "zzz".']);
    });
  });

  describe('intent', () => {
    it('should resolve a phrase to its canonical intent', async () => {
      await run('-f', 'csv', 'intent', 'where is my package');
      expect(printed()).toEqual(['input,canonical,matched\nwhere is my package,track,where is my package']);
    });
  });

  describe('next', () => {
    it('should rank next actions with --top', async () => {
      await run('-f', 'csv', 'next', 'orders_menu', '-k', '2');
      expect(printed()).toEqual([
        'rank,label,target,weight\n1,Track Order,order_track,0.5\n2,Cancel Order,order_cancel,0.3',
      ]);
    });

    it('should exit with an error for an unknown node', async () => {
      await expect(run('next', 'nowhere')).rejects.toThrow('process.exit called');
      expect(errorSpy).toHaveBeenCalledWith('[ERROR] ✗ Dialogue node "nowhere" not found');
      expect(logSpy).not.toHaveBeenCalled();
    });

    it('should reject a non-positive --top', async () => {
      await expect(run('next', 'orders_menu', '-k', '0')).rejects.toMatchObject({
        code: 'commander.invalidArgument',
      });
    });
  });

  describe('ask', () => {
    it('should run messages as consecutive turns of one session', async () => {
      await run('-f', 'json', 'ask', 'orders', 'track', 'back');

      expect(logSpy).toHaveBeenCalledTimes(1);
      const turns: unknown = JSON.parse(printed()[0]);
      expect(turns).toMatchObject([
        { message: 'orders', reply: { kind: 'transition', currentNodeId: 'orders_menu', historySize: 1 } },
        { message: 'track', reply: { kind: 'transition', currentNodeId: 'order_track', isLeaf: true, historySize: 2 } },
        { message: 'back', reply: { kind: 'back', currentNodeId: 'orders_menu', historySize: 1 } },
      ]);
    });
  });

  describe('stats', () => {
    it('should print statistics of the bundled content', async () => {
      await run('-f', 'csv', 'stats');
      expect(printed()).toEqual([[
        'metric,value',
        'vocabularySize,60',
        'synonymPhrases,27',
        'synonymGroups,5',
        'dialogueNodes,21',
        'suggestionEdges,25',
        'directAnswers,4',
        'activeSessions,0',
      ].join('\n')]);
    });
  });

  describe('validate', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'supportflow-cli-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should validate a content file quietly', async () => {
      const file = join(dir, 'engine.json');
      writeFileSync(file, JSON.stringify(createTestContent()));

      await run('-q', '-f', 'json', 'validate', file);

      expect(logSpy).toHaveBeenCalledTimes(1);
      expect(JSON.parse(printed()[0])).toMatchObject({
        file,
        valid: true,
        stats: { dialogueNodes: 6, vocabularySize: 5, suggestionEdges: 5 },
        warnings: [],
      });
    });

    it('should announce the loaded file unless quiet', async () => {
      const file = join(dir, 'engine.json');
      writeFileSync(file, JSON.stringify(createTestContent()));

      await run('-f', 'csv', 'validate', file);

      expect(printed()).toEqual([`✓ Loaded ${file}`, 'kind,nodeId,detail']);
    });

    it('should exit with an error for a file that is not JSON', async () => {
      const file = join(dir, 'broken.json');
      writeFileSync(file, '{ nope');

      await expect(run('validate', file)).rejects.toThrow('process.exit called');
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('parsePositiveInt', () => {
    it('should parse positive integers', () => {
      expect(parsePositiveInt('3')).toBe(3);
    });

    it('should reject zero, negatives and fractions', () => {
      expect(() => parsePositiveInt('0')).toThrow('Expected a positive integer.');
      expect(() => parsePositiveInt('-2')).toThrow('Expected a positive integer.');
      expect(() => parsePositiveInt('1.5')).toThrow('Expected a positive integer.');
    });
  });
});
