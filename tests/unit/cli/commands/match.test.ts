/**
 * Tests for the match command.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { createMatchCommand } from '../../../../src/cli/commands/match.js';
import { prepareContext } from '../../../../src/cli/commands/setup.js';
import { logger } from '../../../../src/utils/logger.js';
import { builtinContext } from '../../../helpers/cli-context.js';

vi.mock('../../../../src/cli/commands/setup.js', () => ({
  prepareContext: vi.fn(),
}));

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    error: vi.fn(),
    success: vi.fn(),
    fail: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    cyan: (s: string) => s,
    dim: (s: string) => s,
    red: (s: string) => s,
  },
}));

describe('match command', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let processExitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(prepareContext).mockResolvedValue(builtinContext());
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  it('should print the match tree', async () => {
    await createMatchCommand().parseAsync(['node', 'test', 'tsql', 'DROP USER Bob']);

    expect(consoleLogSpy).toHaveBeenCalledWith(
      [
        'statement (StatementSegment)',
        '  drop_statement (DropStatementSegment)',
        '    keyword: "DROP"',
        '    keyword: "USER"',
        '    table_reference (TableReferenceSegment)',
        '      identifier: "Bob"',
      ].join('\n')
    );
    expect(processExitSpy).not.toHaveBeenCalled();
  });

  it('should report where matching stopped', async () => {
    await expect(createMatchCommand().parseAsync(['node', 'test', 'ansi', 'DROP USER Bob'])).rejects.toThrow(
      'process.exit called'
    );

    expect(logger.fail).toHaveBeenCalledWith(
      "StatementSegment does not match in ansi: expected TABLE or VIEW at 'USER' (offset 5)"
    );
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });

  it('should report a premature end of input', async () => {
    await expect(createMatchCommand().parseAsync(['node', 'test', 'ansi', 'DROP TABLE'])).rejects.toThrow(
      'process.exit called'
    );

    expect(logger.fail).toHaveBeenCalledWith(
      'StatementSegment does not match in ansi: expected naked_identifier or quoted_identifier at end of input'
    );
  });

  it('should match the rule given with --rule', async () => {
    await createMatchCommand().parseAsync(['node', 'test', 'ansi', 'DROP TABLE t; USE db', '--rule', 'FileSegment']);

    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringMatching(/^file \(FileSegment\)/));
  });

  it('should use the configured entry rule', async () => {
    vi.mocked(prepareContext).mockResolvedValue(builtinContext({ entry_rule: 'UseStatementSegment' }));

    await createMatchCommand().parseAsync(['node', 'test', 'ansi', 'USE db']);

    expect(consoleLogSpy).toHaveBeenCalledWith('use_statement (UseStatementSegment)\n  keyword: "USE"\n  identifier: "db"');
  });

  it('should output JSON', async () => {
    await createMatchCommand().parseAsync(['node', 'test', 'tsql', 'GO 5', '--json']);

    const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
    expect(output).toMatchObject({ dialect: 'tsql', rule: 'StatementSegment', ok: true, pos: 2 });
  });

  it('should apply the configured depth limit', async () => {
    vi.mocked(prepareContext).mockResolvedValue(builtinContext({ max_depth: 1 }));

    await expect(createMatchCommand().parseAsync(['node', 'test', 'ansi', 'USE db'])).rejects.toThrow(
      'process.exit called'
    );

    expect(logger.error).toHaveBeenCalledWith(expect.stringContaining('Maximum grammar depth (1) exceeded'));
  });
});
