import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

vi.mock('../../src/ui/logger.js', () => ({
  logger: {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    header: vi.fn(),
    dim: vi.fn(),
    fileCreated: vi.fn(),
    fileModified: vi.fn(),
  },
}));

vi.mock('../../src/ui/spinner.js', () => ({
  withSpinner: vi.fn(async (_text: string, fn: () => Promise<unknown>) => fn()),
}));

vi.mock('../../src/ui/prompts.js', () => ({
  requireConfirmation: vi.fn(),
}));

import { planCommand } from '../../src/commands/plan.js';
import { tomlCodec } from '../../src/core/codecs.js';
import { logger } from '../../src/ui/logger.js';
import { requireConfirmation } from '../../src/ui/prompts.js';
import { UserCancelledError } from '../../src/utils/errors.js';
import { createProject, removeProject } from '../unit/helpers/project-fixture.js';

const PYPROJECT = '[project]\nname = "demo"\n\n[tool.bandit]\nskips = ["B101"]\n';

describe('plan flow (e2e)', () => {
  let root: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    root = await createProject({ 'pyproject.toml': PYPROJECT });
  });

  afterEach(async () => {
    await removeProject(root);
  });

  it('should preview without writing by default', async () => {
    const result = await planCommand(root, { tools: 'bandit, safety' });

    expect(result.tools).toEqual(['bandit', 'safety']);
    expect(result.changes).toHaveLength(1);
    expect(result.changes[0].description).toBe(
      'Integrate Bandit security linter configuration; Integrate Safety dependency vulnerability scanner configuration',
    );
    expect(result.changes[0].conflicts).toEqual(['tool.bandit.skips: kept existing value']);
    expect(result.written).toBeNull();
    await expect(readFile(join(root, 'pyproject.toml'), 'utf-8')).resolves.toBe(PYPROJECT);
  });

  it('should write after confirmation and become a no-op on the next run', async () => {
    const first = await planCommand(root, { tools: 'bandit,safety', write: true });

    expect(requireConfirmation).toHaveBeenCalledWith('Apply 1 change(s)?');
    expect(first.written).toEqual({ created: [], modified: [join(root, 'pyproject.toml')], backups: [] });

    const parsed = tomlCodec.parse(await readFile(join(root, 'pyproject.toml'), 'utf-8'));
    expect(parsed.ok && parsed.value.tool).toEqual({
      bandit: {
        skips: ['B101'],
        exclude_dirs: ['tests', 'test_*'],
        assert_used: { skips: ['*_test.py', 'test_*.py'] },
      },
      safety: { ignore: [], full_report: true, output: 'json', continue_on_error: false },
    });

    const second = await planCommand(root, { tools: 'bandit,safety', write: true });
    expect(second.changes).toEqual([]);
    expect(second.written).toBeNull();
    expect(logger.success).toHaveBeenCalledWith('No changes needed');
  });

  it('should skip the prompt with --yes', async () => {
    await planCommand(root, { tools: 'ruff', write: true, yes: true });
    expect(requireConfirmation).not.toHaveBeenCalled();
  });

  it('should leave files alone when the user declines', async () => {
    vi.mocked(requireConfirmation).mockRejectedValueOnce(new UserCancelledError());

    await expect(planCommand(root, { tools: 'mypy', write: true })).rejects.toThrow(UserCancelledError);
    await expect(readFile(join(root, 'pyproject.toml'), 'utf-8')).resolves.toBe(PYPROJECT);
  });

  it('should default to every tool whose manifest exists', async () => {
    await writeFile(join(root, 'Cargo.toml'), '[package]\nname = "demo"\n');

    const result = await planCommand(root);

    expect(result.tools).toEqual(['bandit', 'safety', 'ruff', 'mypy', 'clippy', 'rustc-lints']);
    expect(result.changes.map((change) => change.filePath)).toEqual([
      join(root, 'pyproject.toml'),
      join(root, 'Cargo.toml'),
    ]);
  });

  it('should use the tools listed in stackguard.config.json', async () => {
    await writeFile(join(root, 'stackguard.config.json'), JSON.stringify({ tools: ['clippy'] }));

    const result = await planCommand(root, { write: true, yes: true });

    expect(result.written).toEqual({ created: [join(root, 'Cargo.toml')], modified: [], backups: [] });
    const cargo = tomlCodec.parse(await readFile(join(root, 'Cargo.toml'), 'utf-8'));
    expect(cargo.ok && cargo.value).toEqual({
      lints: { clippy: { unwrap_used: 'warn', expect_used: 'warn', panic: 'warn', todo: 'warn' } },
    });
  });

  it('should back up modified manifests into the backup directory', async () => {
    const backupDir = join(root, 'backups');

    const result = await planCommand(root, { tools: 'mypy', write: true, yes: true, backupDir });

    expect(result.written?.backups).toHaveLength(1);
    const [backup] = result.written?.backups ?? [];
    expect(backup).toMatch(/pyproject\.toml\.\d{8}_\d{6}\.backup$/);
    await expect(readFile(backup, 'utf-8')).resolves.toBe(PYPROJECT);
  });

  it('should warn when there is nothing to plan', async () => {
    const empty = await createProject();
    try {
      const result = await planCommand(empty);
      expect(result).toEqual({ tools: [], changes: [], written: null });
      expect(logger.warn).toHaveBeenCalledTimes(1);
    } finally {
      await removeProject(empty);
    }
  });
});
