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
  },
}));

vi.mock('../../src/ui/spinner.js', () => ({
  withSpinner: vi.fn(async (_text: string, fn: () => Promise<unknown>) => fn()),
}));

import { depsCommand } from '../../src/commands/deps.js';
import { detectCommand } from '../../src/commands/detect.js';
import { toolsCommand } from '../../src/commands/tools.js';
import { logger } from '../../src/ui/logger.js';
import { ConfigurationError, ProjectNotFoundError } from '../../src/utils/errors.js';
import { createProject, removeProject } from '../unit/helpers/project-fixture.js';

describe('analysis commands (e2e)', () => {
  let root: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    root = await createProject({
      'pyproject.toml': '[project]\ndependencies = ["httpx"]\n\n[tool.ruff]\nline-length = 100\n',
      'app/main.py': '',
      'Cargo.toml': '[dependencies]\nanyhow = "1"\n',
    });
  });

  afterEach(async () => {
    await removeProject(root);
  });

  it('should detect languages in confidence order', async () => {
    const results = await detectCommand(root);
    expect(results.map((result) => result.language)).toEqual(['python', 'rust']);
  });

  it('should honour minConfidence from the project config', async () => {
    const { writeFile } = await import('node:fs/promises');
    await writeFile(join(root, 'stackguard.config.json'), '{ "minConfidence": 0.7 }');

    const results = await detectCommand(root);
    expect(results.map((result) => result.language)).toEqual(['python']);
  });

  it('should report tool status per language', async () => {
    const analyses = await toolsCommand(root);
    const python = analyses.find((analysis) => analysis.language === 'python');

    expect(analyses.map((analysis) => analysis.language)).toEqual(['python', 'rust']);
    expect(python?.tools.ruff).toBe(true);
    expect(python?.missingTools.map((rec) => rec.toolName)).toEqual([
      'basedpyright',
      'uv',
      'pytest',
      'bandit',
      'safety',
    ]);
  });

  it('should analyze an explicitly requested language even with a low score', async () => {
    const analyses = await toolsCommand(root, { language: 'go' });
    expect(analyses).toHaveLength(1);
    expect(analyses[0]).toMatchObject({ language: 'go', detected: true, confidence: 0 });
  });

  it('should reject an unknown language option', async () => {
    await expect(toolsCommand(root, { language: 'cobol' })).rejects.toThrow(ConfigurationError);
  });

  it('should list dependencies per detected language', async () => {
    await expect(depsCommand(root)).resolves.toEqual([
      { language: 'python', dependencies: ['httpx'] },
      { language: 'rust', dependencies: ['anyhow'] },
    ]);
  });

  it('should restrict dependencies to one language', async () => {
    await expect(depsCommand(root, { language: 'rust' })).resolves.toEqual([
      { language: 'rust', dependencies: ['anyhow'] },
    ]);
  });

  it('should fail for a missing project directory', async () => {
    await expect(detectCommand(join(root, 'nope'))).rejects.toThrow(ProjectNotFoundError);
  });

  it('should warn when no language is detected', async () => {
    const empty = await createProject();
    try {
      await expect(detectCommand(empty)).resolves.toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith('No supported language detected', { minConfidence: 0.3 });
    } finally {
      await removeProject(empty);
    }
  });
});
