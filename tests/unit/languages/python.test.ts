import { PythonAnalyzer } from '../../../src/languages/python.js';
import { createProject, removeProject } from '../helpers/project-fixture.js';

const PYPROJECT = `[project]
name = "demo"
dependencies = ["requests>=2.31", "pytest", "Flask[async]==3.0"]

[tool.ruff]
line-length = 100

[tool.pyright]
strict = ["src"]
`;

const REQUIREMENTS = `# runtime
requests==2.31.0
numpy>=1.26
-r dev.txt

click
`;

describe('PythonAnalyzer', () => {
  const analyzer = new PythonAnalyzer();
  let root: string;

  afterEach(async () => {
    await removeProject(root);
  });

  describe('full project', () => {
    beforeEach(async () => {
      root = await createProject({
        'pyproject.toml': PYPROJECT,
        'requirements.txt': REQUIREMENTS,
        'mypy.ini': '[mypy]\n',
        'src/app.py': 'print("hi")\n',
        'tests/test_app.py': 'def test_ok():\n    assert True\n',
        '.github/workflows/ci.yml': 'steps:\n  - run: bandit -r src\n',
      });
    });

    it('should detect Python with capped confidence', async () => {
      const result = await analyzer.detect(root);
      expect(result.language).toBe('python');
      expect(result.confidence).toBe(1);
      expect(result.indicators).toEqual(['pyproject.toml', 'requirements.txt', '2 .py files']);
    });

    it('should list present config files with their types', async () => {
      const files = await analyzer.detectConfigFiles(root);
      expect(files.map((file) => [file.name, file.fileType])).toEqual([
        ['pyproject.toml', 'toml'],
        ['requirements.txt', 'text'],
        ['mypy.ini', 'ini'],
      ]);
      expect(files.every((file) => file.exists)).toBe(true);
    });

    it('should detect tools from pyproject sections, files, dependencies and workflows', async () => {
      await expect(analyzer.detectTools(root)).resolves.toEqual({
        ruff: true,
        basedpyright: true,
        mypy: true,
        pylint: false,
        flake8: false,
        black: false,
        bandit: true,
        safety: false,
        semgrep: false,
        pytest: true,
        tox: false,
        poetry: false,
        pdm: false,
        pipenv: false,
        uv: false,
      });
    });

    it('should merge and deduplicate dependencies from pyproject and requirements', async () => {
      await expect(analyzer.parseDependencies(root)).resolves.toEqual([
        'requests',
        'pytest',
        'Flask',
        'numpy',
        'click',
      ]);
    });

    it('should recommend only the tools that are not configured', async () => {
      const missing = await analyzer.getMissingTools(root);
      expect(missing.map((rec) => rec.toolName)).toEqual(['uv', 'safety']);
    });

    it('should produce a full analysis above the threshold', async () => {
      const analysis = await analyzer.analyze(root);
      expect(analysis.detected).toBe(true);
      expect(analysis.configFiles).toHaveLength(3);
      expect(analysis.missingTools.map((rec) => rec.toolName)).toEqual(['uv', 'safety']);
      expect(analysis.dependencies).toContain('numpy');
    });
  });

  it('should add weights for a partial project', async () => {
    root = await createProject({ 'requirements.txt': 'click\n', 'main.py': '' });
    const result = await analyzer.detect(root);
    expect(result.confidence).toBeCloseTo(0.8);
    expect(result.indicators).toEqual(['requirements.txt', '1 .py files']);
  });

  it('should survive a malformed pyproject', async () => {
    root = await createProject({ 'pyproject.toml': '[project\nname = ', 'requirements.txt': 'flask\n' });

    await expect(analyzer.parseDependencies(root)).resolves.toEqual(['flask']);
    const tools = await analyzer.detectTools(root);
    expect(Object.values(tools).every((configured) => !configured)).toBe(true);
  });

  it('should report nothing for an empty directory', async () => {
    root = await createProject();
    const analysis = await analyzer.analyze(root);
    expect(analysis).toMatchObject({
      language: 'python',
      detected: false,
      confidence: 0,
      indicators: [],
      tools: {},
      dependencies: [],
    });
  });

  it('should expose its tool catalogs', () => {
    expect(analyzer.getSecurityTools()).toEqual(['bandit', 'safety', 'semgrep']);
    expect(analyzer.getFormattingTools()).toEqual(['ruff format', 'black']);
    expect(analyzer.getRecommendedTools().map((rec) => rec.toolName)).toEqual([
      'ruff',
      'basedpyright',
      'pytest',
      'bandit',
      'safety',
      'uv',
    ]);
  });
});
