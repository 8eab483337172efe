import { NodejsAnalyzer } from '../../../src/languages/nodejs.js';
import { createProject, removeProject } from '../helpers/project-fixture.js';

const PACKAGE_JSON = JSON.stringify({
  name: 'demo',
  dependencies: { express: '^4.19.0' },
  devDependencies: { typescript: '^5.4.0', vitest: '^2.0.0', express: '^4.19.0' },
});

describe('NodejsAnalyzer', () => {
  const analyzer = new NodejsAnalyzer();
  let root: string;

  afterEach(async () => {
    await removeProject(root);
  });

  describe('full project', () => {
    beforeEach(async () => {
      root = await createProject({
        'package.json': PACKAGE_JSON,
        'package-lock.json': '{}\n',
        'tsconfig.json': '{}\n',
        'src/index.ts': 'export {};\n',
        'node_modules/left-pad/index.js': 'module.exports = {};\n',
        '.github/workflows/ci.yml': 'steps:\n  - run: npm ci\n  - run: npm audit --audit-level=high\n',
      });
    });

    it('should not count installed packages as sources', async () => {
      const result = await analyzer.detect(root);
      expect(result.confidence).toBe(1);
      expect(result.indicators).toEqual([
        'package.json',
        'package-lock.json',
        '1 .js/.ts files',
        'node_modules/',
        'tsconfig.json',
      ]);
    });

    it('should detect tools from package.json, config files and workflows', async () => {
      await expect(analyzer.detectTools(root)).resolves.toEqual({
        biome: false,
        eslint: false,
        typescript: true,
        prettier: false,
        'npm-audit': true,
        'osv-scanner': false,
        snyk: false,
        jest: false,
        vitest: true,
        playwright: false,
        npm: true,
        yarn: false,
        pnpm: false,
      });
    });

    it('should list dependencies once each', async () => {
      await expect(analyzer.parseDependencies(root)).resolves.toEqual(['express', 'typescript', 'vitest']);
    });

    it('should recommend biome and osv-scanner', async () => {
      const missing = await analyzer.getMissingTools(root);
      expect(missing.map((rec) => rec.toolName)).toEqual(['biome', 'osv-scanner']);
    });
  });

  it('should detect biome from its config file', async () => {
    root = await createProject({ 'package.json': '{}', 'biome.json': '{}' });
    const tools = await analyzer.detectTools(root);
    expect(tools.biome).toBe(true);
    expect(tools.eslint).toBe(false);
  });

  it('should return no dependencies for an invalid package.json', async () => {
    root = await createProject({ 'package.json': '{ "dependencies": ' });
    await expect(analyzer.parseDependencies(root)).resolves.toEqual([]);
  });

  it('should weigh a lock file alone below the default threshold', async () => {
    root = await createProject({ 'yarn.lock': '' });
    const analysis = await analyzer.analyze(root);
    expect(analysis.confidence).toBeCloseTo(0.2);
    expect(analysis.detected).toBe(false);
  });

  it('should score an empty directory as zero', async () => {
    root = await createProject();
    await expect(analyzer.detect(root)).resolves.toEqual({ language: 'nodejs', confidence: 0, indicators: [] });
  });
});
