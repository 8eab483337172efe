import { createLanguageRegistry, isLanguageTag, LanguageRegistry } from '../../../src/languages/registry.js';
import { RustAnalyzer } from '../../../src/languages/rust.js';
import { createProject, removeProject } from '../helpers/project-fixture.js';

describe('isLanguageTag', () => {
  it('should accept the six supported tags only', () => {
    expect(['python', 'nodejs', 'rust', 'go', 'cpp', 'csharp'].every(isLanguageTag)).toBe(true);
    expect(isLanguageTag('cobol')).toBe(false);
    expect(isLanguageTag('Python')).toBe(false);
  });
});

describe('LanguageRegistry', () => {
  const registry = createLanguageRegistry();
  let root: string | undefined;

  afterEach(async () => {
    if (root !== undefined) {
      await removeProject(root);
      root = undefined;
    }
  });

  it('should register analyzers in a fixed order', () => {
    expect(registry.getLanguageTags()).toEqual(['python', 'nodejs', 'rust', 'go', 'cpp', 'csharp']);
    expect(registry.getAnalyzer('rust')).toBeInstanceOf(RustAnalyzer);
  });

  it('should return nothing for an unregistered tag', () => {
    expect(new LanguageRegistry().getAnalyzer('go')).toBeUndefined();
  });

  it('should sort detected languages by confidence', async () => {
    root = await createProject({ 'pyproject.toml': '', 'app.py': '', 'package.json': '{}' });

    const results = await registry.detectLanguages(root);
    expect(results.map((result) => result.language)).toEqual(['python', 'nodejs']);
    expect(results[0].confidence).toBeCloseTo(0.9);
    expect(results[1].confidence).toBeCloseTo(0.5);
  });

  it('should keep registry order for equal confidence', async () => {
    root = await createProject({ 'CMakeLists.txt': '', 'go.mod': 'module x\n', 'Cargo.toml': '' });

    const results = await registry.detectLanguages(root);
    expect(results.map((result) => result.language)).toEqual(['rust', 'go', 'cpp']);
  });

  it('should apply the confidence threshold', async () => {
    root = await createProject({ 'pyproject.toml': '', 'app.py': '', 'package.json': '{}' });

    const results = await registry.detectLanguages(root, 0.7);
    expect(results.map((result) => result.language)).toEqual(['python']);
  });

  it('should pick the primary language', async () => {
    root = await createProject({ 'go.mod': 'module x\n', 'main.go': '' });
    await expect(registry.detectPrimaryLanguage(root)).resolves.toBe('go');
  });

  it.each(['python', 'nodejs', 'rust', 'go', 'cpp', 'csharp'] as const)(
    'should score an empty directory as zero for %s',
    async (language) => {
      root = await createProject();
      const analyzer = registry.getAnalyzer(language);
      expect(analyzer).toBeDefined();
      await expect(analyzer?.detect(root)).resolves.toEqual({ language, confidence: 0, indicators: [] });
    },
  );

  it('should report no primary language for an empty project', async () => {
    root = await createProject();
    await expect(registry.detectPrimaryLanguage(root)).resolves.toBeNull();
  });

  it('should analyze detected languages by default', async () => {
    root = await createProject({ 'Cargo.toml': '[dependencies]\nserde = "1"\n', 'src/lib.rs': '' });

    const analyses = await registry.analyzeProject(root);
    expect(analyses.map((analysis) => analysis.language)).toEqual(['rust']);
    expect(analyses[0].dependencies).toEqual(['serde']);
  });

  it('should analyze exactly the requested languages', async () => {
    root = await createProject({ 'Cargo.toml': '', 'src/lib.rs': '' });

    const analyses = await registry.analyzeProject(root, ['python', 'rust']);
    expect(analyses.map((analysis) => [analysis.language, analysis.detected])).toEqual([
      ['python', false],
      ['rust', true],
    ]);
  });
});
