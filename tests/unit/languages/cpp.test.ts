import { CppAnalyzer } from '../../../src/languages/cpp.js';
import { createProject, removeProject } from '../helpers/project-fixture.js';

const VCPKG_JSON = JSON.stringify({
  name: 'demo',
  dependencies: ['fmt', null, { name: 'boost-asio', features: ['ssl'] }, 42, { features: [] }],
});

const CONANFILE = `[requires]
zlib/1.3
# pinned for CI
openssl/3.2.0

[generators]
CMakeDeps
`;

describe('CppAnalyzer', () => {
  const analyzer = new CppAnalyzer();
  let root: string;

  afterEach(async () => {
    await removeProject(root);
  });

  describe('full project', () => {
    beforeEach(async () => {
      root = await createProject({
        'CMakeLists.txt': 'cmake_minimum_required(VERSION 3.20)\n',
        'src/main.cpp': 'int main() { return 0; }\n',
        'include/app.hpp': '#pragma once\n',
        '.clang-format': 'BasedOnStyle: LLVM\n',
        'build/compile_commands.json': '[]\n',
        'vcpkg.json': VCPKG_JSON,
        'conanfile.txt': CONANFILE,
      });
    });

    it('should detect C++ from build files and sources', async () => {
      const result = await analyzer.detect(root);
      expect(result.confidence).toBe(1);
      expect(result.indicators).toEqual([
        'CMakeLists.txt',
        '1 .cpp/.cc/.cxx files',
        '1 .h/.hpp/.hxx files',
        'build/',
        'vcpkg.json',
        'conanfile',
      ]);
    });

    it('should classify CMakeLists.txt as cmake and find the nested compilation database', async () => {
      const files = await analyzer.detectConfigFiles(root);
      expect(files.map((file) => [file.name, file.fileType])).toEqual([
        ['CMakeLists.txt', 'cmake'],
        ['.clang-format', 'yaml'],
        ['vcpkg.json', 'json'],
        ['conanfile.txt', 'text'],
        ['build/compile_commands.json', 'json'],
      ]);
    });

    it('should detect configured tools', async () => {
      await expect(analyzer.detectTools(root)).resolves.toEqual({
        'clang-format': true,
        'clang-tidy': false,
        cppcheck: false,
        cmake: true,
        vcpkg: true,
        conan: true,
      });
    });

    it('should read vcpkg and conan dependencies', async () => {
      await expect(analyzer.parseDependencies(root)).resolves.toEqual(['fmt', 'boost-asio', 'zlib', 'openssl']);
    });
  });

  it('should add Makefile and source weights', async () => {
    root = await createProject({ Makefile: 'all:\n', 'main.cc': '' });
    const result = await analyzer.detect(root);
    expect(result.confidence).toBeCloseTo(0.6);
    expect(result.indicators).toEqual(['1 .cpp/.cc/.cxx files', 'Makefile']);
  });

  it('should mark clang-tidy as configured from a workflow', async () => {
    root = await createProject({
      'CMakeLists.txt': '',
      '.github/workflows/lint.yml': 'run: clang-tidy -p build src/*.cpp\n',
    });
    const tools = await analyzer.detectTools(root);
    expect(tools['clang-tidy']).toBe(true);
    expect(tools.cppcheck).toBe(false);
  });

  it('should ignore a malformed vcpkg manifest', async () => {
    root = await createProject({ 'vcpkg.json': '{ "dependencies": [' });
    await expect(analyzer.parseDependencies(root)).resolves.toEqual([]);
  });

  it('should score CMakeLists.txt alone at 0.6', async () => {
    root = await createProject({ 'CMakeLists.txt': 'project(demo)\n' });
    await expect(analyzer.detect(root)).resolves.toEqual({
      language: 'cpp',
      confidence: 0.6,
      indicators: ['CMakeLists.txt'],
    });
  });

  it('should score an empty directory as zero', async () => {
    root = await createProject();
    await expect(analyzer.detect(root)).resolves.toEqual({ language: 'cpp', confidence: 0, indicators: [] });
  });
});
