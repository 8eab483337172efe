import { join } from 'node:path';

import { jsonCodec } from '../core/codecs.js';
import { isConfigMap } from '../core/config-value.js';
import { countFiles, fileExists, isFile } from '../utils/fs.js';
import { DetectionScore, LanguageAnalyzer, makeConfigFile } from './base.js';
import type {
  ConfigFile,
  FileType,
  LanguageDetectionResult,
  LanguageTag,
  ToolRecommendation,
  ToolStatusMap,
} from './types.js';

const COMPILE_COMMANDS_IN_BUILD = 'build/compile_commands.json';

const EXACT_FILE_TYPES: Record<string, FileType> = {
  'CMakeLists.txt': 'cmake',
  Makefile: 'make',
  '.clang-format': 'yaml',
  '.clang-tidy': 'yaml',
  '.cppcheck': 'yaml',
};

export class CppAnalyzer extends LanguageAnalyzer {
  readonly language: LanguageTag = 'cpp';

  readonly toolNames = ['clang-format', 'clang-tidy', 'cppcheck', 'cmake', 'vcpkg', 'conan'] as const;

  protected readonly workflowMarkers: Record<string, string> = {
    'clang-format': 'clang-format',
    'clang-tidy': 'clang-tidy',
    cppcheck: 'cppcheck',
  };

  async detect(root: string): Promise<LanguageDetectionResult> {
    const score = new DetectionScore();

    if (await fileExists(join(root, 'CMakeLists.txt'))) {
      score.add('CMakeLists.txt', 0.6);
    }

    const sources = await countFiles(root, '**/*.{cpp,cc,cxx}');
    if (sources > 0) {
      score.add(`${sources} .cpp/.cc/.cxx files`, 0.4);
    }

    const headers = await countFiles(root, '**/*.{h,hpp,hxx}');
    if (headers > 0) {
      score.add(`${headers} .h/.hpp/.hxx files`, 0.2);
    }

    if (await fileExists(join(root, 'Makefile'))) {
      score.add('Makefile', 0.2);
    }

    if (await fileExists(join(root, 'build'))) {
      score.add('build/', 0.1);
    }

    if (await fileExists(join(root, 'vcpkg.json'))) {
      score.add('vcpkg.json', 0.1);
    }

    if ((await fileExists(join(root, 'conanfile.txt'))) || (await fileExists(join(root, 'conanfile.py')))) {
      score.add('conanfile', 0.1);
    }

    return score.result(this.language);
  }

  getConfigFilePatterns(): Record<string, string> {
    return {
      'CMakeLists.txt': 'CMake build configuration',
      Makefile: 'Make build configuration',
      '.clang-format': 'Clang-Format formatter configuration',
      '.clang-tidy': 'Clang-Tidy linter configuration',
      'compile_commands.json': 'Compilation database',
      'vcpkg.json': 'vcpkg package manager manifest',
      'conanfile.txt': 'Conan package manager configuration',
      'conanfile.py': 'Conan package manager configuration (Python)',
      '.cppcheck': 'Cppcheck configuration',
    };
  }

  async detectConfigFiles(root: string): Promise<ConfigFile[]> {
    const configFiles = await super.detectConfigFiles(root);

    const buildCommands = join(root, COMPILE_COMMANDS_IN_BUILD);
    if (await isFile(buildCommands)) {
      configFiles.push(makeConfigFile(COMPILE_COMMANDS_IN_BUILD, buildCommands, 'json'));
    }

    return configFiles;
  }

  protected fileTypeFor(filename: string): FileType {
    const exact = EXACT_FILE_TYPES[filename];
    if (exact) return exact;
    if (filename.endsWith('.json')) return 'json';
    if (filename.endsWith('.py')) return 'python';
    if (filename.endsWith('.txt')) return 'text';
    if (filename.startsWith('.clang')) return 'yaml';
    return 'unknown';
  }

  protected async detectToolsFromProject(
    _root: string,
    configFiles: ConfigFile[],
    tools: ToolStatusMap,
  ): Promise<void> {
    tools['clang-format'] = this.hasConfigFile(configFiles, '.clang-format');
    tools['clang-tidy'] = this.hasConfigFile(configFiles, '.clang-tidy');
    tools.cppcheck = this.hasConfigFile(configFiles, '.cppcheck');
    tools.cmake = this.hasConfigFile(configFiles, 'CMakeLists.txt');
    tools.vcpkg = this.hasConfigFile(configFiles, 'vcpkg.json');
    tools.conan = this.hasConfigFile(configFiles, 'conanfile.txt', 'conanfile.py');
  }

  getRecommendedTools(): ToolRecommendation[] {
    return [
      {
        toolName: 'clang-format',
        category: 'quality',
        description: 'LLVM code formatter for C++',
        configSection: '.clang-format',
        priority: 1,
      },
      {
        toolName: 'clang-tidy',
        category: 'quality',
        description: 'LLVM-based C++ linter',
        configSection: '.clang-tidy',
        priority: 1,
      },
      {
        toolName: 'cppcheck',
        category: 'quality',
        description: 'Static analysis tool for C/C++',
        configSection: '.cppcheck',
        priority: 2,
      },
      {
        toolName: 'cmake',
        category: 'build',
        description: 'Cross-platform build system',
        configSection: 'CMakeLists.txt',
        priority: 1,
      },
      {
        toolName: 'vcpkg',
        category: 'dependency',
        description: 'C++ package manager from Microsoft',
        configSection: 'vcpkg.json',
        priority: 2,
      },
    ];
  }

  getSecurityTools(): string[] {
    return ['clang-tidy', 'cppcheck'];
  }

  getQualityTools(): string[] {
    return ['clang-tidy', 'cppcheck'];
  }

  getFormattingTools(): string[] {
    return ['clang-format'];
  }

  async parseDependencies(root: string, configFiles: ConfigFile[] = []): Promise<string[]> {
    const files = await this.resolveConfigFiles(root, configFiles);
    const dependencies: string[] = [];

    const vcpkg = this.findConfigFile(files, 'vcpkg.json');
    if (vcpkg) {
      dependencies.push(...(await this.parseVcpkg(vcpkg.path)));
    }

    const conan = this.findConfigFile(files, 'conanfile.txt');
    if (conan) {
      dependencies.push(...(await this.parseConanfile(conan.path)));
    }

    return dependencies;
  }

  // Entries are either "name" or { "name": ..., "features": [...] }.
  private async parseVcpkg(path: string): Promise<string[]> {
    const manifest = await this.readManifest(path, jsonCodec);
    if (!manifest.ok) return [];

    const entries = manifest.value.dependencies;
    if (!Array.isArray(entries)) return [];

    const names: string[] = [];
    for (const entry of entries) {
      if (typeof entry === 'string') {
        names.push(entry);
      } else if (isConfigMap(entry) && typeof entry.name === 'string' && entry.name) {
        names.push(entry.name);
      }
    }
    return names;
  }

  private async parseConanfile(path: string): Promise<string[]> {
    const content = await this.readManifestText(path);
    if (!content.ok) return [];

    const names: string[] = [];
    let inRequires = false;
    for (const rawLine of content.value.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (line.startsWith('[')) {
        inRequires = line === '[requires]';
        continue;
      }
      if (!inRequires || !line || line.startsWith('#')) continue;
      const name = line.split('/')[0].trim();
      if (name) names.push(name);
    }
    return names;
  }
}
