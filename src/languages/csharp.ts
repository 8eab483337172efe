import { join } from 'node:path';

import { countFiles, fileExists, findFiles, isFile } from '../utils/fs.js';
import { DetectionScore, LanguageAnalyzer, makeConfigFile } from './base.js';
import type {
  ConfigFile,
  FileType,
  LanguageDetectionResult,
  LanguageTag,
  ToolRecommendation,
  ToolStatusMap,
} from './types.js';

const PROJECT_GLOB = '**/*.csproj';
const SOLUTION_GLOB = '*.sln';
const BUILD_OUTPUT = ['**/bin/**', '**/obj/**'];

const PACKAGE_REFERENCE = /<PackageReference\b[^>]*?\bInclude\s*=\s*"([^"]+)"/g;

const STANDARD_CONFIGS: Record<string, string> = {
  'global.json': '.NET SDK version specification',
  'NuGet.config': 'NuGet package manager configuration',
  'nuget.config': 'NuGet package manager configuration',
  '.editorconfig': 'EditorConfig formatting rules',
  'Directory.Build.props': 'MSBuild properties for all projects',
  'Directory.Build.targets': 'MSBuild targets for all projects',
  '.runsettings': 'Test run settings',
};

/** Package ids referenced by a project file, in document order. */
export function parsePackageReferences(content: string): string[] {
  return [...content.matchAll(PACKAGE_REFERENCE)].map((match) => match[1]);
}

export class CsharpAnalyzer extends LanguageAnalyzer {
  readonly language: LanguageTag = 'csharp';

  readonly toolNames = ['editorconfig', 'stylecop', 'dotnet-format', 'dotnet-test', 'security-scan'] as const;

  protected readonly workflowMarkers: Record<string, string> = {
    'dotnet format': 'dotnet-format',
    'dotnet test': 'dotnet-test',
    'security-scan': 'security-scan',
  };

  async detect(root: string): Promise<LanguageDetectionResult> {
    const score = new DetectionScore();

    const projects = await countFiles(root, PROJECT_GLOB, BUILD_OUTPUT);
    if (projects > 0) {
      score.add(`${projects} .csproj files`, 0.6);
    }

    const solutions = await countFiles(root, SOLUTION_GLOB);
    if (solutions > 0) {
      score.add(`${solutions} .sln files`, 0.2);
    }

    const sources = await countFiles(root, '**/*.cs', BUILD_OUTPUT);
    if (sources > 0) {
      score.add(`${sources} .cs files`, 0.3);
    }

    if (await fileExists(join(root, 'global.json'))) {
      score.add('global.json', 0.1);
    }

    if ((await fileExists(join(root, 'NuGet.config'))) || (await fileExists(join(root, 'nuget.config')))) {
      score.add('NuGet.config', 0.1);
    }

    if ((await fileExists(join(root, 'bin'))) || (await fileExists(join(root, 'obj')))) {
      score.add('bin/ obj/', 0.1);
    }

    return score.result(this.language);
  }

  getConfigFilePatterns(): Record<string, string> {
    return {
      '*.csproj': 'C# project file',
      '*.sln': 'Visual Studio solution file',
      ...STANDARD_CONFIGS,
    };
  }

  /** Project files anywhere in the tree, solutions at the root, then the fixed names. */
  async detectConfigFiles(root: string): Promise<ConfigFile[]> {
    const configFiles: ConfigFile[] = [];

    for (const project of await findFiles(root, PROJECT_GLOB, BUILD_OUTPUT)) {
      configFiles.push(makeConfigFile(project, join(root, project), 'xml'));
    }

    for (const solution of await findFiles(root, SOLUTION_GLOB)) {
      configFiles.push(makeConfigFile(solution, join(root, solution), 'solution'));
    }

    for (const name of Object.keys(STANDARD_CONFIGS)) {
      const path = join(root, name);
      if (await isFile(path)) {
        configFiles.push(makeConfigFile(name, path, this.fileTypeFor(name)));
      }
    }

    return configFiles;
  }

  protected fileTypeFor(filename: string): FileType {
    if (filename.endsWith('.csproj')) return 'xml';
    if (filename.endsWith('.sln')) return 'solution';
    if (filename.endsWith('.json')) return 'json';
    if (filename.endsWith('.config') || filename === '.runsettings') return 'xml';
    if (filename.endsWith('.props') || filename.endsWith('.targets')) return 'msbuild';
    if (filename === '.editorconfig') return 'editorconfig';
    return 'unknown';
  }

  protected async detectToolsFromProject(
    _root: string,
    configFiles: ConfigFile[],
    tools: ToolStatusMap,
  ): Promise<void> {
    tools.editorconfig = this.hasConfigFile(configFiles, '.editorconfig');

    for (const project of this.projectFiles(configFiles)) {
      const content = await this.readManifestText(project.path);
      if (!content.ok) continue;

      if (content.value.includes('StyleCop')) {
        tools.stylecop = true;
      }
      if (parsePackageReferences(content.value).some((id) => id.startsWith('SecurityCodeScan'))) {
        tools['security-scan'] = true;
      }
    }
  }

  getRecommendedTools(): ToolRecommendation[] {
    return [
      {
        toolName: 'dotnet-format',
        category: 'quality',
        description: '.NET code formatter (built-in)',
        configSection: '.editorconfig',
        priority: 1,
      },
      {
        toolName: 'editorconfig',
        category: 'quality',
        description: 'EditorConfig for consistent formatting',
        configSection: '.editorconfig',
        priority: 1,
      },
      {
        toolName: 'stylecop',
        category: 'quality',
        description: 'StyleCop code style analyzer',
        configSection: '.csproj',
        priority: 2,
      },
      {
        toolName: 'dotnet-test',
        category: 'testing',
        description: '.NET testing framework (built-in)',
        configSection: 'built-in',
        priority: 1,
      },
      {
        toolName: 'security-scan',
        category: 'security',
        description: 'Security code scan for .NET',
        configSection: 'built-in',
        priority: 2,
      },
    ];
  }

  getSecurityTools(): string[] {
    return ['security-scan'];
  }

  getQualityTools(): string[] {
    return ['dotnet-format', 'stylecop'];
  }

  getFormattingTools(): string[] {
    return ['dotnet-format'];
  }

  async parseDependencies(root: string, configFiles: ConfigFile[] = []): Promise<string[]> {
    const files = await this.resolveConfigFiles(root, configFiles);
    const dependencies: string[] = [];

    for (const project of this.projectFiles(files)) {
      const content = await this.readManifestText(project.path);
      if (content.ok) {
        dependencies.push(...parsePackageReferences(content.value));
      }
    }

    return [...new Set(dependencies)];
  }

  private projectFiles(configFiles: ConfigFile[]): ConfigFile[] {
    return configFiles.filter((file) => file.exists && file.name.endsWith('.csproj'));
  }
}
