import { join } from 'node:path';

import { jsonCodec } from '../core/codecs.js';
import { isConfigMap } from '../core/config-value.js';
import type { ConfigMap } from '../core/config-value.js';
import { countFiles, fileExists } from '../utils/fs.js';
import { DetectionScore, LanguageAnalyzer } from './base.js';
import type {
  ConfigFile,
  FileType,
  LanguageDetectionResult,
  LanguageTag,
  ToolRecommendation,
  ToolStatusMap,
} from './types.js';

const DEPENDENCY_FIELDS = ['dependencies', 'devDependencies'];

// A declared package that means the tool is in use.
const PACKAGE_TOOLS: Record<string, string> = {
  '@biomejs/biome': 'biome',
  eslint: 'eslint',
  typescript: 'typescript',
  prettier: 'prettier',
  jest: 'jest',
  vitest: 'vitest',
  '@playwright/test': 'playwright',
  snyk: 'snyk',
};

const CONFIG_FILE_TOOLS: Record<string, string> = {
  'biome.json': 'biome',
  'biome.jsonc': 'biome',
  '.eslintrc.json': 'eslint',
  '.eslintrc.js': 'eslint',
  'eslint.config.js': 'eslint',
  'eslint.config.mjs': 'eslint',
  'tsconfig.json': 'typescript',
  '.prettierrc': 'prettier',
  '.prettierrc.json': 'prettier',
  'prettier.config.js': 'prettier',
  'jest.config.js': 'jest',
  'jest.config.ts': 'jest',
  'vitest.config.ts': 'vitest',
  'vitest.config.js': 'vitest',
  'playwright.config.ts': 'playwright',
  '.snyk': 'snyk',
  'package-lock.json': 'npm',
  'yarn.lock': 'yarn',
  'pnpm-lock.yaml': 'pnpm',
};

export class NodejsAnalyzer extends LanguageAnalyzer {
  readonly language: LanguageTag = 'nodejs';

  readonly toolNames = [
    'biome',
    'eslint',
    'typescript',
    'prettier',
    'npm-audit',
    'osv-scanner',
    'snyk',
    'jest',
    'vitest',
    'playwright',
    'npm',
    'yarn',
    'pnpm',
  ] as const;

  protected readonly workflowMarkers: Record<string, string> = {
    'npm audit': 'npm-audit',
    'osv-scanner': 'osv-scanner',
    'snyk test': 'snyk',
  };

  async detect(root: string): Promise<LanguageDetectionResult> {
    const score = new DetectionScore();

    if (await fileExists(join(root, 'package.json'))) {
      score.add('package.json', 0.5);
    }

    if (await fileExists(join(root, 'package-lock.json'))) {
      score.add('package-lock.json', 0.2);
    }

    if (await fileExists(join(root, 'yarn.lock'))) {
      score.add('yarn.lock', 0.2);
    }

    if (await fileExists(join(root, 'pnpm-lock.yaml'))) {
      score.add('pnpm-lock.yaml', 0.2);
    }

    const sources = await countFiles(root, '**/*.{js,ts}', ['**/node_modules/**']);
    if (sources > 0) {
      score.add(`${sources} .js/.ts files`, 0.4);
    }

    if (await fileExists(join(root, 'node_modules'))) {
      score.add('node_modules/', 0.1);
    }

    if (await fileExists(join(root, 'tsconfig.json'))) {
      score.add('tsconfig.json', 0.2);
    }

    return score.result(this.language);
  }

  getConfigFilePatterns(): Record<string, string> {
    return {
      'package.json': 'Node.js package manifest',
      'package-lock.json': 'npm dependencies lock file',
      'yarn.lock': 'Yarn dependencies lock file',
      'pnpm-lock.yaml': 'pnpm dependencies lock file',
      'tsconfig.json': 'TypeScript compiler configuration',
      'biome.json': 'Biome linter and formatter configuration',
      'biome.jsonc': 'Biome configuration (with comments)',
      '.eslintrc.json': 'ESLint configuration (legacy)',
      '.eslintrc.js': 'ESLint configuration (legacy, JavaScript)',
      'eslint.config.js': 'ESLint flat configuration',
      'eslint.config.mjs': 'ESLint flat configuration (ES module)',
      '.prettierrc': 'Prettier formatter configuration',
      '.prettierrc.json': 'Prettier formatter configuration (JSON)',
      'prettier.config.js': 'Prettier formatter configuration (JavaScript)',
      'jest.config.js': 'Jest test configuration',
      'jest.config.ts': 'Jest test configuration (TypeScript)',
      'vitest.config.ts': 'Vitest test configuration',
      'vitest.config.js': 'Vitest test configuration (JavaScript)',
      'playwright.config.ts': 'Playwright end-to-end test configuration',
      '.snyk': 'Snyk policy file',
      '.npmrc': 'npm configuration',
    };
  }

  protected fileTypeFor(filename: string): FileType {
    if (filename.endsWith('.json') || filename.endsWith('.jsonc')) return 'json';
    if (filename === '.prettierrc') return 'json';
    if (filename.endsWith('.yaml') || filename.endsWith('.yml') || filename === '.snyk') return 'yaml';
    if (filename.endsWith('.ts')) return 'typescript';
    if (filename.endsWith('.js') || filename.endsWith('.mjs')) return 'javascript';
    if (filename.endsWith('.lock')) return 'lock';
    if (filename === '.npmrc') return 'config';
    return 'unknown';
  }

  protected async detectToolsFromProject(
    _root: string,
    configFiles: ConfigFile[],
    tools: ToolStatusMap,
  ): Promise<void> {
    const packageJson = this.findConfigFile(configFiles, 'package.json');
    if (packageJson) {
      const manifest = await this.readManifest(packageJson.path, jsonCodec);
      if (manifest.ok) {
        for (const name of declaredPackages(manifest.value)) {
          const tool = PACKAGE_TOOLS[name];
          if (tool) tools[tool] = true;
        }
      }
    }

    for (const [filename, tool] of Object.entries(CONFIG_FILE_TOOLS)) {
      if (this.hasConfigFile(configFiles, filename)) {
        tools[tool] = true;
      }
    }
  }

  getRecommendedTools(): ToolRecommendation[] {
    return [
      {
        toolName: 'biome',
        category: 'quality',
        description: 'Fast linter and formatter for JavaScript and TypeScript',
        configSection: 'biome.json',
        priority: 1,
        modernAlternative: 'eslint + prettier',
      },
      {
        toolName: 'typescript',
        category: 'quality',
        description: 'Static type checking for JavaScript',
        configSection: 'tsconfig.json',
        priority: 1,
      },
      {
        toolName: 'vitest',
        category: 'testing',
        description: 'Fast unit test framework',
        configSection: 'vitest.config.ts',
        priority: 2,
        modernAlternative: 'jest',
      },
      {
        toolName: 'npm-audit',
        category: 'security',
        description: 'Audit installed packages for known vulnerabilities',
        configSection: '.github/workflows',
        priority: 2,
      },
      {
        toolName: 'osv-scanner',
        category: 'security',
        description: 'Scan lock files against the OSV vulnerability database',
        configSection: '.github/workflows',
        priority: 3,
      },
    ];
  }

  getSecurityTools(): string[] {
    return ['npm-audit', 'osv-scanner', 'snyk'];
  }

  getQualityTools(): string[] {
    return ['biome', 'eslint', 'typescript'];
  }

  getFormattingTools(): string[] {
    return ['biome', 'prettier'];
  }

  async parseDependencies(root: string, configFiles: ConfigFile[] = []): Promise<string[]> {
    const files = await this.resolveConfigFiles(root, configFiles);
    const packageJson = this.findConfigFile(files, 'package.json');
    if (!packageJson) return [];

    const manifest = await this.readManifest(packageJson.path, jsonCodec);
    if (!manifest.ok) return [];

    return declaredPackages(manifest.value);
  }
}

function declaredPackages(manifest: ConfigMap): string[] {
  const names: string[] = [];
  for (const field of DEPENDENCY_FIELDS) {
    const section = manifest[field];
    if (isConfigMap(section)) {
      names.push(...Object.keys(section));
    }
  }
  return [...new Set(names)];
}
