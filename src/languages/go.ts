import { join } from 'node:path';

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

const REQUIRE_LINE = /^require\s+(\S+)\s+\S+/;
const REQUIRE_BLOCK_ENTRY = /^(\S+)\s+\S+/;

/** Module paths from a go.mod, in file order. */
export function parseGoModRequires(content: string): string[] {
  const modules: string[] = [];
  let inBlock = false;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/\/\/.*$/, '').trim();
    if (!line) continue;

    if (inBlock) {
      if (line === ')') {
        inBlock = false;
        continue;
      }
      const entry = REQUIRE_BLOCK_ENTRY.exec(line);
      if (entry) modules.push(entry[1]);
      continue;
    }

    if (/^require\s*\($/.test(line)) {
      inBlock = true;
      continue;
    }

    const single = REQUIRE_LINE.exec(line);
    if (single) modules.push(single[1]);
  }

  return modules;
}

export class GoAnalyzer extends LanguageAnalyzer {
  readonly language: LanguageTag = 'go';

  readonly toolNames = ['golangci-lint', 'gofmt', 'govet', 'govulncheck', 'gosec', 'gotest'] as const;

  protected readonly workflowMarkers: Record<string, string> = {
    govulncheck: 'govulncheck',
    'golangci-lint': 'golangci-lint',
    'go test': 'gotest',
    gosec: 'gosec',
  };

  async detect(root: string): Promise<LanguageDetectionResult> {
    const score = new DetectionScore();

    if (await fileExists(join(root, 'go.mod'))) {
      score.add('go.mod', 0.6);
    }

    if (await fileExists(join(root, 'go.sum'))) {
      score.add('go.sum', 0.2);
    }

    const sources = await countFiles(root, '**/*.go', ['vendor/**']);
    if (sources > 0) {
      score.add(`${sources} .go files`, 0.3);
    }

    if (await fileExists(join(root, 'go.work'))) {
      score.add('go.work', 0.1);
    }

    if (await fileExists(join(root, 'vendor'))) {
      score.add('vendor/', 0.1);
    }

    return score.result(this.language);
  }

  getConfigFilePatterns(): Record<string, string> {
    return {
      'go.mod': 'Go module definition',
      'go.sum': 'Go module checksums',
      'go.work': 'Go workspace definition',
      '.golangci.yml': 'golangci-lint configuration',
      '.golangci.yaml': 'golangci-lint configuration',
      '.golangci.toml': 'golangci-lint configuration (TOML)',
      '.golangci.json': 'golangci-lint configuration (JSON)',
    };
  }

  protected fileTypeFor(filename: string): FileType {
    if (filename === 'go.mod') return 'module';
    if (filename === 'go.sum') return 'checksum';
    if (filename === 'go.work') return 'workspace';
    if (filename.endsWith('.yml') || filename.endsWith('.yaml')) return 'yaml';
    if (filename.endsWith('.toml')) return 'toml';
    if (filename.endsWith('.json')) return 'json';
    return 'unknown';
  }

  protected async detectToolsFromProject(
    _root: string,
    configFiles: ConfigFile[],
    tools: ToolStatusMap,
  ): Promise<void> {
    tools['golangci-lint'] = this.hasConfigFile(
      configFiles,
      '.golangci.yml',
      '.golangci.yaml',
      '.golangci.toml',
      '.golangci.json',
    );

    // gofmt and go vet ship with the toolchain; a module is enough.
    const hasModule = this.hasConfigFile(configFiles, 'go.mod');
    tools.gofmt = hasModule;
    tools.govet = hasModule;
  }

  getRecommendedTools(): ToolRecommendation[] {
    return [
      {
        toolName: 'golangci-lint',
        category: 'quality',
        description: 'Fast aggregated Go linter runner',
        configSection: '.golangci.yml',
        priority: 1,
      },
      {
        toolName: 'govulncheck',
        category: 'security',
        description: 'Official Go vulnerability scanner',
        configSection: '.github/workflows',
        priority: 1,
      },
      {
        toolName: 'gosec',
        category: 'security',
        description: 'Security checker for Go source code',
        configSection: '.golangci.yml',
        priority: 2,
      },
      {
        toolName: 'gotest',
        category: 'testing',
        description: 'Run go test with the race detector and coverage in CI',
        configSection: '.github/workflows',
        priority: 2,
      },
    ];
  }

  getSecurityTools(): string[] {
    return ['govulncheck', 'gosec'];
  }

  getQualityTools(): string[] {
    return ['golangci-lint', 'govet'];
  }

  getFormattingTools(): string[] {
    return ['gofmt'];
  }

  async parseDependencies(root: string, configFiles: ConfigFile[] = []): Promise<string[]> {
    const files = await this.resolveConfigFiles(root, configFiles);
    const goMod = this.findConfigFile(files, 'go.mod');
    if (!goMod) return [];

    const content = await this.readManifestText(goMod.path);
    if (!content.ok) return [];

    return parseGoModRequires(content.value);
  }
}
