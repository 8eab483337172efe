import { join } from 'node:path';

import { tomlCodec } from '../core/codecs.js';
import { getAtPath, isConfigMap } from '../core/config-value.js';
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

const DEPENDENCY_TABLES = ['dependencies', 'dev-dependencies', 'build-dependencies'];

export class RustAnalyzer extends LanguageAnalyzer {
  readonly language: LanguageTag = 'rust';

  readonly toolNames = ['rustfmt', 'clippy', 'cargo-audit', 'cargo-deny', 'cargo-tarpaulin'] as const;

  protected readonly workflowMarkers: Record<string, string> = {
    'cargo clippy': 'clippy',
    'cargo fmt': 'rustfmt',
    'cargo audit': 'cargo-audit',
    'cargo deny': 'cargo-deny',
    'cargo tarpaulin': 'cargo-tarpaulin',
  };

  async detect(root: string): Promise<LanguageDetectionResult> {
    const score = new DetectionScore();

    if (await fileExists(join(root, 'Cargo.toml'))) {
      score.add('Cargo.toml', 0.6);
    }

    if (await fileExists(join(root, 'Cargo.lock'))) {
      score.add('Cargo.lock', 0.2);
    }

    const sources = await countFiles(root, '**/*.rs');
    if (sources > 0) {
      score.add(`${sources} .rs files`, 0.3);
    }

    if (await fileExists(join(root, 'target'))) {
      score.add('target/', 0.1);
    }

    if (
      (await fileExists(join(root, 'rust-toolchain'))) ||
      (await fileExists(join(root, 'rust-toolchain.toml')))
    ) {
      score.add('rust-toolchain', 0.1);
    }

    return score.result(this.language);
  }

  getConfigFilePatterns(): Record<string, string> {
    return {
      'Cargo.toml': 'Rust package configuration',
      'Cargo.lock': 'Rust dependencies lock file',
      'rust-toolchain': 'Rust toolchain version specification',
      'rust-toolchain.toml': 'Rust toolchain configuration',
      'rustfmt.toml': 'Rustfmt formatter configuration',
      '.rustfmt.toml': 'Rustfmt formatter configuration (hidden)',
      'clippy.toml': 'Clippy linter configuration',
      '.clippy.toml': 'Clippy linter configuration (hidden)',
      'deny.toml': 'cargo-deny policy configuration',
      'tarpaulin.toml': 'cargo-tarpaulin coverage configuration',
      '.cargo/config.toml': 'Cargo build configuration',
    };
  }

  protected fileTypeFor(filename: string): FileType {
    if (filename.endsWith('.toml')) return 'toml';
    if (filename.endsWith('.lock')) return 'lock';
    if (filename.endsWith('.json')) return 'json';
    return 'unknown';
  }

  protected async detectToolsFromProject(
    _root: string,
    configFiles: ConfigFile[],
    tools: ToolStatusMap,
  ): Promise<void> {
    tools.rustfmt = this.hasConfigFile(configFiles, 'rustfmt.toml', '.rustfmt.toml');
    tools.clippy = this.hasConfigFile(configFiles, 'clippy.toml', '.clippy.toml');
    tools['cargo-deny'] = this.hasConfigFile(configFiles, 'deny.toml');
    tools['cargo-tarpaulin'] = this.hasConfigFile(configFiles, 'tarpaulin.toml');

    const cargo = this.findConfigFile(configFiles, 'Cargo.toml');
    if (cargo) {
      const manifest = await this.readManifest(cargo.path, tomlCodec);
      if (manifest.ok) {
        const devDeps = manifest.value['dev-dependencies'];
        tools['cargo-audit'] = isConfigMap(devDeps) && Object.hasOwn(devDeps, 'cargo-audit');
        if (
          isConfigMap(getAtPath(manifest.value, 'lints.clippy')) ||
          isConfigMap(getAtPath(manifest.value, 'workspace.lints.clippy'))
        ) {
          tools.clippy = true;
        }
      }
    }
  }

  getRecommendedTools(): ToolRecommendation[] {
    return [
      {
        toolName: 'clippy',
        category: 'quality',
        description: 'Rust linter for catching common mistakes',
        configSection: 'clippy.toml',
        priority: 1,
      },
      {
        toolName: 'rustfmt',
        category: 'quality',
        description: 'Rust code formatter',
        configSection: 'rustfmt.toml',
        priority: 1,
      },
      {
        toolName: 'cargo-audit',
        category: 'security',
        description: 'Audit Cargo.lock for security vulnerabilities',
        configSection: 'Cargo.toml',
        priority: 2,
      },
      {
        toolName: 'cargo-deny',
        category: 'security',
        description: 'Lint dependencies for security and license issues',
        configSection: 'deny.toml',
        priority: 2,
      },
      {
        toolName: 'cargo-tarpaulin',
        category: 'testing',
        description: 'Code coverage tool for Rust',
        configSection: 'tarpaulin.toml',
        priority: 3,
      },
    ];
  }

  getSecurityTools(): string[] {
    return ['cargo-audit', 'cargo-deny'];
  }

  getQualityTools(): string[] {
    return ['clippy'];
  }

  getFormattingTools(): string[] {
    return ['rustfmt'];
  }

  async parseDependencies(root: string, configFiles: ConfigFile[] = []): Promise<string[]> {
    const files = await this.resolveConfigFiles(root, configFiles);
    const cargo = this.findConfigFile(files, 'Cargo.toml');
    if (!cargo) return [];

    const manifest = await this.readManifest(cargo.path, tomlCodec);
    if (!manifest.ok) return [];

    const dependencies: string[] = [];
    for (const table of DEPENDENCY_TABLES) {
      const section = manifest.value[table];
      if (isConfigMap(section)) {
        dependencies.push(...Object.keys(section));
      }
    }
    return dependencies;
  }
}
