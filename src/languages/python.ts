import { join } from 'node:path';

import { tomlCodec } from '../core/codecs.js';
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

const PACKAGE_NAME = /^[A-Za-z0-9_.-]+/;

// [tool.<key>] sections that mean a tool is configured.
const TOOL_SECTIONS: Record<string, string[]> = {
  ruff: ['ruff'],
  basedpyright: ['basedpyright', 'pyright'],
  mypy: ['mypy'],
  pylint: ['pylint'],
  black: ['black'],
  bandit: ['bandit'],
  safety: ['safety'],
  pytest: ['pytest'],
  poetry: ['poetry'],
  pdm: ['pdm'],
  uv: ['uv'],
};

const STANDALONE_CONFIGS: Record<string, string> = {
  'mypy.ini': 'mypy',
  '.flake8': 'flake8',
  '.pylintrc': 'pylint',
  'bandit.yaml': 'bandit',
  'pytest.ini': 'pytest',
  'tox.ini': 'tox',
  'poetry.lock': 'poetry',
  Pipfile: 'pipenv',
  'Pipfile.lock': 'pipenv',
  'pdm.lock': 'pdm',
  'uv.lock': 'uv',
};

function packageName(spec: string): string | null {
  const match = PACKAGE_NAME.exec(spec.trim());
  return match ? match[0] : null;
}

export class PythonAnalyzer extends LanguageAnalyzer {
  readonly language: LanguageTag = 'python';

  readonly toolNames = [
    'ruff',
    'basedpyright',
    'mypy',
    'pylint',
    'flake8',
    'black',
    'bandit',
    'safety',
    'semgrep',
    'pytest',
    'tox',
    'poetry',
    'pdm',
    'pipenv',
    'uv',
  ] as const;

  protected readonly workflowMarkers: Record<string, string> = {
    'ruff check': 'ruff',
    bandit: 'bandit',
    'safety check': 'safety',
    'safety scan': 'safety',
    semgrep: 'semgrep',
    pytest: 'pytest',
    mypy: 'mypy',
  };

  async detect(root: string): Promise<LanguageDetectionResult> {
    const score = new DetectionScore();

    if (await fileExists(join(root, 'pyproject.toml'))) {
      score.add('pyproject.toml', 0.4);
    }

    if (await fileExists(join(root, 'requirements.txt'))) {
      score.add('requirements.txt', 0.3);
    }

    if (await fileExists(join(root, 'setup.py'))) {
      score.add('setup.py', 0.3);
    }

    const sources = await countFiles(root, '**/*.py');
    if (sources > 0) {
      score.add(`${sources} .py files`, 0.5);
    }

    if (await fileExists(join(root, 'poetry.lock'))) {
      score.add('poetry.lock', 0.2);
    }

    if (await fileExists(join(root, 'Pipfile'))) {
      score.add('Pipfile', 0.2);
    }

    return score.result(this.language);
  }

  getConfigFilePatterns(): Record<string, string> {
    return {
      'pyproject.toml': 'Python project configuration',
      'requirements.txt': 'Python dependencies (pip)',
      'setup.py': 'Python package setup script',
      'setup.cfg': 'Python package configuration',
      'tox.ini': 'Tox testing configuration',
      'pytest.ini': 'Pytest configuration',
      'mypy.ini': 'MyPy type checker configuration',
      '.flake8': 'Flake8 linter configuration',
      '.pylintrc': 'Pylint configuration',
      'bandit.yaml': 'Bandit security configuration',
      'poetry.lock': 'Poetry dependencies lock file',
      Pipfile: 'Pipenv dependencies',
      'Pipfile.lock': 'Pipenv dependencies lock file',
      'pdm.lock': 'PDM dependencies lock file',
      'uv.lock': 'uv dependencies lock file',
    };
  }

  protected fileTypeFor(filename: string): FileType {
    if (filename.endsWith('.toml')) return 'toml';
    if (filename.endsWith('.yaml') || filename.endsWith('.yml')) return 'yaml';
    if (filename.endsWith('.ini') || filename.endsWith('.cfg')) return 'ini';
    if (filename === '.flake8' || filename === '.pylintrc') return 'ini';
    if (filename.endsWith('.py')) return 'python';
    if (filename.endsWith('.txt')) return 'text';
    if (filename.endsWith('.lock')) return 'lock';
    if (filename === 'Pipfile') return 'toml';
    return 'unknown';
  }

  protected async detectToolsFromProject(
    _root: string,
    configFiles: ConfigFile[],
    tools: ToolStatusMap,
  ): Promise<void> {
    const pyproject = this.findConfigFile(configFiles, 'pyproject.toml');
    if (pyproject) {
      const manifest = await this.readManifest(pyproject.path, tomlCodec);
      if (manifest.ok) {
        const toolSection = manifest.value.tool;
        if (isConfigMap(toolSection)) {
          for (const [tool, sections] of Object.entries(TOOL_SECTIONS)) {
            if (sections.some((section) => Object.hasOwn(toolSection, section))) {
              tools[tool] = true;
            }
          }
        }
        for (const dep of this.projectDependencies(manifest.value)) {
          if (dep === 'pytest') tools.pytest = true;
        }
      }
    }

    for (const [filename, tool] of Object.entries(STANDALONE_CONFIGS)) {
      if (this.hasConfigFile(configFiles, filename)) {
        tools[tool] = true;
      }
    }
  }

  getRecommendedTools(): ToolRecommendation[] {
    return [
      {
        toolName: 'ruff',
        category: 'quality',
        description: 'Fast Python linter and formatter (replaces flake8, black, isort)',
        configSection: '[tool.ruff]',
        priority: 1,
        modernAlternative: 'flake8 + black + isort',
      },
      {
        toolName: 'basedpyright',
        category: 'quality',
        description: 'Fast static type checker based on pyright',
        configSection: '[tool.basedpyright]',
        priority: 1,
        modernAlternative: 'mypy',
      },
      {
        toolName: 'pytest',
        category: 'testing',
        description: 'Testing framework for Python',
        configSection: '[tool.pytest.ini_options]',
        priority: 2,
      },
      {
        toolName: 'bandit',
        category: 'security',
        description: 'Security linter for Python code',
        configSection: '[tool.bandit]',
        priority: 2,
      },
      {
        toolName: 'safety',
        category: 'security',
        description: 'Dependency vulnerability scanner',
        configSection: '[tool.safety]',
        priority: 3,
      },
      {
        toolName: 'uv',
        category: 'dependency',
        description: 'Fast Python package installer and resolver',
        configSection: '[tool.uv]',
        priority: 1,
      },
    ];
  }

  getSecurityTools(): string[] {
    return ['bandit', 'safety', 'semgrep'];
  }

  getQualityTools(): string[] {
    return ['ruff', 'basedpyright', 'mypy', 'pylint'];
  }

  getFormattingTools(): string[] {
    return ['ruff format', 'black'];
  }

  async parseDependencies(root: string, configFiles: ConfigFile[] = []): Promise<string[]> {
    const files = await this.resolveConfigFiles(root, configFiles);
    const dependencies: string[] = [];

    const pyproject = this.findConfigFile(files, 'pyproject.toml');
    if (pyproject) {
      const manifest = await this.readManifest(pyproject.path, tomlCodec);
      if (manifest.ok) {
        dependencies.push(...this.projectDependencies(manifest.value));
      }
    }

    const requirements = this.findConfigFile(files, 'requirements.txt');
    if (requirements) {
      const content = await this.readManifestText(requirements.path);
      if (content.ok) {
        for (const rawLine of content.value.split(/\r?\n/)) {
          const line = rawLine.trim();
          if (!line || line.startsWith('#') || line.startsWith('-')) continue;
          const name = packageName(line);
          if (name) dependencies.push(name);
        }
      }
    }

    return [...new Set(dependencies)];
  }

  private projectDependencies(manifest: ConfigMap): string[] {
    const project = manifest.project;
    if (!isConfigMap(project)) return [];

    const declared = project.dependencies;
    if (!Array.isArray(declared)) return [];

    const names: string[] = [];
    for (const spec of declared) {
      if (typeof spec !== 'string') continue;
      const name = packageName(spec);
      if (name) names.push(name);
    }
    return names;
  }
}
