import { join } from 'node:path';

import { ConfigurationError } from '../utils/errors.js';
import type { ConfigChange } from './config-change.js';
import { ConfigMerger } from './config-merger.js';
import type { ToolConfigBlock } from './config-merger.js';

const PRE_COMMIT_SETTINGS = {
  fail_fast: false,
  minimum_pre_commit_version: '3.0.0',
};

const TOOL_CONFIG_BLOCKS: ToolConfigBlock[] = [
  {
    kind: 'section',
    tool: 'bandit',
    manifest: 'pyproject.toml',
    section: 'tool.bandit',
    description: 'Integrate Bandit security linter configuration',
    defaults: {
      exclude_dirs: ['tests', 'test_*'],
      // B101 assert_used, B601 paramiko shell injection
      skips: ['B101', 'B601'],
      assert_used: { skips: ['*_test.py', 'test_*.py'] },
    },
  },
  {
    kind: 'section',
    tool: 'safety',
    manifest: 'pyproject.toml',
    section: 'tool.safety',
    description: 'Integrate Safety dependency vulnerability scanner configuration',
    defaults: {
      ignore: [],
      full_report: true,
      output: 'json',
      continue_on_error: false,
    },
  },
  {
    kind: 'section',
    tool: 'ruff',
    manifest: 'pyproject.toml',
    section: 'tool.ruff',
    description: 'Integrate Ruff linter configuration',
    defaults: {
      'line-length': 120n,
      'target-version': 'py312',
      exclude: ['.git', '.venv', '__pypackages__', 'build', 'dist', 'node_modules'],
      lint: {
        select: ['E', 'F', 'W', 'I', 'N', 'UP', 'S', 'B', 'A', 'C4', 'SIM', 'RUF'],
        ignore: ['E501'],
        fixable: ['ALL'],
      },
    },
  },
  {
    kind: 'section',
    tool: 'mypy',
    manifest: 'pyproject.toml',
    section: 'tool.mypy',
    description: 'Integrate mypy type checker configuration',
    defaults: {
      python_version: '3.12',
      warn_return_any: true,
      warn_unused_configs: true,
      disallow_untyped_defs: true,
      check_untyped_defs: true,
      no_implicit_optional: true,
      strict_equality: true,
    },
  },
  {
    kind: 'section',
    tool: 'clippy',
    manifest: 'Cargo.toml',
    section: 'lints.clippy',
    description: 'Integrate Clippy lint levels',
    defaults: {
      unwrap_used: 'warn',
      expect_used: 'warn',
      panic: 'warn',
      todo: 'warn',
    },
  },
  {
    kind: 'section',
    tool: 'rustc-lints',
    manifest: 'Cargo.toml',
    section: 'lints.rust',
    description: 'Integrate rustc lint levels',
    defaults: {
      unsafe_code: 'forbid',
      unused_must_use: 'deny',
    },
  },
  {
    kind: 'hook-repo',
    tool: 'gitleaks',
    manifest: '.pre-commit-config.yaml',
    description: 'Integrate gitleaks secret scanning pre-commit hook',
    repo: 'https://github.com/gitleaks/gitleaks',
    rev: 'v8.18.0',
    hooks: [{ id: 'gitleaks' }],
    settings: PRE_COMMIT_SETTINGS,
  },
  {
    kind: 'hook-repo',
    tool: 'detect-secrets',
    manifest: '.pre-commit-config.yaml',
    description: 'Integrate detect-secrets pre-commit hook',
    repo: 'https://github.com/Yelp/detect-secrets',
    rev: 'v1.4.0',
    hooks: [{ id: 'detect-secrets', args: ['--baseline', '.secrets.baseline'], exclude: 'package-lock.json' }],
    settings: PRE_COMMIT_SETTINGS,
  },
  {
    kind: 'lines',
    tool: 'gitignore-secrets',
    manifest: '.gitignore',
    description: 'Ignore local environment and private key files',
    lines: ['.env', '.env.*', '!.env.example', '*.pem', '*.key'],
  },
];

export function getToolConfigBlocks(): ToolConfigBlock[] {
  return [...TOOL_CONFIG_BLOCKS];
}

export function getToolConfigBlock(tool: string): ToolConfigBlock | undefined {
  return TOOL_CONFIG_BLOCKS.find((block) => block.tool === tool);
}

export interface PlanOptions {
  /** Per-tool manifest filename overrides, relative to the project root. */
  manifests?: Record<string, string>;
  merger?: ConfigMerger;
}

/**
 * Builds the change set for `tools`. Tools sharing a manifest are merged as
 * one batch so later tools see earlier tools' sections. Manifests are visited
 * in the order their first tool appears in `tools`.
 */
export async function planToolChanges(
  root: string,
  tools: string[],
  options: PlanOptions = {},
): Promise<ConfigChange[]> {
  const merger = options.merger ?? new ConfigMerger();
  const batches = new Map<string, ToolConfigBlock[]>();

  for (const tool of tools) {
    const block = getToolConfigBlock(tool);
    if (!block) {
      const known = TOOL_CONFIG_BLOCKS.map((b) => b.tool).join(', ');
      throw new ConfigurationError(`Unknown tool "${tool}". Known tools: ${known}`);
    }
    const manifest = options.manifests?.[tool] ?? block.manifest;
    const batch = batches.get(manifest) ?? [];
    batch.push(block);
    batches.set(manifest, batch);
  }

  const changes: ConfigChange[] = [];
  for (const [manifest, blocks] of batches) {
    changes.push(...(await merger.planBatch(join(root, manifest), blocks)));
  }
  return changes;
}
