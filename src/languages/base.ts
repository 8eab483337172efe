import { join } from 'node:path';

import { codecForPath } from '../core/codecs.js';
import type { DocumentCodec } from '../core/codecs.js';
import type { ConfigMap } from '../core/config-value.js';
import { findMissingTools } from '../core/gap-analysis.js';
import { logger } from '../ui/logger.js';
import { findFiles, isFile, readTextFile } from '../utils/fs.js';
import type { Result } from '../utils/result.js';
import type {
  ConfigFile,
  FileType,
  LanguageAnalysis,
  LanguageDetectionResult,
  LanguageTag,
  ToolRecommendation,
  ToolStatusMap,
} from './types.js';

export const WORKFLOWS_DIR = join('.github', 'workflows');

export const DEFAULT_MIN_CONFIDENCE = 0.3;

/** Accumulates weighted indicators; the total is capped at 1. */
export class DetectionScore {
  private total = 0;
  private readonly indicators: string[] = [];

  add(indicator: string, weight: number): void {
    this.indicators.push(indicator);
    this.total += weight;
  }

  result(language: LanguageTag): LanguageDetectionResult {
    return {
      language,
      confidence: Math.min(Math.max(this.total, 0), 1),
      indicators: [...this.indicators],
    };
  }
}

export function makeConfigFile(name: string, path: string, fileType: FileType): ConfigFile {
  return Object.freeze({ name, path, exists: true, fileType });
}

/**
 * Detection and recommendation contract for one ecosystem. Every method is
 * read-only with respect to the project tree, and a missing or malformed file
 * never makes a method throw: it lowers the score or leaves a tool unset.
 */
export abstract class LanguageAnalyzer {
  abstract readonly language: LanguageTag;

  /** Exact key set of the ToolStatusMap returned by detectTools. */
  abstract readonly toolNames: readonly string[];

  /** Substring found in a CI workflow file → tool it proves is in use. */
  protected readonly workflowMarkers: Record<string, string> = {};

  abstract detect(root: string): Promise<LanguageDetectionResult>;

  abstract getConfigFilePatterns(): Record<string, string>;

  abstract getRecommendedTools(): ToolRecommendation[];

  abstract getSecurityTools(): string[];

  abstract getQualityTools(): string[];

  abstract getFormattingTools(): string[];

  abstract parseDependencies(root: string, configFiles?: ConfigFile[]): Promise<string[]>;

  protected abstract fileTypeFor(filename: string): FileType;

  /** Tool status derived from the config files and manifests only. */
  protected abstract detectToolsFromProject(
    root: string,
    configFiles: ConfigFile[],
    tools: ToolStatusMap,
  ): Promise<void>;

  async detectConfigFiles(root: string): Promise<ConfigFile[]> {
    const configFiles: ConfigFile[] = [];
    for (const name of Object.keys(this.getConfigFilePatterns())) {
      const path = join(root, name);
      if (await isFile(path)) {
        configFiles.push(makeConfigFile(name, path, this.fileTypeFor(name)));
      }
    }
    return configFiles;
  }

  async detectTools(root: string, configFiles: ConfigFile[] = []): Promise<ToolStatusMap> {
    const files = await this.resolveConfigFiles(root, configFiles);
    const tools = this.initialToolStatus();
    await this.detectToolsFromProject(root, files, tools);
    await this.scanWorkflows(root, tools);
    return tools;
  }

  async analyze(root: string, minConfidence = DEFAULT_MIN_CONFIDENCE): Promise<LanguageAnalysis> {
    const detection = await this.detect(root);
    const base: LanguageAnalysis = {
      language: this.language,
      detected: false,
      confidence: detection.confidence,
      indicators: detection.indicators,
      configFiles: [],
      tools: {},
      recommendations: [],
      missingTools: [],
      dependencies: [],
    };

    if (detection.confidence < minConfidence) {
      return base;
    }

    const configFiles = await this.detectConfigFiles(root);
    const tools = await this.detectTools(root, configFiles);
    const recommendations = this.getRecommendedTools();

    return {
      ...base,
      detected: true,
      configFiles,
      tools,
      recommendations,
      missingTools: findMissingTools(tools, recommendations),
      dependencies: await this.parseDependencies(root, configFiles),
    };
  }

  async getMissingTools(root: string): Promise<ToolRecommendation[]> {
    const tools = await this.detectTools(root);
    return findMissingTools(tools, this.getRecommendedTools());
  }

  protected async resolveConfigFiles(root: string, configFiles: ConfigFile[]): Promise<ConfigFile[]> {
    return configFiles.length > 0 ? configFiles : this.detectConfigFiles(root);
  }

  protected initialToolStatus(): ToolStatusMap {
    const tools: ToolStatusMap = {};
    for (const name of this.toolNames) {
      tools[name] = false;
    }
    return tools;
  }

  protected hasConfigFile(configFiles: ConfigFile[], ...names: string[]): boolean {
    return configFiles.some((file) => file.exists && names.includes(file.name));
  }

  protected findConfigFile(configFiles: ConfigFile[], name: string): ConfigFile | undefined {
    return configFiles.find((file) => file.exists && file.name === name);
  }

  /** Only ever flips tools to true; a later workflow cannot unset one. */
  protected async scanWorkflows(root: string, tools: ToolStatusMap): Promise<void> {
    const markers = Object.entries(this.workflowMarkers);
    if (markers.length === 0) return;

    const workflowsDir = join(root, WORKFLOWS_DIR);
    const workflows = await findFiles(workflowsDir, '*.{yml,yaml}');

    for (const workflow of workflows) {
      const path = join(workflowsDir, workflow);
      const content = await readTextFile(path);
      if (!content.ok) {
        logger.debug('Failed to read workflow file', { path, error: content.error });
        continue;
      }
      for (const [marker, tool] of markers) {
        if (content.value.includes(marker)) {
          tools[tool] = true;
        }
      }
    }
  }

  /** Reads a manifest as text; failures are logged and returned, never thrown. */
  protected async readManifestText(path: string): Promise<Result<string>> {
    const content = await readTextFile(path);
    if (!content.ok) {
      logger.debug('Failed to read manifest', { language: this.language, path, error: content.error });
    }
    return content;
  }

  /** Reads and parses a structured manifest (TOML, JSON or YAML by extension). */
  protected async readManifest(path: string, codec?: DocumentCodec): Promise<Result<ConfigMap>> {
    const content = await this.readManifestText(path);
    if (!content.ok) return content;

    const parsed = (codec ?? codecForPath(path)).parse(content.value);
    if (!parsed.ok) {
      logger.debug('Failed to parse manifest', { language: this.language, path, error: parsed.error });
    }
    return parsed;
  }
}
