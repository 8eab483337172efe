import { DEFAULT_MIN_CONFIDENCE } from './base.js';
import type { LanguageAnalyzer } from './base.js';
import { CppAnalyzer } from './cpp.js';
import { CsharpAnalyzer } from './csharp.js';
import { GoAnalyzer } from './go.js';
import { NodejsAnalyzer } from './nodejs.js';
import { PythonAnalyzer } from './python.js';
import { RustAnalyzer } from './rust.js';
import type { LanguageAnalysis, LanguageDetectionResult, LanguageTag } from './types.js';

export const LANGUAGE_TAGS = ['python', 'nodejs', 'rust', 'go', 'cpp', 'csharp'] as const satisfies readonly LanguageTag[];

export function isLanguageTag(value: string): value is LanguageTag {
  return LANGUAGE_TAGS.some((tag) => tag === value);
}

/**
 * Fixed set of analyzers keyed by tag. Iteration follows registration order,
 * which is also the tie-break order when two languages score the same.
 */
export class LanguageRegistry {
  private readonly analyzers = new Map<LanguageTag, LanguageAnalyzer>();

  register(analyzer: LanguageAnalyzer): void {
    this.analyzers.set(analyzer.language, analyzer);
  }

  getAnalyzer(tag: LanguageTag): LanguageAnalyzer | undefined {
    return this.analyzers.get(tag);
  }

  getLanguageTags(): LanguageTag[] {
    return [...this.analyzers.keys()];
  }

  /** Languages at or above the threshold, highest confidence first. */
  async detectLanguages(root: string, minConfidence = DEFAULT_MIN_CONFIDENCE): Promise<LanguageDetectionResult[]> {
    const results: LanguageDetectionResult[] = [];
    for (const analyzer of this.analyzers.values()) {
      const result = await analyzer.detect(root);
      if (result.confidence >= minConfidence) {
        results.push(result);
      }
    }
    // Array.prototype.sort is stable, so ties keep registry order.
    return results.sort((a, b) => b.confidence - a.confidence);
  }

  async detectPrimaryLanguage(root: string, minConfidence = DEFAULT_MIN_CONFIDENCE): Promise<LanguageTag | null> {
    const [primary] = await this.detectLanguages(root, minConfidence);
    return primary ? primary.language : null;
  }

  /**
   * Full analysis for the requested languages, or for every detected language
   * when none are named. Requested tags that are not registered are skipped.
   */
  async analyzeProject(
    root: string,
    tags?: LanguageTag[],
    minConfidence = DEFAULT_MIN_CONFIDENCE,
  ): Promise<LanguageAnalysis[]> {
    const selected = tags ?? (await this.detectLanguages(root, minConfidence)).map((result) => result.language);

    const analyses: LanguageAnalysis[] = [];
    for (const tag of selected) {
      const analyzer = this.getAnalyzer(tag);
      if (analyzer) {
        analyses.push(await analyzer.analyze(root, minConfidence));
      }
    }
    return analyses;
  }
}

export function createLanguageRegistry(): LanguageRegistry {
  const registry = new LanguageRegistry();
  registry.register(new PythonAnalyzer());
  registry.register(new NodejsAnalyzer());
  registry.register(new RustAnalyzer());
  registry.register(new GoAnalyzer());
  registry.register(new CppAnalyzer());
  registry.register(new CsharpAnalyzer());
  return registry;
}
