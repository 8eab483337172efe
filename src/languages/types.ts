export type LanguageTag = 'python' | 'nodejs' | 'rust' | 'go' | 'cpp' | 'csharp';

export type FileType =
  | 'toml'
  | 'json'
  | 'yaml'
  | 'cmake'
  | 'make'
  | 'text'
  | 'lock'
  | 'python'
  | 'ini'
  | 'javascript'
  | 'typescript'
  | 'xml'
  | 'msbuild'
  | 'editorconfig'
  | 'solution'
  | 'module'
  | 'checksum'
  | 'workspace'
  | 'config'
  | 'unknown';

export type ToolCategory = 'quality' | 'security' | 'build' | 'dependency' | 'testing' | 'formatting';

export interface ConfigFile {
  readonly name: string;
  readonly path: string;
  readonly exists: boolean;
  readonly fileType: FileType;
}

/**
 * `confidence` is an additive, capped ranking signal in [0, 1], not a
 * probability. `indicators` explains each increment, in check order.
 */
export interface LanguageDetectionResult {
  language: LanguageTag;
  confidence: number;
  indicators: string[];
}

/** Tool name to "is configured"; keys are exactly the analyzer's toolNames. */
export type ToolStatusMap = Record<string, boolean>;

export interface ToolRecommendation {
  toolName: string;
  category: ToolCategory;
  description: string;
  configSection: string;
  /** 1 is most important. */
  priority: number;
  modernAlternative?: string;
}

export interface LanguageAnalysis {
  language: LanguageTag;
  detected: boolean;
  confidence: number;
  indicators: string[];
  configFiles: ConfigFile[];
  tools: ToolStatusMap;
  recommendations: ToolRecommendation[];
  missingTools: ToolRecommendation[];
  dependencies: string[];
}
