import type { ToolRecommendation, ToolStatusMap } from '../languages/types.js';

/** Catalog entries whose tool is not configured, most important first. */
export function findMissingTools(status: ToolStatusMap, catalog: ToolRecommendation[]): ToolRecommendation[] {
  return catalog
    .filter((rec) => status[rec.toolName] !== true)
    .map((rec, index) => ({ rec, index }))
    .sort((a, b) => a.rec.priority - b.rec.priority || a.index - b.index)
    .map(({ rec }) => rec);
}

export function formatRecommendation(rec: ToolRecommendation): string {
  return `Configure ${rec.toolName}: ${rec.description} (${rec.configSection})`;
}

export function formatRecommendations(status: ToolStatusMap, catalog: ToolRecommendation[]): string[] {
  return findMissingTools(status, catalog).map(formatRecommendation);
}
