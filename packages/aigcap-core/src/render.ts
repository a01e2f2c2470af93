import type { ProjectReport } from './types.js';
import { renderHtml } from './dashboard.js';

export interface RenderedReport {
  json: string;
  html: string;
}

/**
 * Serialize the report as pretty-printed JSON. The summary keys come first
 * (`totals`, `byDirectory`, `byClassification`, `unreviewedFiles`), the
 * remaining report fields follow.
 */
export function renderJson(report: ProjectReport): string {
  const { totals, byDirectory, byClassification, unreviewedFiles, ...rest } = report;
  return `${JSON.stringify({ totals, byDirectory, byClassification, unreviewedFiles, ...rest }, null, 2)}\n`;
}

/** Render both outputs of a scan */
export function renderReport(report: ProjectReport): RenderedReport {
  return {
    json: renderJson(report),
    html: renderHtml(report),
  };
}
