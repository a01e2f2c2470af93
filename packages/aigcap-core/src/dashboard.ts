/**
 * HTML coverage dashboard.
 *
 * A single self-contained page: inline CSS, no scripts, no external assets.
 * Every value taken from the report goes through `escapeHtml`.
 */

import type { CoverageType, FileRecord, ProjectReport, SymbolEntry } from './types.js';
import { percentage } from './aggregate.js';

const MAX_LISTED_PATHS = 100;

const COVERAGE_BADGES: Record<CoverageType, { css: string; label: string }> = {
  WHOLE: { css: 'badge-whole', label: 'WHOLE' },
  ABOVE_HALF: { css: 'badge-above', label: '&gt;50%' },
  BELOW_HALF: { css: 'badge-below', label: '&lt;50%' },
};

const STYLES = `
  :root {
    --bg: #0a0a0f; --card: #1a1a27; --border: #2a2a40;
    --text: #e8e8f0; --muted: #8888a8;
    --blue: #4d8eff; --green: #34d399; --amber: #fbbf24; --red: #f87171; --purple: #a78bfa;
  }
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body { font-family: -apple-system, 'Segoe UI', sans-serif; background: var(--bg); color: var(--text); line-height: 1.6; }
  .dashboard { max-width: 1600px; margin: 0 auto; padding: 32px 24px; }
  header { display: flex; justify-content: space-between; margin-bottom: 32px; padding-bottom: 24px; border-bottom: 1px solid var(--border); }
  h1 { font-family: monospace; font-size: 28px; color: var(--blue); }
  .meta { text-align: right; color: var(--muted); font-family: monospace; font-size: 13px; }
  h2 { font-size: 18px; margin: 32px 0 12px; }
  .gauge { background: var(--card); border: 1px solid var(--border); border-radius: 16px; padding: 32px; text-align: center; }
  .gauge-value { font-family: monospace; font-size: 64px; font-weight: 700; color: var(--blue); }
  .bar { height: 10px; background: rgba(255,255,255,0.08); border-radius: 5px; overflow: hidden; }
  .bar-fill { height: 100%; background: var(--blue); }
  .stats { display: grid; grid-template-columns: repeat(auto-fit, minmax(180px, 1fr)); gap: 16px; margin-top: 24px; }
  .stat { background: var(--card); border: 1px solid var(--border); border-radius: 12px; padding: 16px; }
  .stat .label { font-size: 12px; text-transform: uppercase; letter-spacing: 1px; color: var(--muted); }
  .stat .value { font-family: monospace; font-size: 28px; font-weight: 700; }
  .ci { margin-top: 24px; padding: 12px 16px; border-radius: 8px; font-family: monospace; }
  .ci-pass { background: rgba(52,211,153,0.12); color: var(--green); }
  .ci-fail { background: rgba(248,113,113,0.12); color: var(--red); }
  table { width: 100%; border-collapse: collapse; background: var(--card); border: 1px solid var(--border); font-size: 13px; }
  th, td { padding: 8px 12px; border-bottom: 1px solid var(--border); text-align: left; vertical-align: top; }
  th { color: var(--muted); font-weight: 600; text-transform: uppercase; font-size: 11px; }
  td.num { text-align: right; font-family: monospace; }
  td.path { font-family: monospace; }
  .badge { padding: 2px 8px; border-radius: 4px; font-size: 11px; font-weight: 700; }
  .badge-whole { background: rgba(248,113,113,0.2); color: var(--red); }
  .badge-above { background: rgba(251,191,36,0.2); color: var(--amber); }
  .badge-below { background: rgba(52,211,153,0.2); color: var(--green); }
  .tag { display: inline-block; margin: 1px 4px 1px 0; padding: 0 6px; border-radius: 4px; background: rgba(167,139,250,0.15); color: var(--purple); font-family: monospace; }
  .none { color: var(--muted); }
  footer { margin-top: 40px; color: var(--muted); font-size: 12px; text-align: center; }
`;

/**
 * Escape text for HTML element content and double-quoted attributes.
 */
export function escapeHtml(value: string | number): string {
  return String(value)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Render the report as a standalone HTML page.
 */
export function renderHtml(report: ProjectReport): string {
  const overallPct = percentage(report.overall.aiLines, report.overall.lines);
  const headered = report.files.filter((f) => f.header !== null);

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>AIGCAP Coverage Dashboard</title>
<style>${STYLES}</style>
</head>
<body>
<div class="dashboard">
  <header>
    <h1>AIGCAP Coverage Dashboard</h1>
    <div class="meta">
      <div>${escapeHtml(report.root)}</div>
      <div>${escapeHtml(report.generatedAt)}</div>
    </div>
  </header>

  <section class="gauge">
    <div class="label">Overall AI code coverage</div>
    <div class="gauge-value">${overallPct.toFixed(1)}%</div>
    ${bar(overallPct)}
    <p class="none">${report.overall.aiLines} AI-generated lines / ${report.overall.lines} total lines across ${report.overall.files} files</p>
  </section>

  <div class="stats">
    ${statCard('Files scanned', report.overall.files)}
    ${statCard('Unreviewed', report.totals.Unreviewed)}
    ${statCard('Reviewed', report.totals.Reviewed)}
    ${statCard('No header', report.totals.NoAigcapHeader)}
    ${statCard('Malformed', report.totals.Malformed)}
    ${statCard('Unsupported', report.totals.Unsupported)}
    ${statCard('100% AI files', report.byCoverageType.WHOLE)}
    ${statCard('&gt;50% AI files', report.byCoverageType.ABOVE_HALF)}
    ${statCard('&lt;50% AI files', report.byCoverageType.BELOW_HALF)}
  </div>

  ${ciBanner(report)}
  ${renderPathList(`Needs review (${report.unreviewedFiles.length})`, report.unreviewedFiles)}

  <h2>By directory</h2>
  ${renderDirectoryTable(report)}

  <h2>By language</h2>
  ${renderLanguageTable(report)}

  <h2>Files with AI code (${headered.length})</h2>
  ${renderFileTable(headered)}

  ${renderLibraryTable(headered)}
  ${renderMalformedTable(report)}
  ${renderPathList(`Files without header (${report.byClassification.NoAigcapHeader.files})`, report.byClassification.NoAigcapHeader.paths)}
  ${renderIoFailures(report)}

  <footer>AIGCAP v1 - AI-Generated Code Annotation Protocol</footer>
</div>
</body>
</html>
`;
}

function bar(pct: number): string {
  return `<div class="bar"><div class="bar-fill" style="width:${Math.min(pct, 100).toFixed(1)}%"></div></div>`;
}

/** `label` is trusted markup; callers pass literals */
function statCard(label: string, value: number): string {
  return `<div class="stat"><div class="label">${label}</div><div class="value">${value}</div></div>`;
}

function ciBanner(report: ProjectReport): string {
  const count = report.unreviewedFiles.length;
  if (count === 0) {
    return '<div class="ci ci-pass">CI gate: pass (no unreviewed files)</div>';
  }
  return `<div class="ci ci-fail">CI gate: fail (${count} unreviewed file${count === 1 ? '' : 's'})</div>`;
}

function emptyRow(colspan: number, text: string): string {
  return `<tr><td colspan="${colspan}" class="none">${text}</td></tr>`;
}

function renderDirectoryTable(report: ProjectReport): string {
  const rows = report.byDirectory.map(
    (d) => `<tr>
      <td class="path">${escapeHtml(d.directory)}</td>
      <td class="num">${d.files}</td>
      <td class="num">${d.counts.Unreviewed}</td>
      <td class="num">${d.counts.Reviewed}</td>
      <td class="num">${d.counts.NoAigcapHeader}</td>
      <td class="num">${d.counts.Malformed}</td>
      <td class="num">${d.counts.Unsupported}</td>
      <td class="num">${d.lines}</td>
      <td class="num">${d.aiLines}</td>
    </tr>`,
  );

  return `<table>
    <thead><tr><th>Directory</th><th>Files</th><th>Unreviewed</th><th>Reviewed</th><th>No header</th><th>Malformed</th><th>Unsupported</th><th>Lines</th><th>AI lines</th></tr></thead>
    <tbody>${rows.join('') || emptyRow(9, 'No files')}</tbody>
  </table>`;
}

function renderLanguageTable(report: ProjectReport): string {
  const rows = report.byLanguage.map((l) => {
    const pct = percentage(l.aiLines, l.lines);
    return `<tr>
      <td>${escapeHtml(l.language)}</td>
      <td class="num">${l.files}</td>
      <td class="num">${l.lines}</td>
      <td class="num">${l.aiLines}</td>
      <td>${bar(pct)} ${pct.toFixed(1)}%</td>
    </tr>`;
  });

  return `<table>
    <thead><tr><th>Language</th><th>Files</th><th>Lines</th><th>AI lines</th><th>AI share</th></tr></thead>
    <tbody>${rows.join('') || emptyRow(5, 'No supported files')}</tbody>
  </table>`;
}

function symbolTitle(entry: SymbolEntry): string {
  return entry.extent.kind === 'whole'
    ? 'AI wrote the entire body'
    : `AI wrote lines ${entry.extent.start}~${entry.extent.end}`;
}

function tags(names: { label: string; title?: string }[]): string {
  if (names.length === 0) return '<span class="none">-</span>';
  return names
    .map((n) => {
      const title = n.title ? ` title="${escapeHtml(n.title)}"` : '';
      return `<span class="tag"${title}>${escapeHtml(n.label)}</span>`;
    })
    .join('');
}

function symbolTags(entries: SymbolEntry[]): string {
  return tags(entries.map((e) => ({ label: e.name, title: symbolTitle(e) })));
}

function renderFileTable(files: FileRecord[]): string {
  const sorted = [...files].sort((a, b) => b.aiLines - a.aiLines || (a.path < b.path ? -1 : 1));

  const rows = sorted.map((f) => {
    const header = f.header;
    if (!header) return '';
    const badge = COVERAGE_BADGES[header.coverageType];
    const pct = percentage(f.aiLines, f.lines);
    return `<tr>
      <td class="path">${escapeHtml(f.path)}</td>
      <td>${escapeHtml(f.language ?? '')}</td>
      <td><span class="badge ${badge.css}">${badge.label}</span></td>
      <td>${header.reviewedByHuman ? 'YES' : 'NO'}</td>
      <td class="num">${f.lines}</td>
      <td class="num">${f.aiLines}</td>
      <td>${bar(pct)} ${pct.toFixed(1)}%</td>
      <td>${symbolTags(header.methods)}</td>
      <td>${symbolTags(header.structs)}</td>
      <td>${symbolTags(header.traits)}</td>
      <td>${tags(header.libraries.map((l) => ({ label: l.name, title: l.reason })))}</td>
    </tr>`;
  });

  return `<table>
    <thead><tr><th>File</th><th>Lang</th><th>Type</th><th>Reviewed</th><th>Lines</th><th>AI lines</th><th>Coverage</th><th>Methods</th><th>Structs</th><th>Traits</th><th>Libraries</th></tr></thead>
    <tbody>${rows.join('') || emptyRow(11, 'No AIGCAP headers found')}</tbody>
  </table>`;
}

function renderLibraryTable(files: FileRecord[]): string {
  const libraries = new Map<string, { reasons: Set<string>; paths: string[] }>();
  for (const file of files) {
    for (const lib of file.header?.libraries ?? []) {
      let entry = libraries.get(lib.name);
      if (!entry) {
        entry = { reasons: new Set(), paths: [] };
        libraries.set(lib.name, entry);
      }
      entry.reasons.add(lib.reason);
      if (!entry.paths.includes(file.path)) entry.paths.push(file.path);
    }
  }
  if (libraries.size === 0) return '';

  const rows = [...libraries.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(
      ([name, { reasons, paths }]) => `<tr>
      <td><strong>${escapeHtml(name)}</strong></td>
      <td>${[...reasons].map(escapeHtml).join('; ')}</td>
      <td class="num">${paths.length}</td>
      <td class="path">${paths.slice(0, 5).map(escapeHtml).join(', ')}${paths.length > 5 ? ', ...' : ''}</td>
    </tr>`,
    );

  return `<h2>AI-selected libraries (${libraries.size})</h2>
  <table>
    <thead><tr><th>Library</th><th>Reason</th><th>Files</th><th>Locations</th></tr></thead>
    <tbody>${rows.join('')}</tbody>
  </table>`;
}

function renderMalformedTable(report: ProjectReport): string {
  const malformed = report.files.filter((f) => f.classification === 'Malformed');
  if (malformed.length === 0) return '';

  const rows = malformed.map(
    (f) => `<tr><td class="path">${escapeHtml(f.path)}</td><td>${escapeHtml(f.malformedMessage ?? '')}</td></tr>`,
  );
  return `<h2>Malformed headers (${malformed.length})</h2>
  <table>
    <thead><tr><th>File</th><th>Problem</th></tr></thead>
    <tbody>${rows.join('')}</tbody>
  </table>`;
}

function renderPathList(title: string, paths: string[]): string {
  if (paths.length === 0) return '';
  const shown = paths.slice(0, MAX_LISTED_PATHS).map((p) => `<tr><td class="path">${escapeHtml(p)}</td></tr>`);
  const more =
    paths.length > MAX_LISTED_PATHS
      ? `<tr><td class="none">... and ${paths.length - MAX_LISTED_PATHS} more</td></tr>`
      : '';
  return `<h2>${escapeHtml(title)}</h2>
  <table>
    <thead><tr><th>File</th></tr></thead>
    <tbody>${shown.join('')}${more}</tbody>
  </table>`;
}

function renderIoFailures(report: ProjectReport): string {
  if (report.ioFailures.length === 0) return '';
  const rows = report.ioFailures.map(
    (f) => `<tr><td class="path">${escapeHtml(f.path)}</td><td>${escapeHtml(f.message)}</td></tr>`,
  );
  return `<h2>Unreadable paths (${report.ioFailures.length})</h2>
  <table>
    <thead><tr><th>Path</th><th>Error</th></tr></thead>
    <tbody>${rows.join('')}</tbody>
  </table>`;
}
