import type { HistoryEntry } from '@/memory/sessionHistory';
import type { Report } from '@/types/core';

function sourcesSection(report: Report): string[] {
  if (report.citations.length === 0) return [];
  return ['', '## Sources', '', ...report.citations.map((c) => `${c.index}. [${c.title || c.url}](${c.url})`)];
}

/** One report as a standalone Markdown document: title, notice, body, sources. */
export function renderReportMarkdown(report: Report): string {
  const lines = [`# Research Report: ${report.query}`, '', `_Generated ${report.generatedAt}_`];
  if (report.notice) lines.push('', `> ${report.notice}`);
  lines.push('', report.body.trim(), ...sourcesSection(report));
  return `${lines.join('\n')}\n`;
}

/** Every archived report, oldest first, separated by rules. */
export function renderSessionMarkdown(entries: HistoryEntry[], exportedAt: Date = new Date()): string {
  const header = [`# Research Session`, '', `_Exported ${exportedAt.toISOString()}; ${entries.length} report(s)_`];
  if (entries.length === 0) return `${header.join('\n')}\n`;

  const ordered = [...entries].sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  const blocks = ordered.map((entry, i) => {
    const report = entry.report;
    const lines = [`## ${i + 1}. ${entry.query}`, '', `_${entry.createdAt}_`];
    if (report.notice) lines.push('', `> ${report.notice}`);
    // demote the report's own headings one level under the entry heading
    lines.push('', report.body.trim().replace(/^(#{1,5}) /gm, '#$1 '));
    if (report.citations.length > 0) {
      lines.push('', '**Sources**', '', ...report.citations.map((c) => `${c.index}. [${c.title || c.url}](${c.url})`));
    }
    return lines.join('\n');
  });

  return `${[header.join('\n'), ...blocks].join('\n\n---\n\n')}\n`;
}
