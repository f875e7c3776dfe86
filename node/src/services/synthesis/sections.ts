export type ReportSections = {
  summary: string;
  findings: string[];
  conclusion: string;
};

type SectionKey = keyof ReportSections;

const HEADING = /^\s*(?:#{1,6}\s+(.+?)|\*\*(.+?)\*\*:?)\s*#*\s*$/;
const BULLET = /^\s*(?:[-*•+]|\d+[.)])\s+(.*)$/;

function classifyHeading(line: string): SectionKey | undefined {
  const m = HEADING.exec(line);
  if (!m) return undefined;
  const name = (m[1] ?? m[2] ?? '').replace(/[*:#]/g, '').trim().toLowerCase();
  if (/conclusion|final thoughts/.test(name)) return 'conclusion';
  if (/summary|overview|tl;?dr/.test(name)) return 'summary';
  if (/finding|detail|analysis|discussion|key points/.test(name)) return 'findings';
  return undefined;
}

function paragraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map((p) => p.replace(/\s+/g, ' ').trim())
    .filter(Boolean);
}

/** Bullets become one item each; loose paragraphs become items too. */
export function splitFindings(text: string): string[] {
  const items: string[] = [];
  let open = false;

  for (const line of text.split('\n')) {
    const bullet = BULLET.exec(line);
    if (bullet) {
      items.push(bullet[1].trim());
      open = true;
    } else if (!line.trim()) {
      open = false;
    } else if (HEADING.test(line) && /^\s*#/.test(line)) {
      open = false;
    } else if (open && items.length > 0) {
      items[items.length - 1] = `${items[items.length - 1]} ${line.trim()}`;
    } else {
      items.push(line.trim());
      open = true;
    }
  }

  return items.map((i) => i.replace(/\s+/g, ' ').trim()).filter(Boolean);
}

/**
 * Splits a markdown report into summary, findings and conclusion. Headings
 * (markdown or bold lines) are matched by name; a report without recognised
 * headings is split by paragraph.
 */
export function parseSections(body: string): ReportSections {
  const buckets: Record<SectionKey | 'preamble', string[]> = {
    preamble: [],
    summary: [],
    findings: [],
    conclusion: [],
  };
  let current: SectionKey | 'preamble' = 'preamble';
  let sawHeading = false;

  for (const line of body.split('\n')) {
    const key = classifyHeading(line);
    if (key) {
      current = key;
      sawHeading = true;
      continue;
    }
    buckets[current].push(line);
  }

  if (!sawHeading) {
    const blocks = body
      .split(/\n\s*\n/)
      .map((b) => b.trim())
      .filter(Boolean);
    if (blocks.length === 0) return { summary: '', findings: [], conclusion: '' };
    const collapse = (b: string) => b.replace(/\s+/g, ' ');
    if (blocks.length < 3) {
      return { summary: collapse(blocks[0]), findings: splitFindings(blocks.slice(1).join('\n\n')), conclusion: '' };
    }
    return {
      summary: collapse(blocks[0]),
      findings: splitFindings(blocks.slice(1, -1).join('\n\n')),
      conclusion: collapse(blocks[blocks.length - 1]),
    };
  }

  const summaryText = buckets.summary.join('\n').trim() ||
    buckets.preamble.filter((l) => !/^\s*#/.test(l)).join('\n').trim();
  return {
    summary: paragraphs(summaryText).join('\n\n'),
    findings: splitFindings(buckets.findings.join('\n')),
    conclusion: paragraphs(buckets.conclusion.join('\n')).join('\n\n'),
  };
}
