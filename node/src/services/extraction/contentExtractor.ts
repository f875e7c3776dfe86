import { compile } from 'html-to-text';

export interface ExtractedContent {
  title: string;
  text: string;
  wordCount: number;
}

const SKIPPED = [
  'script',
  'style',
  'noscript',
  'template',
  'svg',
  'canvas',
  'iframe',
  'img',
  'picture',
  'video',
  'audio',
  'nav',
  'header',
  'footer',
  'aside',
  'form',
  'button',
  'select',
  'input',
  '[role="navigation"]',
  '[role="banner"]',
  '[role="contentinfo"]',
  '[aria-hidden="true"]',
  '.advertisement',
  '.ad',
  '.ads',
  '.sidebar',
  '.cookie-banner',
  '.newsletter',
  '.share',
  '.social',
  '#comments',
];

// First matching selector wins, so the most specific content container is preferred over <body>.
const CONTENT_ROOTS = [
  'article',
  'main',
  '[role="main"]',
  '.post-content',
  '.entry-content',
  '.article-body',
  '#main',
  '#content',
  'body',
];

const BOILERPLATE_PHRASES = [
  'cookie policy',
  'we use cookies',
  'terms of service',
  'privacy policy',
  'all rights reserved',
  'sign up',
  'log in',
  'subscribe',
  'accept all',
];

const htmlToText = compile({
  wordwrap: false,
  baseElements: {
    selectors: CONTENT_ROOTS,
    orderBy: 'selectors',
    returnDomByDefault: true,
  },
  limits: { maxBaseElements: 1 },
  selectors: [
    ...SKIPPED.map((selector) => ({ selector, format: 'skip' })),
    { selector: 'a', options: { ignoreHref: true } },
    ...['h1', 'h2', 'h3', 'h4', 'h5', 'h6'].map((selector) => ({
      selector,
      options: { uppercase: false },
    })),
    { selector: 'table', format: 'dataTable', options: { uppercaseHeaderCells: false } },
  ],
});

function decodeEntities(text: string): string {
  return text
    .replace(/&#(\d+);/g, (_m, code: string) => String.fromCharCode(Number(code)))
    .replace(/&#x([0-9a-f]+);/gi, (_m, code: string) => String.fromCharCode(parseInt(code, 16)))
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&');
}

export function extractTitle(html: string): string | undefined {
  const titleMatch = html.match(/<title[^>]*>([\s\S]*?)<\/title>/i);
  const ogMatch = html.match(/<meta[^>]+property=["']og:title["'][^>]*content=["']([^"']*)["']/i);
  const raw = titleMatch?.[1] ?? ogMatch?.[1];
  if (!raw) return undefined;
  const title = decodeEntities(raw).replace(/\s+/g, ' ').trim();
  return title || undefined;
}

function isBoilerplateLine(line: string): boolean {
  if (line.length > 120) return false;
  const lower = line.toLowerCase();
  return BOILERPLATE_PHRASES.some((phrase) => lower.includes(phrase));
}

/**
 * Keeps the main textual content of an HTML page: navigation, ads, scripts and
 * short banner lines are dropped and whitespace is collapsed to single spaces.
 */
export function extractContent(html: string): ExtractedContent {
  const text = htmlToText(html)
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0 && !isBoilerplateLine(line))
    .join(' ')
    .replace(/\s+/g, ' ')
    .trim();

  return {
    title: extractTitle(html) ?? '',
    text,
    wordCount: countWords(text),
  };
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const cut = text.slice(0, maxChars);
  const lastSpace = cut.lastIndexOf(' ');
  return `${(lastSpace > maxChars * 0.8 ? cut.slice(0, lastSpace) : cut).trimEnd()}...`;
}

export function isHtmlContentType(contentType: string): boolean {
  const mime = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  return mime === 'text/html' || mime === 'application/xhtml+xml';
}
