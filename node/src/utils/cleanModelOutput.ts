// Tags some local models wrap their scratch work in
const REASONING_TAGS = [
  'think',
  'thinking',
  'thought',
  'reasoning',
  'plan',
  'scratchpad',
  'tool_call',
  'tool_code',
  'tool_output',
  'call',
  'execute',
];

const PAIRED = new RegExp(`<(${REASONING_TAGS.join('|')})\\b[^>]*>[\\s\\S]*?</\\1\\s*>`, 'gi');
// An opening tag the model never closed swallows the rest of the output.
const UNCLOSED = new RegExp(`<(${REASONING_TAGS.join('|')})\\b[^>]*>[\\s\\S]*$`, 'i');
// A closing tag with no opener (template already opened it) drops everything before it.
const ORPHAN_CLOSE = new RegExp(`^[\\s\\S]*?</(${REASONING_TAGS.join('|')})\\s*>`, 'i');

export function stripReasoning(text: string): string {
  let out = text.replace(PAIRED, '');
  out = out.replace(ORPHAN_CLOSE, '');
  out = out.replace(UNCLOSED, '');
  return out.trim();
}

export function stripCodeFences(text: string): string {
  const txt = text.trim();
  const fenced = /^```[\w-]*\s*\n?([\s\S]*?)\n?```\s*$/.exec(txt);
  if (fenced) return fenced[1].trim();
  return txt;
}

export function cleanModelOutput(text: string): string {
  return stripCodeFences(stripReasoning(text));
}
