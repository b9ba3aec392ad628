import { parseYaml } from '../utils/fs.js';

const FRONT_MATTER = /^---[ \t]*\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)([\s\S]*)$/;

export interface FrontMatter {
  /** Metadata mapping; `{}` when there is no block or it is not a mapping. */
  meta: Record<string, unknown>;
  body: string;
}

/** Split a leading `---` YAML block from markdown. Throws on malformed YAML. */
export function parseFrontMatter(content: string): FrontMatter {
  const m = FRONT_MATTER.exec(content);
  if (!m) return { meta: {}, body: content };

  const parsed = parseYaml(m[1]);
  return { meta: isMapping(parsed) ? parsed : {}, body: m[2] };
}

function isMapping(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}

/** Text of the first `# ` heading, if any. */
export function firstHeading(body: string): string | null {
  for (const line of body.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.startsWith('# ')) return trimmed.slice(2).trim();
  }
  return null;
}
