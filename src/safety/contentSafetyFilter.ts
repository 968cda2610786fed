import * as fs from 'fs-extra';
import { z } from 'zod';

/**
 * Block-list as stored in config/blocked-terms.json. Every term is blocked
 * anywhere in a label, inside longer words included.
 */
export interface BlockList {
  terms: string[];
}

const BlockListSchema = z.object({
  terms: z.array(z.string().min(1)).default([]),
});

// Characters commonly typed in place of a letter
const SUBSTITUTIONS: Record<string, string> = {
  a: 'a@4*',
  b: 'b8',
  e: 'e3*',
  g: 'g9',
  i: 'i1!|*',
  l: 'l1|',
  o: 'o0*',
  s: 's$5',
  t: 't7+',
  u: 'uv*',
};

const SEPARATOR = '[\\s._-]+';
const COMBINING_MARKS = /[\u0300-\u036f]/g;

function escapeForClass(chars: string): string {
  return chars.replace(/[\\\]^-]/g, '\\$&');
}

function charClass(ch: string): string {
  return `[${escapeForClass(SUBSTITUTIONS[ch] ?? ch)}]`;
}

/**
 * "ass" -> [a@4*]+[s$5]{2,}: every letter may repeat, a doubled letter
 * must appear at least twice.
 */
function compactPattern(term: string): string {
  let pattern = '';
  let i = 0;
  while (i < term.length) {
    const ch = term[i];
    let run = 1;
    while (i + run < term.length && term[i + run] === ch) run++;
    pattern += run > 1 ? `${charClass(ch)}{${run},}` : `${charClass(ch)}+`;
    i += run;
  }
  return pattern;
}

/**
 * "f u c k", "s.h.i.t": a separator between every letter.
 */
function spacedPattern(term: string): string {
  return term.split('').map(charClass).join(SEPARATOR);
}

function normalizeTerm(term: string): string {
  return term.toLowerCase().replace(/[^a-z0-9]/g, '');
}

export function normalizeLabel(label: string): string {
  return label.normalize('NFKD').replace(COMBINING_MARKS, '').toLowerCase();
}

export function compileTerm(term: string): RegExp {
  const normalized = normalizeTerm(term);
  return new RegExp(normalized.length > 1
    ? `(?:${compactPattern(normalized)}|${spacedPattern(normalized)})`
    : compactPattern(normalized));
}

export class ContentSafetyFilter {
  private readonly patterns: RegExp[];

  constructor(blockList: BlockList) {
    this.patterns = blockList.terms.filter(t => normalizeTerm(t)).map(t => compileTerm(t));
  }

  /**
   * Decides whether a label may be shown. Pure; safe to call per item.
   */
  isAdmissible(label: string, flagged: boolean = false): boolean {
    if (flagged) {
      return false;
    }
    const text = normalizeLabel(label);
    return !this.patterns.some(pattern => pattern.test(text));
  }

  get termCount(): number {
    return this.patterns.length;
  }
}

export function loadBlockList(filePath: string): BlockList {
  const raw: unknown = fs.readJsonSync(filePath);
  return BlockListSchema.parse(raw);
}

export function createContentSafetyFilter(blockListPath: string): ContentSafetyFilter {
  return new ContentSafetyFilter(loadBlockList(blockListPath));
}
