import { createHash } from 'crypto';

// Une ligne = un paragraphe ; les lignes vides sont conservées.
export function toParagraphs(text: string): string[] {
  return text.split(/\r\n|\n|\r/).map((s) => s.trim());
}

export function normalizeParagraphs(list: readonly string[]): string[] {
  return list.map((s) => s.trim());
}

export function hashParagraphs(paragraphs: readonly string[]): string {
  const h = createHash('sha256');
  h.update(JSON.stringify(paragraphs), 'utf8');
  return `sha256:${h.digest('hex')}`;
}
