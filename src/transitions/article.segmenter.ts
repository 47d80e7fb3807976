import { Article } from './transitions.types';
import {
  HEADER_PATTERN,
  MARKER,
  TRANSITIONS_LABEL,
} from './transitions.constants';

export function isHeader(text: string): boolean {
  return HEADER_PATTERN.test(text);
}

/**
 * Découpe la suite de paragraphes en articles (narratif + transitions).
 *
 * Un bloc s'ouvre sur le marqueur exact, le narratif court jusqu'au libellé
 * "Transitions", puis les transitions jusqu'au prochain en-tête d'article.
 * Le curseur reprend SUR l'en-tête qui a fermé le bloc, pas après.
 */
export function segmentArticles(paragraphs: readonly string[]): Article[] {
  const articles: Article[] = [];
  const n = paragraphs.length;
  let i = 0;

  while (i < n) {
    if (paragraphs[i] !== MARKER) {
      i++;
      continue;
    }

    const parts: string[] = [];
    let j = i + 1;
    while (j < n && !paragraphs[j].startsWith(TRANSITIONS_LABEL)) {
      if (paragraphs[j]) parts.push(paragraphs[j]);
      j++;
    }
    const narrative = parts.join(' ').trim();

    const transitions: string[] = [];
    let k = j + 1;
    while (k < n) {
      const t = paragraphs[k];
      if (!t) {
        k++;
        continue;
      }
      if (isHeader(t)) break;
      transitions.push(t);
      k++;
    }

    if (narrative && transitions.length) {
      articles.push({ narrative, transitions });
    }

    i = k;
  }

  return articles;
}
