import { splitOnTransition } from './transition.splitter';
import { DEFAULT_EXAMPLE_CAP } from './transitions.constants';
import {
  AggregateResult,
  Article,
  Example,
  TransitionFrequency,
} from './transitions.types';

export interface AggregateOptions {
  /** Max d'exemples retenus par transition ; sert aussi de seuil "overflow". */
  exampleCap?: number;
  /** Appelé quand une transition n'apparaît pas telle quelle dans son narratif. */
  onUnmatched?: (article: Article, transition: string) => void;
}

function filterCounts(
  counts: Map<string, number>,
  keep: (count: number) => boolean,
): TransitionFrequency {
  return new Map([...counts].filter(([, c]) => keep(c)));
}

export function aggregateExamples(
  articles: readonly Article[],
  opts: AggregateOptions = {},
): AggregateResult {
  const cap = opts.exampleCap ?? DEFAULT_EXAMPLE_CAP;

  // 1) occurrences totales, avant tout plafond
  const counts = new Map<string, number>();
  for (const { transitions } of articles) {
    for (const t of transitions) counts.set(t, (counts.get(t) ?? 0) + 1);
  }

  // 2) au plus `cap` exemples par transition, dans l'ordre du document
  const examples: Example[] = [];
  const accepted = new Map<string, number>();
  for (const article of articles) {
    for (const t of article.transitions) {
      const taken = accepted.get(t) ?? 0;
      if (taken >= cap) continue;

      const split = splitOnTransition(article.narrative, t);
      if (!split) {
        opts.onUnmatched?.(article, t);
        continue;
      }
      if (!split.before || !split.after) continue;

      examples.push({
        paragraph_a: split.before,
        transition: t,
        paragraph_b: split.after,
      });
      accepted.set(t, taken + 1);
    }
  }

  return {
    examples,
    transition_counts: new Map(counts),
    unique_transitions: [...counts.keys()].sort(),
    duplicate_transitions: filterCounts(counts, (c) => c > 1),
    overflow_transitions: filterCounts(counts, (c) => c > cap),
  };
}
