import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ExtractionRun } from './extraction-run.entity';
import { segmentArticles } from './article.segmenter';
import { aggregateExamples } from './example.aggregator';
import { toTrainingRecord } from './training-record';
import { DEFAULT_EXAMPLE_CAP } from './transitions.constants';
import { AggregateResult, Article, TrainingRecord } from './transitions.types';
import { hashParagraphs } from '../utils/paragraphs';

export type Extraction = AggregateResult & {
  articles: Article[];
  training_records: TrainingRecord[];
  unmatched: number;
};

export type RecordedExtraction = Extraction & {
  doc_id: string;
  hash: string;
};

function parseCap(v?: string): number {
  const n = Number(v);
  return Number.isInteger(n) && n >= 1 ? n : DEFAULT_EXAMPLE_CAP;
}

@Injectable()
export class TransitionsService {
  private readonly logger = new Logger(TransitionsService.name);
  private readonly exampleCap: number;

  constructor(
    private readonly cfg: ConfigService,
    @InjectRepository(ExtractionRun)
    private readonly runs: Repository<ExtractionRun>,
  ) {
    this.exampleCap = parseCap(this.cfg.get<string>('TRANSITIONS_EXAMPLE_CAP'));
  }

  getExampleCap(): number {
    return this.exampleCap;
  }

  extract(paragraphs: readonly string[]): Extraction {
    const articles = segmentArticles(paragraphs);
    let unmatched = 0;
    const result = aggregateExamples(articles, {
      exampleCap: this.exampleCap,
      onUnmatched: () => unmatched++,
    });

    return {
      ...result,
      articles,
      training_records: result.examples.map(toTrainingRecord),
      unmatched,
    };
  }

  async extractAndRecord(
    paragraphs: readonly string[],
    source: { doc_id: string },
  ): Promise<RecordedExtraction> {
    const hash = hashParagraphs(paragraphs);
    const out = this.extract(paragraphs);

    if (!out.articles.length) {
      this.logger.warn(
        `[${source.doc_id}] aucun article structuré ni transition détecté`,
      );
    } else {
      this.logger.log(
        `[${source.doc_id}] articles=${out.articles.length} examples=${out.examples.length} transitions=${out.unique_transitions.length} unmatched=${out.unmatched}`,
      );
    }

    const run = this.runs.create({
      doc_id: source.doc_id,
      hash,
      article_count: out.articles.length,
      example_count: out.examples.length,
      transition_count: out.unique_transitions.length,
      overflow_count: out.overflow_transitions.size,
      unmatched_count: out.unmatched,
    });
    await this.runs.save(run);

    return { ...out, doc_id: source.doc_id, hash };
  }

  async listRuns(limit = 20): Promise<ExtractionRun[]> {
    const take = Math.min(100, Math.max(1, Math.trunc(limit) || 20));
    return this.runs.find({ order: { id: 'DESC' }, take });
  }
}
