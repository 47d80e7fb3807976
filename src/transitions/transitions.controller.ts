import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Post,
  Query,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { RecordedExtraction, TransitionsService } from './transitions.service';
import { frequencyEntries } from './frequency';
import { FrequencyEntry } from './transitions.types';
import { normalizeParagraphs, toParagraphs } from '../utils/paragraphs';

export const MAX_UPLOAD_BYTES = 5 * 1024 * 1024;

type ExtractBody = {
  paragraphs?: unknown;
  text?: unknown;
  doc_id?: unknown;
  include_articles?: unknown;
};

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((p) => typeof p === 'string');
}

type FrequencyKey =
  | 'transition_counts'
  | 'duplicate_transitions'
  | 'overflow_transitions';

// les tables de fréquence partent en tableaux ordonnés (une Map ne se sérialise pas)
type ExtractionResponse = Omit<RecordedExtraction, 'articles' | FrequencyKey> &
  Partial<Pick<RecordedExtraction, 'articles'>> &
  Record<FrequencyKey, FrequencyEntry[]>;

function present(
  out: RecordedExtraction,
  includeArticles: boolean,
): ExtractionResponse {
  const { articles, ...rest } = out;
  return {
    ...rest,
    ...(includeArticles ? { articles } : {}),
    transition_counts: frequencyEntries(out.transition_counts),
    duplicate_transitions: frequencyEntries(out.duplicate_transitions),
    overflow_transitions: frequencyEntries(out.overflow_transitions),
  };
}

function docIdFrom(v: unknown, fallback: string): string {
  return typeof v === 'string' && v.trim() ? v.trim() : fallback;
}

@Controller('transitions')
export class TransitionsController {
  constructor(private readonly transitions: TransitionsService) {}

  @Post('extract')
  async postExtract(@Body() body: ExtractBody | undefined) {
    const list = body?.paragraphs;
    const text = body?.text;
    if ((list === undefined) === (text === undefined)) {
      throw new BadRequestException(
        'Fournir exactement un champ parmi "paragraphs" et "text"',
      );
    }

    let paragraphs: string[];
    if (list !== undefined) {
      if (!isStringArray(list)) {
        throw new BadRequestException(
          '"paragraphs" doit être un tableau de chaînes',
        );
      }
      paragraphs = normalizeParagraphs(list);
    } else {
      if (typeof text !== 'string') {
        throw new BadRequestException('"text" doit être une chaîne');
      }
      paragraphs = toParagraphs(text);
    }

    const out = await this.transitions.extractAndRecord(paragraphs, {
      doc_id: docIdFrom(body?.doc_id, 'inline'),
    });
    return present(out, body?.include_articles === true);
  }

  @Post('upload')
  @UseInterceptors(
    FileInterceptor('file', { limits: { fileSize: MAX_UPLOAD_BYTES } }),
  )
  async postUpload(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() body: { doc_id?: unknown } | undefined,
  ) {
    if (!file || !file.size) {
      throw new BadRequestException('Fichier "file" manquant ou vide');
    }
    const paragraphs = toParagraphs(file.buffer.toString('utf8'));
    const out = await this.transitions.extractAndRecord(paragraphs, {
      doc_id: docIdFrom(body?.doc_id, file.originalname),
    });
    return present(out, false);
  }

  @Get('runs')
  async getRuns(@Query('limit') limit?: string) {
    return this.transitions.listRuns(limit === undefined ? 20 : Number(limit));
  }
}
