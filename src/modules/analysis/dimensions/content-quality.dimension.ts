import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { AnalysisFailureError } from '../../../common/errors';
import { ChatMessage, OpenAIService } from '../../openai/openai.service';
import { heuristicQuality } from '../composite-score';
import {
    AnalysisInput,
    ContentPayload,
    SectionQuality,
    SectionQualitySchema,
} from '../types/analysis.types';
import { AnalysisDimension } from './analysis-dimension';

type ContentSection = ContentPayload['sections'][number];

// 모델 응답은 대소문자/공백이 섞여 와도 허용
const qualityish = z.preprocess(
    (v) => (typeof v === 'string' ? v.trim().toLowerCase() : v),
    SectionQualitySchema,
);

const ContentJudgmentSchema = z.object({
    sections: z.array(
        z.object({
            name: z.string(),
            quality: qualityish,
            feedback: z.string().default(''),
        }),
    ),
    key_insight: z.string().default(''),
    strengths: z.array(z.string()).default([]),
    improvements: z.array(z.string()).default([]),
});

@Injectable()
export class ContentQualityDimension implements AnalysisDimension<'content'> {
    readonly kind = 'content' as const;
    private readonly logger = new Logger(ContentQualityDimension.name);

    constructor(private readonly openai: OpenAIService) {}

    async analyze(input: AnalysisInput, signal: AbortSignal): Promise<ContentPayload> {
        if (!this.openai.isAvailable) {
            throw new AnalysisFailureError(this.kind, 'generative model is not configured');
        }

        const judgment = await this.openai.chatJson(ContentJudgmentSchema, this.buildMessages(input), {
            temperature: 0.2,
            signal,
        });

        const byName = new Map(judgment.sections.map((s) => [s.name.trim().toLowerCase(), s]));
        const submitted = new Map(input.sections.map((s) => [s.name, s]));

        const sections = input.frameworkSections.map((name): ContentSection => {
            const answer = submitted.get(name);
            if (!answer) return { name, quality: 'missing', feedback: '' };

            const judged = byName.get(name.toLowerCase());
            if (!judged) {
                this.logger.warn(`내용 평가에 섹션 누락: ${name} → 휴리스틱 사용`);
                return { name, quality: heuristicQuality(answer.answerText), feedback: '' };
            }
            // 제출된 섹션은 missing이 될 수 없다
            const quality: SectionQuality = judged.quality === 'missing' ? 'partial' : judged.quality;
            return { name, quality, feedback: judged.feedback };
        });

        return {
            kind: 'content',
            sections,
            keyInsight: judgment.key_insight,
            strengths: judgment.strengths,
            improvements: judgment.improvements,
        };
    }

    neutralPayload(): ContentPayload {
        return { kind: 'content', sections: [], keyInsight: '', strengths: [], improvements: [] };
    }

    private buildMessages(input: AnalysisInput): ChatMessage[] {
        const system = [
            `You are an interview coach grading an answer structured with the ${input.framework} framework.`,
            `Sections in order: ${input.frameworkSections.join(', ')}.`,
            'For every submitted section rate quality as "good" (specific and complete) or "partial" (vague or thin).',
            'Sections that were not submitted are "missing".',
            'Return JSON only:',
            '{"sections":[{"name":"...","quality":"good|partial|missing","feedback":"one sentence"}],',
            ' "key_insight":"one sentence","strengths":["..."],"improvements":["..."]}',
        ].join('\n');

        const user = [`Question: ${input.questionText}`, '', 'Answer:', input.answerText].join('\n');

        return [
            { role: 'system', content: system },
            { role: 'user', content: user },
        ];
    }
}
