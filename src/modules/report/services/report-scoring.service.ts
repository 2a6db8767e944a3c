import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { AppConfigService } from '../../../config/config.service';
import { ChatMessage, OpenAIService, OpenAIUnavailableError } from '../../openai/openai.service';
import { AggregateAnalysis } from '../../analysis/types/analysis.types';
import { Feedback, KNOWLEDGE_MAX, SPEECH_MAX } from '../types/report.types';

export interface ScoringQuestion {
    question: string;
    framework: string;
    answerText: string;
    analysis: AggregateAnalysis;
}

export interface ModelScores {
    knowledge: number;
    speech: number;
    overallFeedback: Feedback;
    // ScoringQuestion 순서, 모델이 빠뜨린 항목은 null
    perQuestion: (Feedback | null)[];
}

const numberish = z.preprocess((v) => {
    if (typeof v === 'string') {
        const n = Number(v);
        return Number.isFinite(n) ? n : v;
    }
    return v;
}, z.number());

const FeedbackJsonSchema = z.object({
    strengths: z.array(z.string()).default([]),
    areasOfImprovement: z.array(z.string()).default([]),
});

const ReportScoringJsonSchema = z.object({
    knowledgeCompetence: numberish.transform((n) => Math.max(0, Math.min(KNOWLEDGE_MAX, n))),
    speechStructure: numberish.transform((n) => Math.max(0, Math.min(SPEECH_MAX, n))),
    overallFeedback: FeedbackJsonSchema,
    perQuestion: z
        .array(FeedbackJsonSchema.extend({ questionNumber: numberish }))
        .default([]),
});

/** 분석된 답변 전체를 모델에 보내 점수와 피드백을 받는다. 실패는 호출자가 처리. */
@Injectable()
export class ReportScoringService {
    constructor(
        private readonly openai: OpenAIService,
        private readonly config: AppConfigService,
    ) {}

    async score(questions: ScoringQuestion[]): Promise<ModelScores> {
        if (!this.openai.isAvailable) throw new OpenAIUnavailableError();

        // SDK 재시도까지 포함해 한도를 넘으면 abort → 호출자가 휴리스틱으로 전환
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.config.report.scoringTimeoutMs);
        let res: z.output<typeof ReportScoringJsonSchema>;
        try {
            res = await this.openai.chatJson(ReportScoringJsonSchema, this.buildMessages(questions), {
                temperature: 0.2,
                signal: controller.signal,
            });
        } finally {
            clearTimeout(timer);
        }

        const byNumber = new Map(res.perQuestion.map((q) => [q.questionNumber, q]));
        return {
            knowledge: res.knowledgeCompetence,
            speech: res.speechStructure,
            overallFeedback: res.overallFeedback,
            perQuestion: questions.map((_, i) => {
                const q = byNumber.get(i + 1);
                return q ? { strengths: q.strengths, areasOfImprovement: q.areasOfImprovement } : null;
            }),
        };
    }

    private buildMessages(questions: ScoringQuestion[]): ChatMessage[] {
        const system = [
            'You are an interview coach writing a final practice report.',
            `Score knowledge/competence from 0 to ${KNOWLEDGE_MAX} (accuracy, depth, relevance, examples).`,
            `Score speech/structure/fluency from 0 to ${SPEECH_MAX} (framework use, pacing, fluency).`,
            'Judge only the answers given. Return JSON only:',
            '{"knowledgeCompetence":0,"speechStructure":0,',
            ' "overallFeedback":{"strengths":["..."],"areasOfImprovement":["..."]},',
            ' "perQuestion":[{"questionNumber":1,"strengths":["..."],"areasOfImprovement":["..."]}]}',
        ].join('\n');

        const user = questions
            .map((q, i) => {
                const statuses = Object.entries(q.analysis.sectionStatuses)
                    .map(([name, status]) => `${name}=${status}`)
                    .join(', ');
                return [
                    `Question ${i + 1} (${q.framework}): ${q.question}`,
                    `Answer:\n${q.answerText}`,
                    `Sections: ${statuses}`,
                    `Composite score: ${q.analysis.compositeScore}`,
                    `Dimensions: ${JSON.stringify(q.analysis.perDimension.map((d) => d.payload))}`,
                ].join('\n');
            })
            .join('\n\n');

        return [
            { role: 'system', content: system },
            { role: 'user', content: user },
        ];
    }
}
