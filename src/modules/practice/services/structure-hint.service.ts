import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { errorMessage } from '../../../common/errors';
import { ChatMessage, OpenAIService } from '../../openai/openai.service';

export interface HintRequestQuestion {
    text: string;
    category: string | null;
}

export interface HintContext {
    track: string;
    difficulty: string | null;
}

const BEHAVIORAL_HINT =
    'Use the STAR method: Situation, Task, Action, Result. Focus on your specific role and measurable outcomes.';
const DESIGN_HINT =
    'Follow G-C-D-I-O: state the goal and the constraints, explain your decision, walk through the implementation, then describe the outcome.';
const TECHNICAL_HINT =
    'Use C-T-E-T-D: set the context, explain the theory, give an example, weigh the trade-offs, then state your decision.';

const numberish = z.preprocess((v) => {
    if (typeof v === 'string') {
        const n = Number(v);
        return Number.isFinite(n) ? n : v;
    }
    return v;
}, z.number().int());

const HintsJsonSchema = z.object({
    hints: z.array(
        z.object({
            question_number: numberish,
            hint: z.string(),
        }),
    ),
});

/** 카테고리 기반 기본 힌트 (생성형 호출 불가/실패 시) */
export function fallbackHint(category: string | null): string {
    const c = (category ?? 'technical').toLowerCase();
    if (c.includes('behavioral')) return BEHAVIORAL_HINT;
    if (c.includes('system') || c.includes('design')) return DESIGN_HINT;
    return TECHNICAL_HINT;
}

@Injectable()
export class StructureHintService {
    private readonly logger = new Logger(StructureHintService.name);

    constructor(private readonly openai: OpenAIService) {}

    /**
     * 질문 순서대로 구조 힌트를 돌려준다.
     * 생성형 호출은 한 번만 하고, 빠진 질문은 카테고리 기본값으로 채운다.
     */
    async generate(questions: HintRequestQuestion[], ctx: HintContext): Promise<string[]> {
        if (questions.length === 0) return [];
        const fallbacks = questions.map((q) => fallbackHint(q.category));

        if (!this.openai.isAvailable) {
            this.logger.warn('OpenAI 미설정 → 기본 구조 힌트 사용');
            return fallbacks;
        }

        try {
            const result = await this.openai.chatJson(HintsJsonSchema, this.buildMessages(questions, ctx), {
                temperature: 0.7,
            });
            const byNumber = new Map<number, string>();
            for (const h of result.hints) {
                const hint = h.hint.trim();
                if (hint) byNumber.set(h.question_number, hint);
            }
            return questions.map((_, i) => byNumber.get(i + 1) ?? fallbacks[i] ?? TECHNICAL_HINT);
        } catch (error) {
            this.logger.warn(`구조 힌트 생성 실패 → 기본값 사용: ${errorMessage(error)}`);
            return fallbacks;
        }
    }

    private buildMessages(questions: HintRequestQuestion[], ctx: HintContext): ChatMessage[] {
        const list = questions
            .map((q, i) => `${i + 1}. ${q.text} [Category: ${q.category ?? 'technical'}]`)
            .join('\n');

        const system = [
            'You are an interview coach. Give a brief structure hint (1-2 lines) for each question.',
            'Focus on how to organize the answer, never on its content.',
            'Name exactly one framework per hint:',
            '- behavioral questions: the STAR method (Situation, Task, Action, Result)',
            '- system design questions: G-C-D-I-O (Goal, Constraints, Decision, Implementation, Outcome)',
            '- technical concept questions: C-T-E-T-D (Context, Theory, Example, Trade-offs, Decision)',
            'Return JSON only.',
        ].join('\n');

        const user = [
            `Interview Track: ${ctx.track}`,
            `Difficulty: ${ctx.difficulty ?? 'unspecified'}`,
            '',
            'Questions:',
            list,
            '',
            'Respond as {"hints":[{"question_number":1,"hint":"..."}]}',
        ].join('\n');

        return [
            { role: 'system', content: system },
            { role: 'user', content: user },
        ];
    }
}
