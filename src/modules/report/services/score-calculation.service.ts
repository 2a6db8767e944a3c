import { Injectable } from '@nestjs/common';
import { AggregateAnalysis, isPayloadOf } from '../../analysis/types/analysis.types';
import {
    Feedback,
    KNOWLEDGE_MAX,
    ScoreBlock,
    ScoreSummary,
    SPEECH_MAX,
} from '../types/report.types';

export interface RawScores {
    knowledge: number;
    speech: number;
}

const TOP_N = 5;

@Injectable()
export class ScoreCalculationService {
    /**
     * 분석 결과가 있는 질문들의 composite 평균에 시도 비율을 곱한다.
     * 분석되지 않은 질문은 평균에는 빠지고 비율로만 반영된다.
     */
    heuristicScores(composites: number[], totalQuestions: number): RawScores {
        if (composites.length === 0 || totalQuestions === 0) return { knowledge: 0, speech: 0 };
        const avg = composites.reduce((a, b) => a + b, 0) / composites.length;
        const ratio = composites.length / totalQuestions;
        return {
            knowledge: Math.round((avg / 100) * KNOWLEDGE_MAX * ratio),
            speech: Math.round((avg / 100) * SPEECH_MAX * ratio),
        };
    }

    // 모델 점수(분석된 답변 기준)에 시도 비율 페널티 적용
    applyAttemptRatio(scores: RawScores, analyzed: number, total: number): RawScores {
        const ratio = total === 0 ? 0 : analyzed / total;
        return {
            knowledge: Math.round(clamp(scores.knowledge, 0, KNOWLEDGE_MAX) * ratio),
            speech: Math.round(clamp(scores.speech, 0, SPEECH_MAX) * ratio),
        };
    }

    buildSummary(
        scores: RawScores,
        analyzedQuestions: number,
        totalQuestions: number,
        source: ScoreSummary['source'],
    ): ScoreSummary {
        const knowledge = clamp(scores.knowledge, 0, KNOWLEDGE_MAX);
        const speech = clamp(scores.speech, 0, SPEECH_MAX);
        return {
            knowledgeCompetence: block(knowledge, KNOWLEDGE_MAX),
            speechStructure: block(speech, SPEECH_MAX),
            overallScore: Math.round(((knowledge + speech) / (KNOWLEDGE_MAX + SPEECH_MAX)) * 100),
            analyzedQuestions,
            totalQuestions,
            source,
        };
    }

    /** 섹션 상태와 내용 평가에서 질문 단위 피드백을 만든다 */
    feedbackFromAnalysis(analysis: AggregateAnalysis): Feedback {
        const strengths: string[] = [];
        const improvements: string[] = [];

        for (const [name, status] of Object.entries(analysis.sectionStatuses)) {
            if (status === 'complete') strengths.push(`${name}: well developed`);
            else if (status === 'partial') improvements.push(`${name}: add more specific detail`);
            else improvements.push(`${name}: not covered`);
        }

        for (const r of analysis.perDimension) {
            if (isPayloadOf('content', r.payload)) {
                strengths.push(...r.payload.strengths);
                improvements.push(...r.payload.improvements);
            }
            if (isPayloadOf('pace', r.payload) && r.payload.category === 'too_fast') {
                improvements.push('Pace: slow down to stay easy to follow');
            }
            if (isPayloadOf('pace', r.payload) && r.payload.category === 'too_slow') {
                improvements.push('Pace: speak a little faster');
            }
        }
        return { strengths: dedupe(strengths), areasOfImprovement: dedupe(improvements) };
    }

    // 질문별 피드백을 합쳐 상위 항목만 남김
    overallFeedback(perQuestion: (Feedback | null)[]): Feedback {
        const present = perQuestion.filter((f): f is Feedback => f !== null);
        return {
            strengths: dedupe(present.flatMap((f) => f.strengths)).slice(0, TOP_N),
            areasOfImprovement: dedupe(present.flatMap((f) => f.areasOfImprovement)).slice(0, TOP_N),
        };
    }
}

function block(score: number, maxScore: number): ScoreBlock {
    return { score, maxScore, percentage: Math.floor((score * 100) / maxScore) };
}

function clamp(n: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, n));
}

function dedupe(items: string[]): string[] {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const raw of items) {
        const item = raw.trim();
        if (!item || seen.has(item.toLowerCase())) continue;
        seen.add(item.toLowerCase());
        out.push(item);
    }
    return out;
}
