import { Injectable, Logger } from '@nestjs/common';
import { EmptyAnswerError } from '../../common/errors';
import { AppConfigService } from '../../config/config.service';
import { PracticeService } from '../practice/practice.service';
import { computeSnapshot } from '../practice/progress';
import { SectionAnswerStore } from '../practice/stores/section-answer.store';
import { ProgressSnapshot, SectionAnswer } from '../practice/types/practice.types';
import { AnalysisAggregator } from './analysis.aggregator';
import { combineAnswerText, orderedSections } from './answer-text';
import { AggregateAnalysis, AnalysisInput, StoredAnalysis } from './types/analysis.types';

export interface AnalyzeQuestionResult {
    answerId: number;
    snapshot: ProgressSnapshot;
    analysis: AggregateAnalysis;
}

export interface LatestAnalysisView {
    practiceId: number;
    questionIndex: number;
    latest: StoredAnalysis | null;
    // 분석에 쓰인 답변 이후 다시 제출된 섹션이 있으면 true (다음 분석 요청 전까지 갱신되지 않음)
    stale: boolean;
}

export interface AnalyzeOptions {
    kinds?: readonly string[];
    timeoutMs?: number;
}

@Injectable()
export class AnalysisService {
    private readonly logger = new Logger(AnalysisService.name);

    constructor(
        private readonly practices: PracticeService,
        private readonly answers: SectionAnswerStore,
        private readonly aggregator: AnalysisAggregator,
        private readonly config: AppConfigService,
    ) {}

    async analyzeQuestion(
        practiceId: number,
        questionIndex: number,
        options: AnalyzeOptions = {},
    ): Promise<AnalyzeQuestionResult> {
        const kinds = options.kinds ?? this.aggregator.supportedKinds;
        this.aggregator.validateKinds(kinds);

        const { question, framework } = await this.practices.resolveQuestion(practiceId, questionIndex);
        const answers = await this.answers.listForQuestion(practiceId, questionIndex);
        const latest = latestSubmission(answers);
        if (!latest) {
            throw new EmptyAnswerError(
                `No sections have been submitted for question ${questionIndex} of practice ${practiceId}`,
                questionIndex,
            );
        }

        const snapshot = computeSnapshot(framework, answers);
        const sections = orderedSections(framework, answers);

        const input: AnalysisInput = {
            questionText: question.text,
            framework: framework.name,
            frameworkSections: framework.sections,
            sections,
            answerText: combineAnswerText(sections),
            basedOnSubmittedAt: latest.submittedAt,
        };

        const timeoutMs = options.timeoutMs ?? this.config.analysis.perKindTimeoutMs;
        const analysis = await this.aggregator.aggregate(input, kinds, timeoutMs);

        await this.answers.saveAnalysis(practiceId, questionIndex, latest.answerId, analysis);
        this.logger.log(
            `💾 분석 저장: practice=${practiceId} q=${questionIndex} answerId=${latest.answerId}`,
        );

        return { answerId: latest.answerId, snapshot, analysis };
    }

    async getLatestAnalysis(practiceId: number, questionIndex: number): Promise<LatestAnalysisView> {
        await this.practices.resolveQuestion(practiceId, questionIndex);
        const latest = await this.answers.findLatestAnalysis(practiceId, questionIndex);
        let stale = false;
        if (latest) {
            // 저장 시각이 아니라 분석에 쓰인 답변 기준으로 비교 (분석 도중 재제출 포함)
            const basedOn = latest.analysis.basedOnSubmittedAt;
            const cutoff = basedOn ? Date.parse(basedOn) : latest.analyzedAt.getTime();
            const answers = await this.answers.listForQuestion(practiceId, questionIndex);
            stale = answers.some((a) => a.submittedAt.getTime() > cutoff);
        }
        return { practiceId, questionIndex, latest, stale };
    }
}

function latestSubmission(answers: SectionAnswer[]): SectionAnswer | null {
    let latest: SectionAnswer | null = null;
    for (const a of answers) {
        if (
            !latest ||
            a.submittedAt.getTime() > latest.submittedAt.getTime() ||
            (a.submittedAt.getTime() === latest.submittedAt.getTime() && a.answerId > latest.answerId)
        ) {
            latest = a;
        }
    }
    return latest;
}
