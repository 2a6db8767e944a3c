import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
    InterviewNotFoundError,
    ReportNotFoundError,
    ReportSynthesisFailure,
    errorMessage,
} from '../../common/errors';
import { combineAnswerText, orderedSections } from '../analysis/answer-text';
import { StoredAnalysis } from '../analysis/types/analysis.types';
import { PracticeService } from '../practice/practice.service';
import { SectionAnswerStore } from '../practice/stores/section-answer.store';
import { ReportScoringService } from './services/report-scoring.service';
import { ScoreCalculationService } from './services/score-calculation.service';
import { ReportStore } from './stores/report.store';
import { Feedback, ReportQuestion, ReportRecord, ScoreSummary } from './types/report.types';

interface CollectedQuestion {
    summary: ReportQuestion;
    stored: StoredAnalysis | null;
    answerText: string;
}

function isAnalyzed(q: CollectedQuestion): q is CollectedQuestion & { stored: StoredAnalysis } {
    return q.stored !== null;
}

@Injectable()
export class ReportService {
    private readonly logger = new Logger(ReportService.name);

    constructor(
        private readonly practices: PracticeService,
        private readonly answers: SectionAnswerStore,
        private readonly reports: ReportStore,
        private readonly scoring: ReportScoringService,
        private readonly scoreCalculation: ScoreCalculationService,
    ) {}

    // ===== Public API =====
    async synthesize(interviewId: string): Promise<ReportRecord> {
        const collected = await this.collect(interviewId);
        const analyzed = collected.filter(isAnalyzed);
        if (analyzed.length === 0) {
            throw new ReportSynthesisFailure(interviewId, 'no question has been analyzed yet');
        }

        const total = collected.length;
        let summary: ScoreSummary;
        let overallFeedback: Feedback;
        let modelFeedback: (Feedback | null)[] = [];

        try {
            const model = await this.scoring.score(
                analyzed.map((q) => ({
                    question: q.summary.question,
                    framework: q.summary.framework,
                    answerText: q.answerText,
                    analysis: q.stored.analysis,
                })),
            );
            const scores = this.scoreCalculation.applyAttemptRatio(model, analyzed.length, total);
            summary = this.scoreCalculation.buildSummary(scores, analyzed.length, total, 'llm');
            overallFeedback = model.overallFeedback;
            modelFeedback = model.perQuestion;
        } catch (error) {
            this.logger.warn(`⚠️ 리포트 점수 모델 실패 → 휴리스틱 사용: ${errorMessage(error)}`);
            const scores = this.scoreCalculation.heuristicScores(
                analyzed.map((q) => q.stored.analysis.compositeScore),
                total,
            );
            summary = this.scoreCalculation.buildSummary(scores, analyzed.length, total, 'heuristic');
            overallFeedback = { strengths: [], areasOfImprovement: [] };
        }

        // 분석된 질문만 피드백, 나머지는 null (항목 자체는 유지)
        let analyzedIndex = 0;
        const perQuestionFeedback = collected.map((q) => {
            if (!q.stored) return null;
            const fromModel = modelFeedback[analyzedIndex] ?? null;
            analyzedIndex += 1;
            return fromModel ?? this.scoreCalculation.feedbackFromAnalysis(q.stored.analysis);
        });

        if (summary.source === 'heuristic') {
            overallFeedback = this.scoreCalculation.overallFeedback(perQuestionFeedback);
        }

        const now = new Date();
        const saved = await this.reports.upsert({
            reportId: uuidv4(),
            interviewId,
            scoreSummary: summary,
            overallFeedback,
            questions: collected.map((q) => q.summary),
            perQuestionFeedback,
            createdAt: now,
            updatedAt: now,
        });

        this.logger.log(
            `📄 리포트 생성: interviewId=${interviewId}, overall=${summary.overallScore} (${summary.source}), ${analyzed.length}/${total} 분석됨`,
        );
        return saved;
    }

    async getReport(interviewId: string): Promise<ReportRecord> {
        const report = await this.reports.findByInterview(interviewId);
        if (!report) throw new ReportNotFoundError(interviewId);
        return report;
    }

    // 연습 생성 순 → 질문 순서로 모든 질문과 최신 분석을 모은다
    private async collect(interviewId: string): Promise<CollectedQuestion[]> {
        const practices = await this.practices.listByInterview(interviewId);
        if (practices.length === 0) throw new InterviewNotFoundError(interviewId);

        const out: CollectedQuestion[] = [];
        for (const practice of practices) {
            for (const question of practice.questions) {
                const framework = this.practices.frameworkOf(question);
                const [stored, answers] = await Promise.all([
                    this.answers.findLatestAnalysis(practice.practiceId, question.index),
                    this.answers.listForQuestion(practice.practiceId, question.index),
                ]);
                out.push({
                    summary: {
                        practiceId: practice.practiceId,
                        questionIndex: question.index,
                        question: question.text,
                        framework: framework.name,
                        compositeScore: stored ? stored.analysis.compositeScore : null,
                    },
                    stored,
                    answerText: combineAnswerText(orderedSections(framework, answers)),
                });
            }
        }
        return out;
    }
}
