import { AggregateAnalysis, StoredAnalysis } from '../../src/modules/analysis/types/analysis.types';
import { PracticeStore } from '../../src/modules/practice/stores/practice.store';
import { SectionAnswerStore } from '../../src/modules/practice/stores/section-answer.store';
import {
    NewPractice,
    PracticeRecord,
    PracticeStatus,
    SectionAnswer,
    SectionAnswerInput,
} from '../../src/modules/practice/types/practice.types';
import { ReportStore } from '../../src/modules/report/stores/report.store';
import { ReportRecord } from '../../src/modules/report/types/report.types';

// 제출 순서가 시각으로 구분되도록 1ms씩 증가하는 시계
export class TestClock {
    private t = Date.UTC(2026, 0, 1, 9, 0, 0);
    now(): Date {
        this.t += 1;
        return new Date(this.t);
    }
}

export class InMemoryPracticeStore extends PracticeStore {
    readonly rows: PracticeRecord[] = [];
    private seq = 0;

    constructor(private readonly clock = new TestClock()) {
        super();
    }

    async create(practice: NewPractice): Promise<PracticeRecord> {
        this.seq += 1;
        const record: PracticeRecord = {
            practiceId: this.seq,
            interviewId: practice.interviewId,
            track: practice.track,
            difficulty: practice.difficulty,
            status: 'in_progress',
            questions: practice.questions.map((q) => ({ ...q })),
            createdAt: this.clock.now(),
        };
        this.rows.push(record);
        return { ...record };
    }

    async findById(practiceId: number): Promise<PracticeRecord | null> {
        const row = this.rows.find((r) => r.practiceId === practiceId);
        return row ? { ...row } : null;
    }

    async listByInterview(interviewId: string): Promise<PracticeRecord[]> {
        return this.rows
            .filter((r) => r.interviewId === interviewId)
            .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.practiceId - b.practiceId)
            .map((r) => ({ ...r }));
    }

    async updateStatus(practiceId: number, status: PracticeStatus): Promise<void> {
        const row = this.rows.find((r) => r.practiceId === practiceId);
        if (row) row.status = status;
    }
}

interface AnswerRow extends SectionAnswer {
    analysis: AggregateAnalysis | null;
    analyzedAt: Date | null;
}

export class InMemorySectionAnswerStore extends SectionAnswerStore {
    readonly rows: AnswerRow[] = [];
    private seq = 0;

    constructor(private readonly clock = new TestClock()) {
        super();
    }

    async upsert(input: SectionAnswerInput): Promise<SectionAnswer> {
        const existing = this.rows.find(
            (r) =>
                r.practiceId === input.practiceId &&
                r.questionIndex === input.questionIndex &&
                r.sectionName === input.sectionName,
        );
        if (existing) {
            existing.answerText = input.answerText;
            existing.timeSpentSeconds = input.timeSpentSeconds;
            existing.transcription = input.transcription;
            existing.submittedAt = this.clock.now();
            return toAnswer(existing);
        }
        this.seq += 1;
        const row: AnswerRow = {
            ...input,
            answerId: this.seq,
            submittedAt: this.clock.now(),
            analysis: null,
            analyzedAt: null,
        };
        this.rows.push(row);
        return toAnswer(row);
    }

    async listForQuestion(practiceId: number, questionIndex: number): Promise<SectionAnswer[]> {
        return this.rows
            .filter((r) => r.practiceId === practiceId && r.questionIndex === questionIndex)
            .sort(bySubmission)
            .map(toAnswer);
    }

    async listForPractice(practiceId: number): Promise<SectionAnswer[]> {
        return this.rows
            .filter((r) => r.practiceId === practiceId)
            .sort((a, b) => a.questionIndex - b.questionIndex || bySubmission(a, b))
            .map(toAnswer);
    }

    async saveAnalysis(
        practiceId: number,
        questionIndex: number,
        answerId: number,
        analysis: AggregateAnalysis,
    ): Promise<void> {
        const at = this.clock.now();
        for (const r of this.rows) {
            if (r.practiceId !== practiceId || r.questionIndex !== questionIndex) continue;
            r.analysis = r.answerId === answerId ? analysis : null;
            r.analyzedAt = r.answerId === answerId ? at : null;
        }
    }

    async findLatestAnalysis(
        practiceId: number,
        questionIndex: number,
    ): Promise<StoredAnalysis | null> {
        const hit = this.rows.find(
            (r) => r.practiceId === practiceId && r.questionIndex === questionIndex && r.analysis,
        );
        if (!hit || !hit.analysis || !hit.analyzedAt) return null;
        return { answerId: hit.answerId, analysis: hit.analysis, analyzedAt: hit.analyzedAt };
    }
}

export class InMemoryReportStore extends ReportStore {
    readonly rows: ReportRecord[] = [];

    async upsert(report: ReportRecord): Promise<ReportRecord> {
        const i = this.rows.findIndex((r) => r.interviewId === report.interviewId);
        if (i >= 0) {
            const previous = this.rows[i];
            const merged: ReportRecord = { ...report, createdAt: previous?.createdAt ?? report.createdAt };
            this.rows[i] = merged;
            return merged;
        }
        this.rows.push(report);
        return report;
    }

    async findByInterview(interviewId: string): Promise<ReportRecord | null> {
        return this.rows.find((r) => r.interviewId === interviewId) ?? null;
    }
}

function bySubmission(a: SectionAnswer, b: SectionAnswer): number {
    return a.submittedAt.getTime() - b.submittedAt.getTime() || a.answerId - b.answerId;
}

function toAnswer(row: AnswerRow): SectionAnswer {
    return {
        answerId: row.answerId,
        practiceId: row.practiceId,
        questionIndex: row.questionIndex,
        sectionName: row.sectionName,
        answerText: row.answerText,
        timeSpentSeconds: row.timeSpentSeconds,
        transcription: row.transcription,
        submittedAt: row.submittedAt,
    };
}
