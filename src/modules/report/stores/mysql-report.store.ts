import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { jsonColumn } from '../../../common/json-column';
import { StorageError } from '../../../common/errors';
import { DatabaseService } from '../../../database/database.service';
import { ReportQueries } from '../queries/report.queries';
import {
    FeedbackSchema,
    ReportQuestionSchema,
    ReportRecord,
    ScoreSummarySchema,
} from '../types/report.types';
import { ReportStore } from './report.store';

const ReportRowSchema = z
    .object({
        report_id: z.string(),
        interview_id: z.string(),
        score_summary: jsonColumn(ScoreSummarySchema),
        overall_feedback: jsonColumn(FeedbackSchema),
        questions: jsonColumn(z.array(ReportQuestionSchema)),
        per_question_feedback: jsonColumn(z.array(FeedbackSchema.nullable())),
        created_at: z.coerce.date(),
        updated_at: z.coerce.date(),
    })
    .transform(
        (r): ReportRecord => ({
            reportId: r.report_id,
            interviewId: r.interview_id,
            scoreSummary: r.score_summary,
            overallFeedback: r.overall_feedback,
            questions: r.questions,
            perQuestionFeedback: r.per_question_feedback,
            createdAt: r.created_at,
            updatedAt: r.updated_at,
        }),
    );

@Injectable()
export class MysqlReportStore extends ReportStore {
    constructor(private readonly db: DatabaseService) {
        super();
    }

    async upsert(report: ReportRecord): Promise<ReportRecord> {
        await this.db.execute(ReportQueries.upsertReport, [
            report.reportId,
            report.interviewId,
            report.scoreSummary.overallScore,
            JSON.stringify(report.scoreSummary),
            JSON.stringify(report.overallFeedback),
            JSON.stringify(report.questions),
            JSON.stringify(report.perQuestionFeedback),
        ]);
        const saved = await this.findByInterview(report.interviewId);
        if (!saved) {
            throw new StorageError(`report for ${report.interviewId} not readable after upsert`);
        }
        return saved;
    }

    async findByInterview(interviewId: string): Promise<ReportRecord | null> {
        const row = await this.db.queryOne(ReportQueries.getReportByInterview, [interviewId]);
        if (!row) return null;
        const parsed = ReportRowSchema.safeParse(row);
        if (!parsed.success) {
            throw new StorageError(`malformed report row: ${parsed.error.message}`);
        }
        return parsed.data;
    }
}
