import { Injectable } from '@nestjs/common';
import { RowDataPacket } from 'mysql2/promise';
import { StorageError } from '../../../common/errors';
import { DatabaseService } from '../../../database/database.service';
import { AggregateAnalysis, StoredAnalysis } from '../../analysis/types/analysis.types';
import { SectionAnswerQueries } from '../queries/practice.queries';
import { SectionAnswer, SectionAnswerInput } from '../types/practice.types';
import { SectionAnswerRowSchema, StoredAnalysisRowSchema } from './row-schemas';
import { SectionAnswerStore } from './section-answer.store';

@Injectable()
export class MysqlSectionAnswerStore extends SectionAnswerStore {
    constructor(private readonly db: DatabaseService) {
        super();
    }

    async upsert(input: SectionAnswerInput): Promise<SectionAnswer> {
        // ON DUPLICATE KEY 경로에서도 LAST_INSERT_ID(answer_id)로 기존 ID가 insertId에 실린다
        const result = await this.db.execute(SectionAnswerQueries.upsertAnswer, [
            input.practiceId,
            input.questionIndex,
            input.sectionName,
            input.answerText,
            input.timeSpentSeconds,
            input.transcription ? JSON.stringify(input.transcription) : null,
        ]);
        const row = await this.db.queryOne(SectionAnswerQueries.getAnswer, [result.insertId]);
        if (!row) {
            throw new StorageError(`answer ${result.insertId} not readable after upsert`);
        }
        return toAnswer(row);
    }

    async listForQuestion(practiceId: number, questionIndex: number): Promise<SectionAnswer[]> {
        const rows = await this.db.query(SectionAnswerQueries.listForQuestion, [
            practiceId,
            questionIndex,
        ]);
        return rows.map(toAnswer);
    }

    async listForPractice(practiceId: number): Promise<SectionAnswer[]> {
        const rows = await this.db.query(SectionAnswerQueries.listForPractice, [practiceId]);
        return rows.map(toAnswer);
    }

    async saveAnalysis(
        practiceId: number,
        questionIndex: number,
        answerId: number,
        analysis: AggregateAnalysis,
    ): Promise<void> {
        const result = await this.db.execute(SectionAnswerQueries.saveAnalysis, [
            answerId,
            JSON.stringify(analysis),
            answerId,
            practiceId,
            questionIndex,
        ]);
        if (result.affectedRows === 0) {
            throw new StorageError(
                `no answers for practice ${practiceId} question ${questionIndex}`,
            );
        }
    }

    async findLatestAnalysis(
        practiceId: number,
        questionIndex: number,
    ): Promise<StoredAnalysis | null> {
        const row = await this.db.queryOne(SectionAnswerQueries.findLatestAnalysis, [
            practiceId,
            questionIndex,
        ]);
        if (!row) return null;
        const parsed = StoredAnalysisRowSchema.safeParse(row);
        if (!parsed.success) {
            throw new StorageError(`malformed analysis row: ${parsed.error.message}`);
        }
        return parsed.data;
    }
}

function toAnswer(row: RowDataPacket): SectionAnswer {
    const parsed = SectionAnswerRowSchema.safeParse(row);
    if (!parsed.success) {
        throw new StorageError(`malformed answer row: ${parsed.error.message}`);
    }
    return parsed.data;
}
