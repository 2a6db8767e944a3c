import { Injectable } from '@nestjs/common';
import { RowDataPacket } from 'mysql2/promise';
import { StorageError } from '../../../common/errors';
import { DatabaseService } from '../../../database/database.service';
import { PracticeQueries } from '../queries/practice.queries';
import { NewPractice, PracticeRecord, PracticeStatus } from '../types/practice.types';
import { PracticeStore } from './practice.store';
import { PracticeRowSchema } from './row-schemas';

@Injectable()
export class MysqlPracticeStore extends PracticeStore {
    constructor(private readonly db: DatabaseService) {
        super();
    }

    async create(practice: NewPractice): Promise<PracticeRecord> {
        const result = await this.db.execute(PracticeQueries.insertPractice, [
            practice.interviewId,
            practice.track,
            practice.difficulty,
            JSON.stringify(practice.questions),
        ]);
        const created = await this.findById(result.insertId);
        if (!created) {
            throw new StorageError(`practice ${result.insertId} not readable after insert`);
        }
        return created;
    }

    async findById(practiceId: number): Promise<PracticeRecord | null> {
        const row = await this.db.queryOne(PracticeQueries.getPractice, [practiceId]);
        return row ? toPractice(row) : null;
    }

    async listByInterview(interviewId: string): Promise<PracticeRecord[]> {
        const rows = await this.db.query(PracticeQueries.listPracticesByInterview, [interviewId]);
        return rows.map(toPractice);
    }

    async updateStatus(practiceId: number, status: PracticeStatus): Promise<void> {
        await this.db.execute(PracticeQueries.updatePracticeStatus, [status, practiceId]);
    }
}

function toPractice(row: RowDataPacket): PracticeRecord {
    const parsed = PracticeRowSchema.safeParse(row);
    if (!parsed.success) {
        throw new StorageError(`malformed practice row: ${parsed.error.message}`);
    }
    return parsed.data;
}
