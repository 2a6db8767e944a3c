import { ReportRecord } from '../types/report.types';

export abstract class ReportStore {
    /** interview_id 기준 덮어쓰기. createdAt은 최초 값을 유지한다. */
    abstract upsert(report: ReportRecord): Promise<ReportRecord>;
    abstract findByInterview(interviewId: string): Promise<ReportRecord | null>;
}
