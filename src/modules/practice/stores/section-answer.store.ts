import { AggregateAnalysis, StoredAnalysis } from '../../analysis/types/analysis.types';
import { SectionAnswer, SectionAnswerInput } from '../types/practice.types';

export abstract class SectionAnswerStore {
    /** (practiceId, questionIndex, sectionName) 기준 덮어쓰기. 저장된 레코드를 돌려준다. */
    abstract upsert(input: SectionAnswerInput): Promise<SectionAnswer>;
    abstract listForQuestion(practiceId: number, questionIndex: number): Promise<SectionAnswer[]>;
    abstract listForPractice(practiceId: number): Promise<SectionAnswer[]>;
    /** answerId에 분석을 기록하고 같은 질문의 다른 답변에서는 지운다 (원자적). */
    abstract saveAnalysis(
        practiceId: number,
        questionIndex: number,
        answerId: number,
        analysis: AggregateAnalysis,
    ): Promise<void>;
    abstract findLatestAnalysis(
        practiceId: number,
        questionIndex: number,
    ): Promise<StoredAnalysis | null>;
}
