import { NewPractice, PracticeRecord, PracticeStatus } from '../types/practice.types';

// 저장소 경계: 운영은 MySQL, 테스트는 인메모리 구현을 바인딩
export abstract class PracticeStore {
    abstract create(practice: NewPractice): Promise<PracticeRecord>;
    abstract findById(practiceId: number): Promise<PracticeRecord | null>;
    abstract listByInterview(interviewId: string): Promise<PracticeRecord[]>;
    abstract updateStatus(practiceId: number, status: PracticeStatus): Promise<void>;
}
