// 섹션 답변 최대 길이 (문자 수)
export const MAX_ANSWER_CHARS = 60_000;

export type PracticeStatus = 'in_progress' | 'completed';

export interface PracticeQuestion {
    index: number;
    text: string;
    category: string | null;
    structureHint: string;
    // 생성 시 한 번 판정, 이후 불변
    framework: string;
}

export interface PracticeRecord {
    practiceId: number;
    interviewId: string;
    track: string;
    difficulty: string | null;
    status: PracticeStatus;
    questions: PracticeQuestion[];
    createdAt: Date;
}

export interface NewPractice {
    interviewId: string;
    track: string;
    difficulty: string | null;
    questions: PracticeQuestion[];
}

export interface TranscriptionMeta {
    model: string;
    wordCount: number;
    durationSeconds: number | null;
    latencyMs: number;
}

export interface SectionAnswer {
    answerId: number;
    practiceId: number;
    questionIndex: number;
    sectionName: string;
    answerText: string;
    timeSpentSeconds: number | null;
    transcription: TranscriptionMeta | null;
    submittedAt: Date;
}

export type SectionAnswerInput = Omit<SectionAnswer, 'answerId' | 'submittedAt'>;

export interface SectionProgress {
    name: string;
    submitted: boolean;
    timeSpentSeconds: number | null;
    submittedAt: Date | null;
}

export interface ProgressSnapshot {
    framework: string;
    sectionsSubmitted: string[];
    sectionsCompleteCount: number;
    totalSections: number;
    nextSection: string | null;
    nextHint: string | null;
    isComplete: boolean;
    sections: SectionProgress[];
}

export interface SubmitSectionResult {
    answerId: number;
    message: string;
    snapshot: ProgressSnapshot;
}

export interface PracticeQuestionView extends PracticeQuestion {
    frameworkDisplayName: string;
    sections: readonly string[];
    initialHint: { sectionName: string; hint: string };
}

export interface PracticeView extends Omit<PracticeRecord, 'questions'> {
    questions: PracticeQuestionView[];
}

export interface CreatePracticeQuestionInput {
    text: string;
    category?: string;
    structureHint?: string;
}

export interface CreatePracticeInput {
    interviewId?: string;
    track: string;
    difficulty?: string;
    questions: CreatePracticeQuestionInput[];
}
