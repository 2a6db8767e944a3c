import { z } from 'zod';

export const KNOWLEDGE_MAX = 25;
export const SPEECH_MAX = 20;

export const ScoreBlockSchema = z.object({
    score: z.number(),
    maxScore: z.number(),
    percentage: z.number(),
});

export const ScoreSummarySchema = z.object({
    // 내용/지식 역량 (25점)
    knowledgeCompetence: ScoreBlockSchema,
    // 말하기/구조/유창성 (20점)
    speechStructure: ScoreBlockSchema,
    overallScore: z.number(),
    analyzedQuestions: z.number(),
    totalQuestions: z.number(),
    source: z.enum(['llm', 'heuristic']),
});

export const FeedbackSchema = z.object({
    strengths: z.array(z.string()),
    areasOfImprovement: z.array(z.string()),
});

export const ReportQuestionSchema = z.object({
    practiceId: z.number(),
    questionIndex: z.number(),
    question: z.string(),
    framework: z.string(),
    compositeScore: z.number().nullable(),
});

export type ScoreBlock = z.infer<typeof ScoreBlockSchema>;
export type ScoreSummary = z.infer<typeof ScoreSummarySchema>;
export type Feedback = z.infer<typeof FeedbackSchema>;
export type ReportQuestion = z.infer<typeof ReportQuestionSchema>;

export interface ReportRecord {
    reportId: string;
    interviewId: string;
    scoreSummary: ScoreSummary;
    overallFeedback: Feedback;
    questions: ReportQuestion[];
    // questions와 같은 순서, 분석되지 않은 질문은 null
    perQuestionFeedback: (Feedback | null)[];
    createdAt: Date;
    updatedAt: Date;
}
